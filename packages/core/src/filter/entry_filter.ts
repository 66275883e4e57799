import type { TreeConfig } from '../config/tree_config.types';
import { isDirectoryLike } from '../types/entry';
import type { Entry } from '../types/entry';
import { compileWildcard } from './pattern_matcher';
import type { NameMatcher } from './pattern_matcher';

/**
 * Applies the per-directory inclusion rules to raw children, in order:
 * hidden names, include pattern (non-directories only), exclude pattern,
 * directories-only. The entry limit is checked separately by the walker
 * because it decides whether a directory is opened, not which children stay.
 */
export class EntryFilter {
  private readonly include: NameMatcher | undefined;
  private readonly exclude: NameMatcher | undefined;

  constructor(private readonly config: TreeConfig) {
    this.include = config.includePattern !== undefined ? compileWildcard(config.includePattern) : undefined;
    this.exclude = config.excludePattern !== undefined ? compileWildcard(config.excludePattern) : undefined;
  }

  accepts(entry: Entry): boolean {
    if (entry.name === '.' || entry.name === '..') {
      return false;
    }
    if (!this.config.showHidden && entry.name.startsWith('.')) {
      return false;
    }

    const directoryLike = isDirectoryLike(entry);
    if (this.include && !directoryLike && !this.include(entry.name)) {
      return false;
    }
    if (this.exclude && this.exclude(entry.name)) {
      return false;
    }
    if (this.config.directoriesOnly && !directoryLike) {
      return false;
    }
    return true;
  }

  apply(entries: readonly Entry[]): Entry[] {
    return entries.filter(entry => this.accepts(entry));
  }

  /**
   * True when a directory with this many filtered children must stay closed.
   */
  exceedsEntryLimit(childCount: number): boolean {
    return this.config.entryLimit !== undefined && childCount > this.config.entryLimit;
  }
}
