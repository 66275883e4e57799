/**
 * FsPathSource - Filesystem-backed PathSource
 *
 * Lists one directory at a time with readdirSync and describes each child
 * with lstatSync, so symlinks are seen as links. Link targets are read with
 * readlinkSync and classified with statSync; a link whose target cannot be
 * stat'ed is a broken link and is never traversable.
 *
 * @module path_source/fs/fs_path_source
 */

import * as fs from 'fs';
import { silentLogger } from '../../logger/logger';
import type { Logger } from '../../logger/logger';
import { isDirectoryLike, joinDisplayPath } from '../../types/entry';
import type { Entry, EntryKind } from '../../types/entry';
import type { PathSource, RootResolution } from '../path_source';
import { toPathSourceError } from '../path_source.errors';

/**
 * Options for FsPathSource.
 */
export interface FsPathSourceOptions {
  /** Root paths, relative to the process cwd or absolute */
  roots: readonly string[];
  /** Receives debug notes about children that vanish mid-listing */
  logger?: Logger;
}

function kindFromStats(stats: fs.Stats): EntryKind {
  if (stats.isDirectory()) return 'directory';
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isSocket()) return 'socket';
  if (stats.isFIFO()) return 'fifo';
  if (stats.isBlockDevice() || stats.isCharacterDevice()) return 'device';
  return 'file';
}

export class FsPathSource implements PathSource {
  private readonly locations: readonly string[];
  private readonly logger: Logger;

  constructor(options: FsPathSourceOptions) {
    this.locations = options.roots;
    this.logger = options.logger ?? silentLogger;
  }

  roots(): RootResolution[] {
    return this.locations.map(location => {
      try {
        return { location, entry: this.describe(location, location, 0) };
      } catch (error) {
        return { location, error: toPathSourceError(error, location) };
      }
    });
  }

  isTraversable(entry: Entry): boolean {
    return isDirectoryLike(entry);
  }

  readChildren(entry: Entry): Entry[] {
    let names: string[];
    try {
      names = fs.readdirSync(entry.path);
    } catch (error) {
      throw toPathSourceError(error, entry.path);
    }

    const children: Entry[] = [];
    for (const name of names) {
      const childPath = joinDisplayPath(entry.path, name);
      try {
        children.push(this.describe(name, childPath, entry.depth + 1));
      } catch (error) {
        const failure = toPathSourceError(error, childPath);
        if (failure.code === 'NOT_FOUND') {
          this.logger.debug(`Skipping ${childPath}: removed while listing`);
          continue;
        }
        // Listable but not stat-able (directory without search permission)
        children.push({ name, path: childPath, kind: 'file', depth: entry.depth + 1, isLast: false });
      }
    }
    return children;
  }

  realPath(entry: Entry): string | undefined {
    try {
      return fs.realpathSync(entry.path);
    } catch (error) {
      this.logger.debug(`Cannot resolve real path of ${entry.path}: ${toPathSourceError(error, entry.path).message}`);
      return undefined;
    }
  }

  /**
   * Builds an Entry from lstat, plus link target details for symlinks.
   * @throws Node.js system errors from lstatSync
   */
  private describe(name: string, displayPath: string, depth: number): Entry {
    const stats = fs.lstatSync(displayPath);
    const entry: Entry = {
      name,
      path: displayPath,
      kind: kindFromStats(stats),
      depth,
      metadata: {
        size: stats.size,
        mtimeMs: stats.mtimeMs,
        mode: stats.mode,
        uid: stats.uid,
        gid: stats.gid,
      },
      isLast: false,
    };

    if (entry.kind === 'symlink') {
      entry.linkTarget = fs.readlinkSync(displayPath);
      try {
        entry.targetKind = kindFromStats(fs.statSync(displayPath));
      } catch (error) {
        this.logger.debug(`Broken link ${displayPath}: ${toPathSourceError(error, displayPath).code}`);
      }
    }
    return entry;
  }
}
