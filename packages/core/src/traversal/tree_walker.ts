/**
 * TreeWalker - streams a tree for every root of a PathSource
 *
 * Pre-order, depth-first, driven by an explicit stack of frames so deep
 * hierarchies never grow the call stack. Only the ancestor chain and the
 * sibling lists on the stack are held in memory; each directory's children
 * are read, filtered and sorted when the directory line is printed.
 *
 * @module traversal/tree_walker
 */

import type { TreeConfig } from '../config/tree_config.types';
import { TreeCounter, formatSummary } from '../counter/tree_counter';
import { CycleGuard } from '../cycle_guard/cycle_guard';
import { EntryFilter } from '../filter/entry_filter';
import { silentLogger } from '../logger/logger';
import type { Logger } from '../logger/logger';
import type { OutputSink } from '../output_sink/output_sink';
import { isResolvedRoot } from '../path_source/path_source';
import type { PathSource } from '../path_source/path_source';
import { PathSourceError } from '../path_source/path_source.errors';
import { LineFormatter, LINE_NOTES } from '../render/line_formatter';
import { sortEntries } from '../sort/entry_sorter';
import type { Entry } from '../types/entry';
import type { TraversalIssue, TraversalReport, TreeWalkerOptions, WalkFrame } from './tree_walker.types';

/**
 * Result of opening one directory: its prepared children, or the note that
 * replaces them on the directory line.
 */
type OpenResult = { children: Entry[] } | { note: string };

export class TreeWalker {
  private readonly source: PathSource;
  private readonly sink: OutputSink;
  private readonly formatter: LineFormatter;
  private readonly logger: Logger;
  private readonly filter: EntryFilter;

  private counter = new TreeCounter();
  private guard = new CycleGuard();
  private issues: TraversalIssue[] = [];

  constructor(
    private readonly config: TreeConfig,
    options: TreeWalkerOptions
  ) {
    this.source = options.source;
    this.sink = options.sink;
    this.formatter = options.formatter ?? new LineFormatter(config);
    this.logger = options.logger ?? silentLogger;
    this.filter = new EntryFilter(config);
  }

  /**
   * Renders every root in order, then the summary line unless suppressed.
   * The sink is left open for the caller to close.
   */
  walk(): TraversalReport {
    this.counter = new TreeCounter();
    this.guard = new CycleGuard();
    this.issues = [];

    for (const root of this.source.roots()) {
      if (isResolvedRoot(root)) {
        this.walkRoot(root.location, root.entry);
      } else {
        this.recordIssue(root.location, root.error);
        this.sink.writeLine(this.formatter.formatRoot(root.location, undefined, LINE_NOTES.openError));
      }
    }

    const counts = this.counter.counts();
    if (!this.config.suppressSummary) {
      this.sink.writeLine('');
      this.sink.writeLine(formatSummary(counts, this.config.directoriesOnly));
    }

    return { ...counts, issues: [...this.issues] };
  }

  private walkRoot(location: string, root: Entry): void {
    if (!this.source.isTraversable(root)) {
      this.sink.writeLine(this.formatter.formatRoot(location, root));
      return;
    }

    const opened = this.open(root);
    if ('note' in opened) {
      this.sink.writeLine(this.formatter.formatRoot(location, root, opened.note));
      return;
    }
    this.sink.writeLine(this.formatter.formatRoot(location, root));

    const rootFrame: WalkFrame = { children: opened.children, index: 0, continues: false };
    if (this.config.followSymlinks) {
      const realPath = this.source.realPath(root);
      if (realPath !== undefined && this.guard.enter(realPath)) {
        rootFrame.realPath = realPath;
      }
    }

    const stack: WalkFrame[] = [rootFrame];
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const entry = frame?.children[frame.index];
      if (!frame || !entry) {
        stack.pop();
        if (frame?.realPath !== undefined) {
          this.guard.leave(frame.realPath);
        }
        continue;
      }
      frame.index++;

      const ancestorsContinue = stack.slice(1).map(open => open.continues);
      const child = this.visit(entry, ancestorsContinue);
      if (child) {
        stack.push(child);
      }
    }
  }

  /**
   * Prints one entry and decides whether to descend into it.
   * @returns the frame to push when the entry is opened
   */
  private visit(entry: Entry, ancestorsContinue: boolean[]): WalkFrame | undefined {
    this.counter.record(entry);

    if (!this.shouldDescend(entry)) {
      this.sink.writeLine(this.formatter.formatEntry(entry, ancestorsContinue));
      return undefined;
    }

    let realPath: string | undefined;
    if (this.config.followSymlinks) {
      realPath = this.source.realPath(entry);
      if (entry.kind === 'symlink' && realPath !== undefined && this.guard.contains(realPath)) {
        this.logger.debug(`Not following ${entry.path}: ${realPath} is an ancestor`);
        this.sink.writeLine(this.formatter.formatEntry(entry, ancestorsContinue, LINE_NOTES.recursive));
        return undefined;
      }
    }

    const opened = this.open(entry);
    if ('note' in opened) {
      this.sink.writeLine(this.formatter.formatEntry(entry, ancestorsContinue, opened.note));
      return undefined;
    }
    this.sink.writeLine(this.formatter.formatEntry(entry, ancestorsContinue));

    const frame: WalkFrame = { children: opened.children, index: 0, continues: !entry.isLast };
    if (realPath !== undefined && this.guard.enter(realPath)) {
      frame.realPath = realPath;
    }
    return frame;
  }

  private shouldDescend(entry: Entry): boolean {
    if (!this.source.isTraversable(entry)) {
      return false;
    }
    if (entry.kind === 'symlink' && !this.config.followSymlinks) {
      return false;
    }
    return this.config.maxDepth === undefined || entry.depth < this.config.maxDepth;
  }

  /**
   * Reads, filters and sorts a directory's children, marking the last one.
   * @throws errors other than PathSourceError
   */
  private open(directory: Entry): OpenResult {
    let raw: Entry[];
    try {
      raw = this.source.readChildren(directory);
    } catch (error) {
      if (!(error instanceof PathSourceError)) {
        throw error;
      }
      this.recordIssue(directory.path, error);
      return { note: LINE_NOTES.openError };
    }

    const filtered = this.filter.apply(raw);
    if (this.filter.exceedsEntryLimit(filtered.length)) {
      return { note: LINE_NOTES.entryLimit(filtered.length) };
    }

    const children = sortEntries(filtered, this.config);
    children.forEach((child, index) => {
      child.isLast = index === children.length - 1;
    });
    return { children };
  }

  private recordIssue(location: string, error: PathSourceError): void {
    this.logger.debug(`Cannot open ${location}: ${error.message}`);
    this.issues.push({ location, error });
  }
}
