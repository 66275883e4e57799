import type { Logger } from '../logger/logger';
import type { OutputSink } from '../output_sink/output_sink';
import type { PathSource } from '../path_source/path_source';
import type { PathSourceError } from '../path_source/path_source.errors';
import type { LineFormatter } from '../render/line_formatter';
import type { Entry } from '../types/entry';

/**
 * A root or directory that could not be opened. The walk continues past it.
 */
export interface TraversalIssue {
  location: string;
  error: PathSourceError;
}

/**
 * Outcome of a complete walk over every root.
 */
export interface TraversalReport {
  directories: number;
  files: number;
  issues: TraversalIssue[];
}

export interface TreeWalkerOptions {
  source: PathSource;
  sink: OutputSink;
  /** Defaults to an uncolored LineFormatter for the config */
  formatter?: LineFormatter;
  logger?: Logger;
}

/**
 * One open directory on the work-stack.
 */
export interface WalkFrame {
  /** Filtered, sorted children with isLast set */
  children: Entry[];
  /** Index of the next child to visit */
  index: number;
  /** Whether the directory owning this frame has siblings after it */
  continues: boolean;
  /** Real path entered on the cycle guard, to leave when the frame pops */
  realPath?: string;
}
