/**
 * Entry Types
 *
 * One filesystem-like node produced by a PathSource. Entries are created one
 * directory at a time and dropped once that directory has been rendered.
 *
 * @module types/entry
 */

/**
 * Kind of node. Sockets, FIFOs and devices count as files in the summary.
 */
export type EntryKind =
  | 'directory'
  | 'file'
  | 'symlink'
  | 'socket'
  | 'fifo'
  | 'device';

/**
 * Metadata available for an entry. Listing entries usually carry none, or
 * only what a tar verbose listing provides.
 */
export interface EntryMetadata {
  /** Size in bytes */
  size?: number;
  /** Last modification time (ms since epoch) */
  mtimeMs?: number;
  /** Full st_mode, including permission and special bits */
  mode?: number;
  uid?: number;
  gid?: number;
  /** Owner name when the source already knows it */
  owner?: string;
  /** Group name when the source already knows it */
  group?: string;
}

export interface Entry {
  name: string;
  /** Display path: root location joined with '/'-separated names */
  path: string;
  kind: EntryKind;
  /** Root is 0; each descent adds exactly one */
  depth: number;
  metadata?: EntryMetadata;
  /** Raw link text for symlinks */
  linkTarget?: string;
  /** Kind of whatever the symlink resolves to; absent for broken links */
  targetKind?: EntryKind;
  /** Last of its parent's filtered, sorted siblings. Set by the walker. */
  isLast: boolean;
}

/**
 * True for directories and for symlinks that resolve to a directory.
 */
export function isDirectoryLike(entry: Entry): boolean {
  return entry.kind === 'directory' ||
    (entry.kind === 'symlink' && entry.targetKind === 'directory');
}

/**
 * Joins a parent display path and a child name with a single '/'.
 */
export function joinDisplayPath(parentPath: string, name: string): string {
  return parentPath.endsWith('/') ? `${parentPath}${name}` : `${parentPath}/${name}`;
}
