/**
 * PathSource Interface
 *
 * Abstracts where a hierarchy comes from so the walker never branches on the
 * source type. Two implementations exist: FsPathSource reads the real
 * filesystem, ListingPathSource rebuilds a hierarchy from a flat path list.
 *
 * All methods are synchronous; the traversal is a single blocking walk.
 *
 * @module path_source
 * @example
 * ```typescript
 * const source: PathSource = new FsPathSource({ roots: ['src'] });
 * for (const root of source.roots()) {
 *   if ('entry' in root && source.isTraversable(root.entry)) {
 *     const children = source.readChildren(root.entry);
 *   }
 * }
 * ```
 */

import type { Entry } from '../types/entry';
import type { PathSourceError } from './path_source.errors';

/**
 * A root location that resolved to an entry.
 */
export interface ResolvedRoot {
  location: string;
  entry: Entry;
}

/**
 * A root location that could not be resolved (missing path, unreadable listing).
 */
export interface FailedRoot {
  location: string;
  error: PathSourceError;
}

export type RootResolution = ResolvedRoot | FailedRoot;

export interface PathSource {
  /**
   * Top-level roots in the order they were given.
   */
  roots(): RootResolution[];

  /**
   * Whether the entry has children that can be listed: directories, and
   * symlinks that resolve to a directory.
   */
  isTraversable(entry: Entry): boolean;

  /**
   * Direct children of a traversable entry, unfiltered and unsorted, at
   * depth `entry.depth + 1`.
   * @throws PathSourceError when the directory cannot be listed
   */
  readChildren(entry: Entry): Entry[];

  /**
   * Canonical real path used by the cycle guard. Sources without links
   * return undefined.
   */
  realPath(entry: Entry): string | undefined;
}

export function isResolvedRoot(root: RootResolution): root is ResolvedRoot {
  return 'entry' in root;
}
