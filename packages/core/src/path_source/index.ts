/**
 * Path Source Module
 *
 * Capability interface for the hierarchies the walker renders, with a
 * filesystem implementation and a listing implementation.
 *
 * @module path_source
 */

export { isResolvedRoot } from './path_source';
export type { PathSource, RootResolution, ResolvedRoot, FailedRoot } from './path_source';
export { PathSourceError, toPathSourceError } from './path_source.errors';
export type { PathSourceErrorCode } from './path_source.errors';
export * from './fs';
export * from './listing';
