export { isDirectoryLike, joinDisplayPath } from './entry';
export type { Entry, EntryKind, EntryMetadata } from './entry';
