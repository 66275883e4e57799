export { sortEntries, compareNames, compareVersions } from './entry_sorter';
export type { EntryComparator } from './entry_sorter';
