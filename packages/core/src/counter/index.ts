export { TreeCounter, formatSummary } from './tree_counter';
export type { TreeCounts } from './tree_counter';
