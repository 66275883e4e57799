export { TreeWalker } from './tree_walker';
export type { TraversalIssue, TraversalReport, TreeWalkerOptions, WalkFrame } from './tree_walker.types';
