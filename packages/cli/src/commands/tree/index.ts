export { TreeCommand, parseCount, toTreeConfigInput } from './tree-command';
export type { TreeCommandOptions } from './tree-command';
