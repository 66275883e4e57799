/**
 * Configuration Module
 *
 * The immutable option set threaded through every traversal stage.
 *
 * @module config
 * @example
 * ```typescript
 * import { createTreeConfig } from '@arbor/core';
 *
 * const config = createTreeConfig({ roots: ['src'], maxDepth: 2, directoriesFirst: true });
 * ```
 */

export { createTreeConfig, parseTreeConfig, DEFAULT_TREE_CONFIG } from './tree_config';
export { ConfigurationError } from './tree_config.errors';
export type {
  TreeConfig,
  TreeConfigInput,
  SortKey,
  ColorMode,
  SizeMode,
} from './tree_config.types';
