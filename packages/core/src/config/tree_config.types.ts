/**
 * Sibling ordering key.
 */
export type SortKey = 'name' | 'time' | 'version';

/**
 * When to colorize names. "auto" colors only interactive console output.
 */
export type ColorMode = 'auto' | 'always' | 'never';

/**
 * Size decoration: none, raw bytes, or 1024-based units.
 */
export type SizeMode = 'off' | 'bytes' | 'human';

/**
 * Immutable configuration consumed by the traversal.
 * Produced by createTreeConfig(); never mutated afterwards.
 */
export interface TreeConfig {
  /** Root locations (paths, or listing files when listingInput is set) */
  readonly roots: readonly string[];
  /** Deepest level printed; root children are level 1 */
  readonly maxDepth?: number;
  /** Wildcard pattern non-directory names must match */
  readonly includePattern?: string;
  /** Wildcard pattern that drops any matching name */
  readonly excludePattern?: string;
  readonly directoriesOnly: boolean;
  readonly showHidden: boolean;
  readonly sortKey: SortKey;
  readonly reverse: boolean;
  readonly directoriesFirst: boolean;
  /** Directories with more filtered children than this are not opened */
  readonly entryLimit?: number;
  readonly followSymlinks: boolean;
  readonly colorMode: ColorMode;
  /** LS_COLORS-style mapping; built-in colors are used when absent */
  readonly lsColors?: string;
  readonly asciiGlyphs: boolean;
  readonly fullPath: boolean;
  readonly noIndent: boolean;
  readonly sizeMode: SizeMode;
  readonly showPermissions: boolean;
  readonly showOwner: boolean;
  readonly showGroup: boolean;
  readonly showDate: boolean;
  readonly typeIndicators: boolean;
  readonly suppressSummary: boolean;
  /** Write everything (tree and summary) to this file instead of stdout */
  readonly outputFile?: string;
  /** Treat roots as path listings (stdin when none is named) */
  readonly listingInput: boolean;
}

/**
 * Input accepted by createTreeConfig(). Every field is optional.
 */
export type TreeConfigInput = {
  -readonly [K in keyof TreeConfig]?: TreeConfig[K];
};
