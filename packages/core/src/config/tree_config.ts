import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { compileWildcard, PatternSyntaxError } from '../filter/pattern_matcher';
import { ConfigurationError } from './tree_config.errors';
import type { TreeConfig, TreeConfigInput } from './tree_config.types';
import treeConfigSchema from './tree_config_schema.json';

/**
 * Defaults applied under every createTreeConfig() input.
 */
export const DEFAULT_TREE_CONFIG: TreeConfig = Object.freeze({
  roots: Object.freeze(['.']),
  directoriesOnly: false,
  showHidden: false,
  sortKey: 'name',
  reverse: false,
  directoriesFirst: false,
  followSymlinks: false,
  colorMode: 'auto',
  asciiGlyphs: false,
  fullPath: false,
  noIndent: false,
  sizeMode: 'off',
  showPermissions: false,
  showOwner: false,
  showGroup: false,
  showDate: false,
  typeIndicators: false,
  suppressSummary: false,
  listingInput: false,
});

let validator: ValidateFunction | null = null;

function getValidator(): ValidateFunction {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    validator = ajv.compile(treeConfigSchema);
  }
  return validator;
}

function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return [];
  }
  return errors.map(error => {
    const field = error.instancePath ? error.instancePath.slice(1).replace(/\//g, '.') : 'config';
    if (error.keyword === 'additionalProperties' && typeof error.params['additionalProperty'] === 'string') {
      return `unknown option "${error.params['additionalProperty']}"`;
    }
    return `${field} ${error.message ?? 'is invalid'}`;
  });
}

function isTreeConfigInput(input: unknown): input is TreeConfigInput {
  return getValidator()(input);
}

/**
 * Validates a partial configuration and returns a frozen TreeConfig.
 *
 * Unknown keys, wrong types, out-of-range numbers and patterns that do not
 * compile are all rejected here, before anything touches the filesystem.
 *
 * @throws ConfigurationError
 */
export function createTreeConfig(input: TreeConfigInput = {}): TreeConfig {
  return parseTreeConfig(input);
}

/**
 * Same as createTreeConfig() for input of unknown shape (decoded JSON, tests).
 *
 * @throws ConfigurationError
 */
export function parseTreeConfig(input: unknown): TreeConfig {
  // ajv treats undefined-valued keys as absent
  if (!isTreeConfigInput(input)) {
    throw new ConfigurationError('Invalid configuration', formatSchemaErrors(getValidator().errors));
  }

  const patternErrors: string[] = [];
  for (const field of ['includePattern', 'excludePattern'] as const) {
    const pattern = input[field];
    if (pattern === undefined) continue;
    try {
      compileWildcard(pattern);
    } catch (error) {
      if (error instanceof PatternSyntaxError) {
        patternErrors.push(`${field}: ${error.message}`);
      } else {
        throw error;
      }
    }
  }
  if (patternErrors.length > 0) {
    throw new ConfigurationError('Invalid configuration', patternErrors);
  }

  const defaults = DEFAULT_TREE_CONFIG;
  return Object.freeze({
    roots: input.roots && input.roots.length > 0 ? Object.freeze([...input.roots]) : defaults.roots,
    maxDepth: input.maxDepth,
    includePattern: input.includePattern,
    excludePattern: input.excludePattern,
    directoriesOnly: input.directoriesOnly ?? defaults.directoriesOnly,
    showHidden: input.showHidden ?? defaults.showHidden,
    sortKey: input.sortKey ?? defaults.sortKey,
    reverse: input.reverse ?? defaults.reverse,
    directoriesFirst: input.directoriesFirst ?? defaults.directoriesFirst,
    entryLimit: input.entryLimit,
    followSymlinks: input.followSymlinks ?? defaults.followSymlinks,
    colorMode: input.colorMode ?? defaults.colorMode,
    lsColors: input.lsColors,
    asciiGlyphs: input.asciiGlyphs ?? defaults.asciiGlyphs,
    fullPath: input.fullPath ?? defaults.fullPath,
    noIndent: input.noIndent ?? defaults.noIndent,
    sizeMode: input.sizeMode ?? defaults.sizeMode,
    showPermissions: input.showPermissions ?? defaults.showPermissions,
    showOwner: input.showOwner ?? defaults.showOwner,
    showGroup: input.showGroup ?? defaults.showGroup,
    showDate: input.showDate ?? defaults.showDate,
    typeIndicators: input.typeIndicators ?? defaults.typeIndicators,
    suppressSummary: input.suppressSummary ?? defaults.suppressSummary,
    outputFile: input.outputFile,
    listingInput: input.listingInput ?? defaults.listingInput,
  });
}
