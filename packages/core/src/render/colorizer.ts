/**
 * Colorizer
 *
 * Paints names by role. Two palettes exist: an LS_COLORS-style mapping of
 * raw SGR codes when one is configured, otherwise built-in chalk styles with
 * regular files grouped by extension (see color_categories.json).
 *
 * @module render/colorizer
 */

import chalk from 'chalk';
import type { ColorMode, TreeConfig } from '../config/tree_config.types';
import type { Entry, EntryKind } from '../types/entry';
import { isExecutable } from './format_utils';
import colorCategories from './color_categories.json';

export type ColorRole =
  | 'directory'
  | 'symlink'
  | 'orphan'
  | 'executable'
  | 'socket'
  | 'fifo'
  | 'device'
  | 'file';

export type ColorCategory = keyof typeof colorCategories;

export interface Colorizer {
  /**
   * Wraps text in the color for a role. `name` is used for extension
   * lookups on regular files.
   */
  paint(text: string, role: ColorRole, name: string): string;
}

/**
 * Role of an entry's name.
 */
export function colorRole(entry: Entry): ColorRole {
  if (entry.kind === 'symlink') {
    return entry.targetKind === undefined ? 'orphan' : 'symlink';
  }
  if (isExecutable(entry)) {
    return 'executable';
  }
  return entry.kind;
}

/**
 * Role of a symlink's target, from the kind it resolves to.
 */
export function targetColorRole(targetKind: EntryKind | undefined): ColorRole {
  return targetKind === undefined ? 'orphan' : targetKind;
}

/**
 * Lowercased extension of a name, without the dot. Dot files have none.
 */
export function extensionOf(name: string): string | undefined {
  const dot = name.lastIndexOf('.');
  return dot > 0 && dot < name.length - 1 ? name.slice(dot + 1).toLowerCase() : undefined;
}

const CATEGORIES: readonly ColorCategory[] = ['archive', 'image', 'video', 'audio', 'document'];

const CATEGORY_BY_EXTENSION = new Map<string, ColorCategory>();
for (const category of CATEGORIES) {
  for (const extension of colorCategories[category]) {
    CATEGORY_BY_EXTENSION.set(extension, category);
  }
}

export function categoryOf(name: string): ColorCategory | undefined {
  const extension = extensionOf(name);
  return extension === undefined ? undefined : CATEGORY_BY_EXTENSION.get(extension);
}

/**
 * Decides whether color is on. `auto` means: only when writing to the
 * console and the console is an interactive terminal.
 */
export function resolveColorEnabled(
  colorMode: ColorMode,
  target: { outputFile?: string | undefined; isTTY: boolean }
): boolean {
  switch (colorMode) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'auto':
      return target.outputFile === undefined && target.isTTY;
  }
}

export const PLAIN_COLORIZER: Colorizer = {
  paint: text => text,
};

// ---------------------------------------------------------------------------
// LS_COLORS palette
// ---------------------------------------------------------------------------

/**
 * Parsed LS_COLORS: type keys (di, ln, ...) and '*suffix' keys.
 */
export interface LsColors {
  types: Map<string, string>;
  suffixes: Array<{ suffix: string; code: string }>;
}

const SGR_CODE = /^\d+(;\d+)*$/;

/**
 * Parses an LS_COLORS value such as `di=01;34:ln=01;36:*.tar=01;31`.
 * Entries without a plain SGR code are skipped.
 */
export function parseLsColors(value: string): LsColors {
  const types = new Map<string, string>();
  const suffixes: Array<{ suffix: string; code: string }> = [];

  for (const item of value.split(':')) {
    const eq = item.indexOf('=');
    if (eq <= 0) continue;
    const key = item.slice(0, eq);
    const code = item.slice(eq + 1);
    if (!SGR_CODE.test(code)) continue;

    if (key.startsWith('*')) {
      if (key.length > 1) suffixes.push({ suffix: key.slice(1).toLowerCase(), code });
    } else {
      types.set(key, code);
    }
  }

  // Longest suffix wins
  suffixes.sort((a, b) => b.suffix.length - a.suffix.length);
  return { types, suffixes };
}

const LS_KEYS: Record<ColorRole, readonly string[]> = {
  directory: ['di'],
  symlink: ['ln'],
  orphan: ['or', 'ln'],
  executable: ['ex', 'fi'],
  socket: ['so'],
  fifo: ['pi'],
  device: ['cd', 'bd'],
  file: ['fi'],
};

export class LsColorsColorizer implements Colorizer {
  constructor(private readonly colors: LsColors) {}

  paint(text: string, role: ColorRole, name: string): string {
    const code = this.codeFor(role, name);
    return code === undefined || /^0+$/.test(code) ? text : `\x1b[${code}m${text}\x1b[0m`;
  }

  private codeFor(role: ColorRole, name: string): string | undefined {
    if (role === 'file') {
      const lower = name.toLowerCase();
      const match = this.colors.suffixes.find(({ suffix }) => lower.endsWith(suffix));
      if (match) return match.code;
    }
    for (const key of LS_KEYS[role]) {
      const code = this.colors.types.get(key);
      if (code !== undefined) return code;
    }
    return undefined;
  }
}

// ---------------------------------------------------------------------------
// Built-in chalk palette
// ---------------------------------------------------------------------------

type StyleKey = Exclude<ColorRole, 'file'> | ColorCategory;

function builtinStyles(c: chalk.Chalk): Record<StyleKey, chalk.Chalk> {
  return {
    directory: c.bold.blue,
    symlink: c.bold.cyan,
    orphan: c.bold.red,
    executable: c.bold.green,
    socket: c.bold.magenta,
    fifo: c.yellow,
    device: c.bold.yellow,
    archive: c.bold.red,
    image: c.bold.magenta,
    video: c.bold.magenta,
    audio: c.cyan,
    document: c.blue,
  };
}

export class ChalkColorizer implements Colorizer {
  private readonly styles: Record<StyleKey, chalk.Chalk>;

  /**
   * Uses its own chalk instance at 16-color level, so output does not depend
   * on chalk's terminal detection.
   */
  constructor(instance: chalk.Chalk = new chalk.Instance({ level: 1 })) {
    this.styles = builtinStyles(instance);
  }

  paint(text: string, role: ColorRole, name: string): string {
    if (role !== 'file') {
      return this.styles[role](text);
    }
    const category = categoryOf(name);
    return category === undefined ? text : this.styles[category](text);
  }
}

/**
 * Picks the colorizer for a config.
 */
export function createColorizer(
  config: Pick<TreeConfig, 'colorMode' | 'lsColors' | 'outputFile'>,
  terminal: { isTTY: boolean }
): Colorizer {
  if (!resolveColorEnabled(config.colorMode, { outputFile: config.outputFile, isTTY: terminal.isTTY })) {
    return PLAIN_COLORIZER;
  }
  if (config.lsColors !== undefined && config.lsColors.length > 0) {
    return new LsColorsColorizer(parseLsColors(config.lsColors));
  }
  return new ChalkColorizer();
}
