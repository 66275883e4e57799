/**
 * Render Module
 *
 * Glyph prefixes, decoration formatting and colorization of tree lines.
 *
 * @module render
 */

export { LineFormatter, LINE_NOTES } from './line_formatter';
export type { LineFormatterOptions } from './line_formatter';
export { ASCII_GLYPHS, UNICODE_GLYPHS, buildPrefix, selectGlyphs } from './glyphs';
export type { GlyphSet } from './glyphs';
export {
  ChalkColorizer,
  LsColorsColorizer,
  PLAIN_COLORIZER,
  categoryOf,
  colorRole,
  createColorizer,
  extensionOf,
  parseLsColors,
  resolveColorEnabled,
  targetColorRole,
} from './colorizer';
export type { ColorCategory, ColorRole, Colorizer, LsColors } from './colorizer';
export {
  formatDate,
  formatHumanSize,
  formatPermissions,
  isExecutable,
  kindIndicator,
  typeIndicator,
} from './format_utils';
