/**
 * Glyph sets for the branch prefix. Every glyph is four columns wide.
 */
export interface GlyphSet {
  /** Branch to a sibling that is followed by more siblings */
  tee: string;
  /** Branch to the last sibling */
  corner: string;
  /** Ancestor column with more siblings pending */
  vertical: string;
  /** Ancestor column with nothing pending */
  blank: string;
}

export const UNICODE_GLYPHS: GlyphSet = Object.freeze({
  tee: '├── ',
  corner: '└── ',
  vertical: '│   ',
  blank: '    ',
});

export const ASCII_GLYPHS: GlyphSet = Object.freeze({
  tee: '|-- ',
  corner: '`-- ',
  vertical: '|   ',
  blank: '    ',
});

export function selectGlyphs(asciiGlyphs: boolean): GlyphSet {
  return asciiGlyphs ? ASCII_GLYPHS : UNICODE_GLYPHS;
}

/**
 * Builds the prefix for an entry from its ancestors' "more siblings pending"
 * bits (outermost first, root excluded) and whether it is the last sibling.
 */
export function buildPrefix(glyphs: GlyphSet, ancestorsContinue: readonly boolean[], isLast: boolean): string {
  const columns = ancestorsContinue.map(continues => (continues ? glyphs.vertical : glyphs.blank));
  return columns.join('') + (isLast ? glyphs.corner : glyphs.tee);
}
