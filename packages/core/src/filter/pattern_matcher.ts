/**
 * Wildcard name matching for include/exclude patterns.
 *
 * Supports `*`, `?`, `[...]`, `[^...]` / `[!...]` with ranges, and a
 * top-level `|` separating alternatives. Matching is done by picomatch on the
 * entry name only; braces, extglobs and leading-`!` negation are disabled so
 * those characters stay literal.
 *
 * @module filter/pattern_matcher
 */

import picomatch from 'picomatch';

export type NameMatcher = (name: string) => boolean;

const PICOMATCH_OPTIONS: picomatch.PicomatchOptions = {
  dot: true,
  nobrace: true,
  noextglob: true,
  nonegate: true,
  noglobstar: true,
};

/**
 * Error thrown when a wildcard pattern cannot be compiled.
 */
export class PatternSyntaxError extends Error {
  constructor(
    public readonly pattern: string,
    reason: string
  ) {
    super(`Invalid pattern "${pattern}": ${reason}`);
    this.name = 'PatternSyntaxError';
  }
}

/**
 * Splits a pattern on `|` characters that sit outside a bracket class.
 * Escaped characters are kept with their backslash. Empty alternatives are dropped.
 *
 * @example
 * splitAlternatives('*.ts|*.js')   // ['*.ts', '*.js']
 * splitAlternatives('[a|b]*|x')    // ['[a|b]*', 'x']
 */
export function splitAlternatives(pattern: string): string[] {
  const alternatives: string[] = [];
  let current = '';
  let classOpenedAt = -1;

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);

    if (ch === '\\' && i + 1 < pattern.length) {
      current += ch + pattern.charAt(i + 1);
      i++;
      continue;
    }

    if (classOpenedAt >= 0) {
      // A ']' right after '[' or '[^' is a literal member, not the close
      const marker = pattern.charAt(classOpenedAt + 1);
      const bodyStart = marker === '^' || marker === '!' ? classOpenedAt + 2 : classOpenedAt + 1;
      if (ch === ']' && i > bodyStart) {
        classOpenedAt = -1;
      }
      current += ch;
      continue;
    }

    if (ch === '[') {
      classOpenedAt = i;
    } else if (ch === '|') {
      alternatives.push(current);
      current = '';
      continue;
    }
    current += ch;
  }

  alternatives.push(current);
  return alternatives.filter(alternative => alternative.length > 0);
}

/**
 * Rewrites shell-style `[!...]` negation to the `[^...]` form picomatch
 * understands in its default mode.
 */
function normalizeNegatedClasses(alternative: string): string {
  return alternative.replace(/(^|[^\\])\[!/g, '$1[^');
}

/**
 * Compiles a wildcard pattern into a name predicate.
 * An entry matches when any alternative matches.
 *
 * @throws PatternSyntaxError when no alternative remains or picomatch rejects one
 */
export function compileWildcard(pattern: string): NameMatcher {
  const alternatives = splitAlternatives(pattern);
  if (alternatives.length === 0) {
    throw new PatternSyntaxError(pattern, 'no alternatives');
  }

  const matchers = alternatives.map(alternative => {
    try {
      return picomatch(normalizeNegatedClasses(alternative), PICOMATCH_OPTIONS);
    } catch (error) {
      throw new PatternSyntaxError(pattern, error instanceof Error ? error.message : String(error));
    }
  });

  return (name: string) => matchers.some(isMatch => isMatch(name));
}
