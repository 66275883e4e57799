export { EntryFilter } from './entry_filter';
export { compileWildcard, splitAlternatives, PatternSyntaxError } from './pattern_matcher';
export type { NameMatcher } from './pattern_matcher';
