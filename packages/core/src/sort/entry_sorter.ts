/**
 * Entry Sorter
 *
 * Orders one directory's filtered children. The primary key comes from the
 * config, then the result is optionally reversed, then directories are
 * moved in front with a stable partition.
 *
 * @module sort/entry_sorter
 */

import type { SortKey, TreeConfig } from '../config/tree_config.types';
import { isDirectoryLike } from '../types/entry';
import type { Entry } from '../types/entry';

export type EntryComparator = (a: Entry, b: Entry) => number;

/**
 * Case-sensitive UTF-16 code unit order.
 */
export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

const DIGIT_RUN = /(\d+)/;

function compareDigitRuns(a: string, b: string): number {
  const left = a.replace(/^0+(?=\d)/, '');
  const right = b.replace(/^0+(?=\d)/, '');
  if (left.length !== right.length) {
    return left.length - right.length;
  }
  return compareNames(left, right);
}

/**
 * Natural order: digit runs compare numerically, everything else by code
 * unit. Names equal under that order fall back to plain name order, so
 * "a01" and "a1" still have a fixed order.
 *
 * @example
 * ['v10', 'v2', 'v1'].sort(compareVersions) // ['v1', 'v2', 'v10']
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split(DIGIT_RUN);
  const right = b.split(DIGIT_RUN);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? '';
    const y = right[i] ?? '';
    // split() with a capture group puts digit runs at odd indexes
    const order = i % 2 === 1 ? compareDigitRuns(x, y) : compareNames(x, y);
    if (order !== 0) return order;
  }
  if (left.length !== right.length) {
    return left.length - right.length;
  }
  return compareNames(a, b);
}

function compareTimes(a: Entry, b: Entry): number {
  const left = a.metadata?.mtimeMs ?? 0;
  const right = b.metadata?.mtimeMs ?? 0;
  return left !== right ? left - right : compareNames(a.name, b.name);
}

const COMPARATORS: Record<SortKey, EntryComparator> = {
  name: (a, b) => compareNames(a.name, b.name),
  time: compareTimes,
  version: (a, b) => compareVersions(a.name, b.name),
};

/**
 * Sorts children according to sortKey, reverse and directoriesFirst.
 * Returns a new array; the input is left untouched.
 */
export function sortEntries(
  entries: readonly Entry[],
  config: Pick<TreeConfig, 'sortKey' | 'reverse' | 'directoriesFirst'>
): Entry[] {
  const sorted = [...entries].sort(COMPARATORS[config.sortKey]);
  if (config.reverse) {
    sorted.reverse();
  }
  if (!config.directoriesFirst) {
    return sorted;
  }
  return [
    ...sorted.filter(entry => isDirectoryLike(entry)),
    ...sorted.filter(entry => !isDirectoryLike(entry)),
  ];
}
