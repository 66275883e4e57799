import * as fs from 'fs';
import { toPathSourceError } from '../path_source.errors';
import type { ListingInput } from './listing_path_source';

/** Label used for the listing read from standard input */
export const STDIN_LABEL = '.';

/**
 * Reads a listing location. File descriptor 0 means standard input.
 */
export type ListingFileReader = (location: string | number) => string;

const readWithFs: ListingFileReader = location => fs.readFileSync(location, 'utf-8');

function isStdinLocation(location: string): boolean {
  return location === '-' || location === STDIN_LABEL;
}

/**
 * Reads every listing location synchronously. No location, "-" or "." reads
 * standard input. A location that cannot be read becomes an error input so
 * the remaining listings are still rendered.
 */
export function readListings(
  locations: readonly string[],
  readFile: ListingFileReader = readWithFs
): ListingInput[] {
  const targets = locations.length > 0 ? locations : [STDIN_LABEL];

  return targets.map(location => {
    const stdin = isStdinLocation(location);
    const label = stdin ? STDIN_LABEL : location;
    try {
      return { label, text: readFile(stdin ? 0 : location) };
    } catch (error) {
      return { label, error: toPathSourceError(error, label) };
    }
  });
}
