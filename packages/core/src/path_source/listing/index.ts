export { ListingPathSource } from './listing_path_source';
export type { ListingInput } from './listing_path_source';
export { readListings, STDIN_LABEL } from './listing_reader';
export type { ListingFileReader } from './listing_reader';
export {
  parseListing,
  detectListingFormat,
  parseModeString,
  toListingLines,
  toSegments,
} from './listing_parser';
export type { ListingFormat, ListingRecord } from './listing_parser';
