/**
 * Listing Parser
 *
 * Turns the text of a path listing into records. Two formats are accepted:
 * plain paths (one per line, trailing '/' marks a directory) and the verbose
 * output of `tar -tvf`, which also carries mode, owner/group, size and date.
 * Both the GNU layout (`mode owner/group size YYYY-MM-DD HH:MM path`) and the
 * BSD one (`mode links owner group size Mon DD HH:MM|YYYY path`) are read.
 *
 * @module path_source/listing/listing_parser
 */

import type { EntryMetadata } from '../../types/entry';

export type ListingFormat = 'simple' | 'tar';

/**
 * One parsed listing line.
 */
export interface ListingRecord {
  /** Path segments, without empty or '.' segments */
  segments: string[];
  /** Explicitly marked as a directory (trailing '/' or a 'd' mode) */
  isDirectory: boolean;
  isSymlink: boolean;
  linkTarget?: string;
  metadata?: EntryMetadata;
}

const MODE_FIELD = /^[-dlbcps][-rwxsStT]{9}$/;
const GNU_TAR_LINE = /^([-dlbcps][-rwxsStT]{9})\s+(\S+)\s+(\S+)\s+(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2})(?::(\d{2}))?\s+(.+)$/;
const BSD_TAR_LINE = /^([-dlbcps][-rwxsStT]{9})\s+\d+\s+(\S+)\s+(\S+)\s+(\S+)\s+([A-Z][a-z]{2})\s+(\d{1,2})\s+(?:(\d{1,2}):(\d{2})|(\d{4}))\s+(.+)$/;
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

interface TarFields {
  modeString: string;
  owner: string;
  group?: string;
  sizeField: string;
  mtime: Date;
  rest: string;
}

/**
 * Splits listing text into trimmed, non-blank lines.
 */
export function toListingLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Detects tar verbose output by looking at the first five lines.
 */
export function detectListingFormat(lines: readonly string[]): ListingFormat {
  const looksLikeTar = lines.slice(0, 5).some(line => {
    const fields = line.split(/\s+/);
    return fields.length >= 6 && MODE_FIELD.test(fields[0] ?? '');
  });
  return looksLikeTar ? 'tar' : 'simple';
}

/**
 * Splits a path on '/' and drops empty and '.' segments.
 */
export function toSegments(path: string): string[] {
  return path.split('/').filter(segment => segment.length > 0 && segment !== '.');
}

/**
 * Converts an `ls`-style mode string (e.g. "-rwsr-xr-t") into permission and
 * special bits. The file type character is ignored.
 */
export function parseModeString(modeString: string): number {
  let mode = 0;
  const bit = (index: number, expected: string, value: number): void => {
    if (modeString.charAt(index) === expected) mode |= value;
  };

  bit(1, 'r', 0o400);
  bit(2, 'w', 0o200);
  bit(4, 'r', 0o040);
  bit(5, 'w', 0o020);
  bit(7, 'r', 0o004);
  bit(8, 'w', 0o002);

  const execute = (index: number, executeBit: number, specialBit: number, lower: string, upper: string): void => {
    const ch = modeString.charAt(index);
    if (ch === 'x') mode |= executeBit;
    if (ch === lower) mode |= executeBit | specialBit;
    if (ch === upper) mode |= specialBit;
  };
  execute(3, 0o100, 0o4000, 's', 'S');
  execute(6, 0o010, 0o2000, 's', 'S');
  execute(9, 0o001, 0o1000, 't', 'T');

  return mode;
}

function parseSimpleLine(line: string): ListingRecord | null {
  const isDirectory = line.endsWith('/');
  const segments = toSegments(line);
  if (segments.length === 0) {
    return null;
  }
  return { segments, isDirectory, isSymlink: false };
}

function matchGnuLine(line: string): TarFields | null {
  const match = GNU_TAR_LINE.exec(line);
  if (!match) {
    return null;
  }

  const [, modeString = '', ownership = '', sizeField = '', year, month, day, hour, minute, second, rest = ''] = match;
  const slash = ownership.indexOf('/');
  const fields: TarFields = {
    modeString,
    owner: slash >= 0 ? ownership.slice(0, slash) : ownership,
    sizeField,
    mtime: new Date(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second ?? '0')),
    rest,
  };
  if (slash >= 0) {
    fields.group = ownership.slice(slash + 1);
  }
  return fields;
}

/**
 * BSD tar prints a year only for old files; otherwise the date falls within
 * the last year, like `ls -l`.
 */
function matchBsdLine(line: string, now: Date): TarFields | null {
  const match = BSD_TAR_LINE.exec(line);
  if (!match) {
    return null;
  }

  const [, modeString = '', owner = '', group = '', sizeField = '', monthName = '', day, hour, minute, year, rest = ''] = match;
  const month = MONTHS.indexOf(monthName);
  if (month < 0) {
    return null;
  }

  let mtime: Date;
  if (year !== undefined) {
    mtime = new Date(Number(year), month, Number(day));
  } else {
    mtime = new Date(now.getFullYear(), month, Number(day), Number(hour), Number(minute));
    if (mtime.getTime() > now.getTime()) {
      mtime.setFullYear(now.getFullYear() - 1);
    }
  }
  return { modeString, owner, group, sizeField, mtime, rest };
}

function parseTarLine(line: string, now: Date): ListingRecord | null {
  const fields = matchGnuLine(line) ?? matchBsdLine(line, now);
  if (!fields) {
    const [modeString = ''] = line.split(/\s+/, 1);
    if (!MODE_FIELD.test(modeString)) {
      return parseSimpleLine(line);
    }
    // Unknown date layout: the path is the last field
    const path = line.slice(line.search(/\S+$/));
    const segments = toSegments(path);
    if (segments.length === 0) {
      return null;
    }
    return {
      segments,
      isDirectory: modeString.charAt(0) === 'd' || path.endsWith('/'),
      isSymlink: false,
      metadata: { mode: parseModeString(modeString) },
    };
  }

  const { modeString, rest } = fields;
  const typeChar = modeString.charAt(0);
  const isSymlink = typeChar === 'l';

  let path = rest;
  let linkTarget: string | undefined;
  if (isSymlink) {
    const arrow = rest.indexOf(' -> ');
    if (arrow >= 0) {
      path = rest.slice(0, arrow);
      linkTarget = rest.slice(arrow + 4);
    }
  }

  const segments = toSegments(path);
  if (segments.length === 0) {
    return null;
  }

  const size = /^\d+$/.test(fields.sizeField) ? Number(fields.sizeField) : undefined;
  const record: ListingRecord = {
    segments,
    isDirectory: typeChar === 'd' || path.endsWith('/'),
    isSymlink,
    metadata: {
      mode: parseModeString(modeString),
      owner: fields.owner,
      ...(fields.group !== undefined && { group: fields.group }),
      ...(size !== undefined && { size }),
      mtimeMs: fields.mtime.getTime(),
    },
  };
  if (linkTarget !== undefined) {
    record.linkTarget = linkTarget;
  }
  return record;
}

/**
 * Parses listing text into records, in input order.
 */
export function parseListing(text: string, now: Date = new Date()): ListingRecord[] {
  const lines = toListingLines(text);
  const isTar = detectListingFormat(lines) === 'tar';

  const records: ListingRecord[] = [];
  for (const line of lines) {
    const record = isTar ? parseTarLine(line, now) : parseSimpleLine(line);
    if (record) {
      records.push(record);
    }
  }
  return records;
}
