/**
 * Formatting helpers for line decorations.
 *
 * @module render/format_utils
 */

import type { Entry, EntryKind } from '../types/entry';

const S_IFMT = 0o170000;
const S_IFBLK = 0o060000;

const SIZE_UNITS = ['', 'K', 'M', 'G', 'T', 'P', 'E'];

/**
 * Formats a byte count in 1024-based units, rounded to the nearest integer.
 * Plain bytes carry no suffix.
 *
 * @example
 * formatHumanSize(512)     // '512'
 * formatHumanSize(1536)    // '2K'
 * formatHumanSize(3145728) // '3M'
 */
export function formatHumanSize(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${Math.round(value)}${SIZE_UNITS[unit] ?? ''}`;
}

function typeCharacter(kind: EntryKind, mode: number): string {
  switch (kind) {
    case 'directory':
      return 'd';
    case 'symlink':
      return 'l';
    case 'socket':
      return 's';
    case 'fifo':
      return 'p';
    case 'device':
      return (mode & S_IFMT) === S_IFBLK ? 'b' : 'c';
    default:
      return '-';
  }
}

function executeCharacter(mode: number, executeBit: number, specialBit: number, marker: string): string {
  const execute = (mode & executeBit) !== 0;
  if ((mode & specialBit) !== 0) {
    return execute ? marker : marker.toUpperCase();
  }
  return execute ? 'x' : '-';
}

/**
 * Renders an `ls`-style ten character permission string, including
 * setuid, setgid and sticky markers.
 *
 * @example
 * formatPermissions('file', 0o100755)    // '-rwxr-xr-x'
 * formatPermissions('directory', 0o1777) // 'drwxrwxrwt'
 */
export function formatPermissions(kind: EntryKind, mode: number): string {
  const flag = (bit: number, ch: string): string => ((mode & bit) !== 0 ? ch : '-');
  return [
    typeCharacter(kind, mode),
    flag(0o400, 'r'),
    flag(0o200, 'w'),
    executeCharacter(mode, 0o100, 0o4000, 's'),
    flag(0o040, 'r'),
    flag(0o020, 'w'),
    executeCharacter(mode, 0o010, 0o2000, 's'),
    flag(0o004, 'r'),
    flag(0o002, 'w'),
    executeCharacter(mode, 0o001, 0o1000, 't'),
  ].join('');
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a timestamp as local `YYYY-MM-DD HH:MM`.
 */
export function formatDate(mtimeMs: number): string {
  const date = new Date(mtimeMs);
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/**
 * True for regular files with any execute bit set.
 */
export function isExecutable(entry: Entry): boolean {
  const mode = entry.metadata?.mode;
  return entry.kind === 'file' && mode !== undefined && (mode & 0o111) !== 0;
}

/**
 * Classification suffix for a kind: '/' directory, '=' socket, '|' FIFO.
 * Executable regular files get '*' through {@link typeIndicator}.
 */
export function kindIndicator(kind: EntryKind | undefined): string {
  switch (kind) {
    case 'directory':
      return '/';
    case 'socket':
      return '=';
    case 'fifo':
      return '|';
    default:
      return '';
  }
}

export function typeIndicator(entry: Entry): string {
  return isExecutable(entry) ? '*' : kindIndicator(entry.kind);
}
