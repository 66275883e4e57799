/**
 * IdentityResolver - maps numeric uid/gid to account names
 *
 * Reads /etc/passwd and /etc/group once, on first lookup. Ids missing from
 * those files, or hosts without them, fall back to the number itself.
 *
 * @module identity
 */

import * as fs from 'fs';

export interface IdentityResolverOptions {
  /** Reads an account database; defaults to fs.readFileSync */
  readFile?: (path: string) => string;
  passwdPath?: string;
  groupPath?: string;
}

/**
 * Parses colon-separated account lines into an id → name map. The id is the
 * third field in both passwd and group formats.
 */
export function parseAccountDatabase(text: string): Map<number, string> {
  const names = new Map<number, string>();
  for (const line of text.split('\n')) {
    if (line.startsWith('#')) continue;
    const [name, , id] = line.split(':');
    if (!name || id === undefined || !/^\d+$/.test(id)) continue;
    const numericId = Number(id);
    // First entry wins, like getpwuid
    if (!names.has(numericId)) {
      names.set(numericId, name);
    }
  }
  return names;
}

export class IdentityResolver {
  private readonly readFile: (path: string) => string;
  private readonly passwdPath: string;
  private readonly groupPath: string;
  private users: Map<number, string> | undefined;
  private groups: Map<number, string> | undefined;

  constructor(options: IdentityResolverOptions = {}) {
    this.readFile = options.readFile ?? (path => fs.readFileSync(path, 'utf-8'));
    this.passwdPath = options.passwdPath ?? '/etc/passwd';
    this.groupPath = options.groupPath ?? '/etc/group';
  }

  userName(uid: number): string {
    this.users ??= this.load(this.passwdPath);
    return this.users.get(uid) ?? String(uid);
  }

  groupName(gid: number): string {
    this.groups ??= this.load(this.groupPath);
    return this.groups.get(gid) ?? String(gid);
  }

  private load(path: string): Map<number, string> {
    try {
      return parseAccountDatabase(this.readFile(path));
    } catch {
      return new Map();
    }
  }
}
