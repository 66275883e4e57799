/**
 * LineFormatter - renders one output line per entry
 *
 * Layout:
 *   <prefix>[<perms> <owner> <group> <size> <date>]  <name><indicator>[ -> <target><indicator>][ <note>]
 *
 * The bracket only appears when a decoration is enabled. Missing metadata
 * renders as '-'.
 *
 * @module render/line_formatter
 */

import type { TreeConfig } from '../config/tree_config.types';
import { IdentityResolver } from '../identity/identity_resolver';
import { isDirectoryLike } from '../types/entry';
import type { Entry, EntryMetadata } from '../types/entry';
import { colorRole, PLAIN_COLORIZER, targetColorRole } from './colorizer';
import type { Colorizer } from './colorizer';
import { formatDate, formatHumanSize, formatPermissions, kindIndicator, typeIndicator } from './format_utils';
import { buildPrefix, selectGlyphs } from './glyphs';
import type { GlyphSet } from './glyphs';

const MISSING = '-';

/** Notes appended after a name */
export const LINE_NOTES = {
  openError: '[error opening dir]',
  recursive: '[recursive, not followed]',
  entryLimit: (count: number): string => `[${count} entries exceeds filelimit, not opening dir]`,
} as const;

export interface LineFormatterOptions {
  colorizer?: Colorizer;
  /** Resolves uid/gid when the source did not provide names */
  identity?: IdentityResolver;
}

export class LineFormatter {
  private readonly glyphs: GlyphSet;
  private readonly colorizer: Colorizer;
  private readonly identity: IdentityResolver;
  private readonly decorated: boolean;

  constructor(
    private readonly config: TreeConfig,
    options: LineFormatterOptions = {}
  ) {
    this.glyphs = selectGlyphs(config.asciiGlyphs);
    this.colorizer = options.colorizer ?? PLAIN_COLORIZER;
    this.identity = options.identity ?? new IdentityResolver();
    this.decorated = config.showPermissions || config.showOwner || config.showGroup ||
      config.sizeMode !== 'off' || config.showDate;
  }

  /**
   * Root line: the location as given, painted as a directory when it is one.
   */
  formatRoot(location: string, entry: Entry | undefined, note?: string): string {
    let text = location;
    if (entry) {
      const role = isDirectoryLike(entry) ? 'directory' : colorRole(entry);
      text = this.colorizer.paint(location, role, entry.name);
    }
    return note === undefined ? text : `${text} ${note}`;
  }

  /**
   * Entry line.
   * @param ancestorsContinue "more siblings pending" bit of every ancestor below the root
   */
  formatEntry(entry: Entry, ancestorsContinue: readonly boolean[], note?: string): string {
    const prefix = this.config.noIndent || this.config.fullPath
      ? ''
      : buildPrefix(this.glyphs, ancestorsContinue, entry.isLast);
    const decorations = this.decorated ? `[${this.decorationFields(entry).join(' ')}]  ` : '';
    const displayName = this.config.fullPath ? entry.path : entry.name;

    let line = prefix + decorations + this.colorizer.paint(displayName, colorRole(entry), entry.name);

    if (entry.kind === 'symlink') {
      const target = entry.linkTarget ?? '';
      line += ` -> ${this.colorizer.paint(target, targetColorRole(entry.targetKind), target)}`;
      if (this.config.typeIndicators) line += kindIndicator(entry.targetKind);
    } else if (this.config.typeIndicators) {
      line += typeIndicator(entry);
    }

    return note === undefined ? line : `${line} ${note}`;
  }

  private decorationFields(entry: Entry): string[] {
    const metadata: EntryMetadata = entry.metadata ?? {};
    const fields: string[] = [];

    if (this.config.showPermissions) {
      fields.push(metadata.mode === undefined ? MISSING : formatPermissions(entry.kind, metadata.mode));
    }
    if (this.config.showOwner) {
      fields.push(metadata.owner ?? (metadata.uid === undefined ? MISSING : this.identity.userName(metadata.uid)));
    }
    if (this.config.showGroup) {
      fields.push(metadata.group ?? (metadata.gid === undefined ? MISSING : this.identity.groupName(metadata.gid)));
    }
    if (this.config.sizeMode !== 'off') {
      if (metadata.size === undefined) {
        fields.push(MISSING);
      } else {
        fields.push(this.config.sizeMode === 'human' ? formatHumanSize(metadata.size) : String(metadata.size));
      }
    }
    if (this.config.showDate) {
      fields.push(metadata.mtimeMs === undefined ? MISSING : formatDate(metadata.mtimeMs));
    }
    return fields;
  }
}
