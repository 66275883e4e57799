import { LineFormatter, LINE_NOTES } from './line_formatter';
import { LsColorsColorizer, parseLsColors } from './colorizer';
import { buildPrefix, ASCII_GLYPHS, UNICODE_GLYPHS } from './glyphs';
import { createTreeConfig } from '../config/tree_config';
import type { TreeConfigInput } from '../config/tree_config.types';
import { IdentityResolver } from '../identity/identity_resolver';
import type { Entry } from '../types/entry';

function entry(overrides: Partial<Entry> & Pick<Entry, 'name'>): Entry {
  return { path: `root/${overrides.name}`, kind: 'file', depth: 1, isLast: false, ...overrides };
}

function formatter(input: TreeConfigInput = {}): LineFormatter {
  return new LineFormatter(createTreeConfig(input), {
    identity: new IdentityResolver({ readFile: () => 'dev:x:1000:1000::/home/dev:/bin/sh' }),
  });
}

describe('buildPrefix()', () => {
  it('should draw one column per ancestor and a tee or corner', () => {
    expect(buildPrefix(UNICODE_GLYPHS, [], false)).toBe('├── ');
    expect(buildPrefix(UNICODE_GLYPHS, [true, false], true)).toBe('│       └── ');
    expect(buildPrefix(ASCII_GLYPHS, [true], false)).toBe('|   |-- ');
    expect(buildPrefix(ASCII_GLYPHS, [], true)).toBe('`-- ');
  });
});

describe('LineFormatter', () => {
  describe('formatRoot()', () => {
    it('should print the location as given', () => {
      expect(formatter().formatRoot('./src/', undefined)).toBe('./src/');
    });

    it('should append a note', () => {
      expect(formatter().formatRoot('missing', undefined, LINE_NOTES.openError)).toBe('missing [error opening dir]');
    });

    it('should paint a directory root as a directory', () => {
      const lineFormatter = new LineFormatter(createTreeConfig({ colorMode: 'always' }), {
        colorizer: new LsColorsColorizer(parseLsColors('di=34:ln=36')),
      });
      const root = entry({ name: 'link', path: 'link', kind: 'symlink', targetKind: 'directory', depth: 0 });

      expect(lineFormatter.formatRoot('link', root)).toBe('\x1b[34mlink\x1b[0m');
    });
  });

  describe('formatEntry()', () => {
    it('should prefix names with tree glyphs', () => {
      const lineFormatter = formatter();

      expect(lineFormatter.formatEntry(entry({ name: 'a.txt' }), [])).toBe('├── a.txt');
      expect(lineFormatter.formatEntry(entry({ name: 'z.txt', isLast: true }), [false])).toBe('    └── z.txt');
    });

    it('should use ASCII glyphs when asked', () => {
      expect(formatter({ asciiGlyphs: true }).formatEntry(entry({ name: 'a', isLast: true }), [true])).toBe('|   `-- a');
    });

    it('should print the full path without indentation', () => {
      expect(formatter({ fullPath: true }).formatEntry(entry({ name: 'a.ts', path: 'src/lib/a.ts', depth: 2 }), [true]))
        .toBe('src/lib/a.ts');
    });

    it('should drop the prefix with noIndent', () => {
      expect(formatter({ noIndent: true }).formatEntry(entry({ name: 'a.ts', depth: 3 }), [true, true])).toBe('a.ts');
    });

    it('should render decorations in fixed order', () => {
      const lineFormatter = formatter({ showPermissions: true, showOwner: true, showGroup: true, sizeMode: 'bytes' });
      const file = entry({ name: 'a.txt', metadata: { mode: 0o100644, size: 42, uid: 1000, gid: 7 } });

      expect(lineFormatter.formatEntry(file, [])).toBe('├── [-rw-r--r-- dev 7 42]  a.txt');
    });

    it('should prefer names already known to the source', () => {
      const lineFormatter = formatter({ showOwner: true, showGroup: true });
      const file = entry({ name: 'a', metadata: { owner: 'alice', group: 'staff', uid: 1000 } });

      expect(lineFormatter.formatEntry(file, [])).toBe('├── [alice staff]  a');
    });

    it('should print dashes for unavailable metadata', () => {
      const lineFormatter = formatter({ showPermissions: true, sizeMode: 'human', showDate: true });

      expect(lineFormatter.formatEntry(entry({ name: 'a' }), [])).toBe('├── [- - -]  a');
    });

    it('should print human sizes and dates', () => {
      const lineFormatter = formatter({ sizeMode: 'human', showDate: true });
      const file = entry({ name: 'big.iso', metadata: { size: 1536, mtimeMs: new Date(2024, 2, 9, 18, 45).getTime() } });

      expect(lineFormatter.formatEntry(file, [])).toBe('├── [2K 2024-03-09 18:45]  big.iso');
    });

    it('should append type indicators', () => {
      const lineFormatter = formatter({ typeIndicators: true });

      expect(lineFormatter.formatEntry(entry({ name: 'src', kind: 'directory' }), [])).toBe('├── src/');
      expect(lineFormatter.formatEntry(entry({ name: 'run.sh', metadata: { mode: 0o100755 } }), [])).toBe('├── run.sh*');
      expect(lineFormatter.formatEntry(entry({ name: 'sock', kind: 'socket' }), [])).toBe('├── sock=');
    });

    it('should show symlink targets with the target indicator', () => {
      const lineFormatter = formatter({ typeIndicators: true });
      const live = entry({ name: 'up', kind: 'symlink', linkTarget: '../lib', targetKind: 'directory' });
      const broken = entry({ name: 'dead', kind: 'symlink', linkTarget: 'nowhere', isLast: true });

      expect(lineFormatter.formatEntry(live, [])).toBe('├── up -> ../lib/');
      expect(lineFormatter.formatEntry(broken, [])).toBe('└── dead -> nowhere');
    });

    it('should append notes after the name', () => {
      const dir = entry({ name: 'big', kind: 'directory', isLast: true });

      expect(formatter().formatEntry(dir, [], LINE_NOTES.entryLimit(12)))
        .toBe('└── big [12 entries exceeds filelimit, not opening dir]');
    });

    it('should paint names and targets by role', () => {
      const lineFormatter = new LineFormatter(createTreeConfig({ colorMode: 'always' }), {
        colorizer: new LsColorsColorizer(parseLsColors('di=34:ln=36')),
      });
      const link = entry({ name: 'up', kind: 'symlink', linkTarget: 'lib', targetKind: 'directory' });

      expect(lineFormatter.formatEntry(link, [])).toBe('├── \x1b[36mup\x1b[0m -> \x1b[34mlib\x1b[0m');
    });
  });
});
