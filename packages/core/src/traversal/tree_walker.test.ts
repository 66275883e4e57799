/**
 * TreeWalker Tests
 *
 * Listing-backed walks run fully in memory; symlink behaviour runs against a
 * temp directory with real links.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TreeWalker } from './tree_walker';
import { createTreeConfig } from '../config/tree_config';
import type { TreeConfigInput } from '../config/tree_config.types';
import { MemorySink } from '../output_sink/memory_sink';
import { FsPathSource } from '../path_source/fs/fs_path_source';
import { ListingPathSource } from '../path_source/listing/listing_path_source';
import type { PathSource, RootResolution } from '../path_source/path_source';
import { PathSourceError } from '../path_source/path_source.errors';
import type { Entry } from '../types/entry';

function walkListing(text: string, input: TreeConfigInput = {}): { lines: string[]; walker: TreeWalker; sink: MemorySink } {
  const sink = new MemorySink();
  const walker = new TreeWalker(createTreeConfig(input), { source: ListingPathSource.fromText(text), sink });
  walker.walk();
  return { lines: sink.lines, walker, sink };
}

/**
 * Listing source that fails to open selected directories.
 */
class FailingSource implements PathSource {
  constructor(
    private readonly inner: PathSource,
    private readonly failing: ReadonlySet<string>,
    private readonly error: (path: string) => Error = path =>
      new PathSourceError(`Permission denied: ${path}`, 'PERMISSION_DENIED', path)
  ) {}

  roots(): RootResolution[] {
    return this.inner.roots();
  }

  isTraversable(entry: Entry): boolean {
    return this.inner.isTraversable(entry);
  }

  readChildren(entry: Entry): Entry[] {
    if (this.failing.has(entry.path)) {
      throw this.error(entry.path);
    }
    return this.inner.readChildren(entry);
  }

  realPath(entry: Entry): string | undefined {
    return this.inner.realPath(entry);
  }
}

describe('TreeWalker', () => {
  describe('rendering', () => {
    it('should render a small tree with the summary', () => {
      const { lines } = walkListing('a/\na/c.txt\nb.txt');

      expect(lines).toEqual([
        '.',
        '├── a',
        '│   └── c.txt',
        '└── b.txt',
        '',
        '1 directory, 2 files',
      ]);
    });

    it('should draw blank columns under last siblings', () => {
      const { lines } = walkListing('a/b/c\na/d');

      expect(lines).toEqual([
        '.',
        '└── a',
        '    ├── b',
        '    │   └── c',
        '    └── d',
        '',
        '2 directories, 2 files',
      ]);
    });

    it('should render every root in order', () => {
      const sink = new MemorySink();
      const source = new ListingPathSource([
        { label: 'one', text: 'a' },
        { label: 'two', text: 'b' },
      ]);
      new TreeWalker(createTreeConfig(), { source, sink }).walk();

      expect(sink.lines).toEqual(['one', '└── a', 'two', '└── b', '', '0 directories, 2 files']);
    });

    it('should leave out the summary when suppressed', () => {
      expect(walkListing('a', { suppressSummary: true }).lines).toEqual(['.', '└── a']);
    });

    it('should print only the directory count in directories-only mode', () => {
      expect(walkListing('src/a.ts\nREADME', { directoriesOnly: true }).lines).toEqual([
        '.',
        '└── src',
        '',
        '1 directory',
      ]);
    });
  });

  describe('filtering and ordering', () => {
    it('should apply include and exclude patterns', () => {
      const { lines } = walkListing('a.txt\nb.txt\nc.log', { includePattern: '*.txt', excludePattern: 'b*' });

      expect(lines).toEqual(['.', '└── a.txt', '', '0 directories, 1 file']);
    });

    it('should hide dot entries and their subtrees by default', () => {
      expect(walkListing('.git/config\nsrc').lines).toEqual(['.', '└── src', '', '0 directories, 1 file']);
    });

    it('should stop at the maximum depth', () => {
      const { lines } = walkListing('sub/deep.txt', { maxDepth: 1 });

      expect(lines).toEqual(['.', '└── sub', '', '1 directory, 0 files']);
    });

    it('should sort reversed with directories first', () => {
      const { lines } = walkListing('a.txt\nb/\nc.txt\nd/', { reverse: true, directoriesFirst: true, suppressSummary: true });

      expect(lines).toEqual(['.', '├── d', '├── b', '├── c.txt', '└── a.txt']);
    });

    it('should not open directories over the entry limit', () => {
      const { lines } = walkListing('big/1\nbig/2\nbig/3\nsmall/x', { entryLimit: 2 });

      expect(lines).toEqual([
        '.',
        '├── big [3 entries exceeds filelimit, not opening dir]',
        '└── small',
        '    └── x',
        '',
        '2 directories, 1 file',
      ]);
    });
  });

  describe('errors', () => {
    it('should report a missing root and continue with the next one', () => {
      const sink = new MemorySink();
      const missing = new PathSourceError('No such file or directory: gone', 'NOT_FOUND', 'gone');
      const source = new ListingPathSource([
        { label: 'gone', error: missing },
        { label: 'here', text: 'x' },
      ]);

      const report = new TreeWalker(createTreeConfig(), { source, sink }).walk();

      expect(sink.lines).toEqual(['gone [error opening dir]', 'here', '└── x', '', '0 directories, 1 file']);
      expect(report.issues).toEqual([{ location: 'gone', error: missing }]);
    });

    it('should mark unreadable directories and keep walking', () => {
      const sink = new MemorySink();
      const source = new FailingSource(ListingPathSource.fromText('locked/secret\nopen/file'), new Set(['./locked']));

      const report = new TreeWalker(createTreeConfig(), { source, sink }).walk();

      expect(sink.lines).toEqual([
        '.',
        '├── locked [error opening dir]',
        '└── open',
        '    └── file',
        '',
        '2 directories, 1 file',
      ]);
      expect(report.issues.map(issue => [issue.location, issue.error.code])).toEqual([['./locked', 'PERMISSION_DENIED']]);
    });

    it('should mark an unreadable root', () => {
      const sink = new MemorySink();
      const source = new FailingSource(ListingPathSource.fromText('a'), new Set(['.']));

      const report = new TreeWalker(createTreeConfig({ suppressSummary: true }), { source, sink }).walk();

      expect(sink.lines).toEqual(['. [error opening dir]']);
      expect(report.issues).toHaveLength(1);
    });

    it('should propagate unexpected errors', () => {
      const source = new FailingSource(ListingPathSource.fromText('a/b'), new Set(['./a']), () => new TypeError('boom'));
      const walker = new TreeWalker(createTreeConfig(), { source, sink: new MemorySink() });

      expect(() => walker.walk()).toThrow('boom');
    });
  });

  describe('report', () => {
    it('should count exactly the entries printed', () => {
      const sink = new MemorySink();
      const walker = new TreeWalker(createTreeConfig({ suppressSummary: true }), {
        source: ListingPathSource.fromText('a/b/c\na/d\ne'),
        sink,
      });

      const report = walker.walk();

      expect(sink.lines).toHaveLength(1 + report.directories + report.files);
      expect(report).toEqual({ directories: 2, files: 3, issues: [] });
    });

    it('should start fresh on every walk', () => {
      const sink = new MemorySink();
      const walker = new TreeWalker(createTreeConfig({ suppressSummary: true }), {
        source: ListingPathSource.fromText('a'),
        sink,
      });

      walker.walk();
      expect(walker.walk().files).toBe(1);
    });
  });

  describe('symlinks', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tree-walker-test-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    function walkFs(input: TreeConfigInput): string[] {
      const sink = new MemorySink();
      const config = createTreeConfig({ roots: [tempDir], ...input });
      new TreeWalker(config, { source: new FsPathSource({ roots: config.roots }), sink }).walk();
      return sink.lines;
    }

    it('should print links with their target and not descend by default', () => {
      fs.mkdirSync(path.join(tempDir, 'real'));
      fs.writeFileSync(path.join(tempDir, 'real', 'f.txt'), '');
      fs.symlinkSync('real', path.join(tempDir, 'link'));

      expect(walkFs({})).toEqual([
        tempDir,
        '├── link -> real',
        '└── real',
        '    └── f.txt',
        '',
        '2 directories, 1 file',
      ]);
    });

    it('should descend into links to directories when following', () => {
      fs.mkdirSync(path.join(tempDir, 'real'));
      fs.writeFileSync(path.join(tempDir, 'real', 'f.txt'), '');
      fs.symlinkSync('real', path.join(tempDir, 'link'));

      expect(walkFs({ followSymlinks: true })).toEqual([
        tempDir,
        '├── link -> real',
        '│   └── f.txt',
        '└── real',
        '    └── f.txt',
        '',
        '2 directories, 2 files',
      ]);
    });

    it('should stop at a link back to an ancestor', () => {
      fs.mkdirSync(path.join(tempDir, 'dir'));
      fs.symlinkSync('..', path.join(tempDir, 'dir', 'loop'));

      expect(walkFs({ followSymlinks: true })).toEqual([
        tempDir,
        '└── dir',
        '    └── loop -> .. [recursive, not followed]',
        '',
        '2 directories, 0 files',
      ]);
    });
  });
});
