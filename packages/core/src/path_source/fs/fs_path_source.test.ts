/**
 * FsPathSource Tests
 *
 * Runs against real temp directories; symlink cases create links with fs.symlinkSync.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsPathSource } from './fs_path_source';
import { isResolvedRoot } from '../path_source';
import type { RootResolution, ResolvedRoot } from '../path_source';
import { PathSourceError } from '../path_source.errors';

describe('FsPathSource', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fs-path-source-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function createFile(relativePath: string, content: string = ''): void {
    const fullPath = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, content, 'utf-8');
  }

  function resolvedRoot(resolution: RootResolution | undefined): ResolvedRoot {
    if (!resolution || !isResolvedRoot(resolution)) {
      throw new Error('expected a resolved root');
    }
    return resolution;
  }

  describe('roots()', () => {
    it('should resolve an existing directory at depth 0', () => {
      const source = new FsPathSource({ roots: [tempDir] });
      const root = resolvedRoot(source.roots()[0]);

      expect(root.location).toBe(tempDir);
      expect(root.entry.kind).toBe('directory');
      expect(root.entry.depth).toBe(0);
      expect(root.entry.path).toBe(tempDir);
    });

    it('should report a missing root as NOT_FOUND without throwing', () => {
      const missing = path.join(tempDir, 'missing');
      const source = new FsPathSource({ roots: [missing] });
      const [resolution] = source.roots();

      expect(resolution).toEqual({
        location: missing,
        error: expect.any(PathSourceError),
      });
      if (resolution && !isResolvedRoot(resolution)) {
        expect(resolution.error.code).toBe('NOT_FOUND');
        expect(resolution.error.message).toBe(`No such file or directory: ${missing}`);
      }
    });

    it('should keep roots in the order given', () => {
      fs.mkdirSync(path.join(tempDir, 'b'));
      fs.mkdirSync(path.join(tempDir, 'a'));
      const source = new FsPathSource({ roots: [path.join(tempDir, 'b'), path.join(tempDir, 'a')] });

      expect(source.roots().map(root => root.location)).toEqual([
        path.join(tempDir, 'b'),
        path.join(tempDir, 'a'),
      ]);
    });
  });

  describe('readChildren()', () => {
    it('should return direct children with metadata and display paths', () => {
      createFile('notes.txt', 'hello');
      fs.mkdirSync(path.join(tempDir, 'src'));
      const source = new FsPathSource({ roots: [tempDir] });
      const root = resolvedRoot(source.roots()[0]);

      const children = source.readChildren(root.entry).sort((a, b) => (a.name < b.name ? -1 : 1));

      expect(children.map(child => [child.name, child.kind, child.depth])).toEqual([
        ['notes.txt', 'file', 1],
        ['src', 'directory', 1],
      ]);
      expect(children[0]?.path).toBe(`${tempDir}/notes.txt`);
      expect(children[0]?.metadata?.size).toBe(5);
    });

    it('should describe symlinks with their target and target kind', () => {
      fs.mkdirSync(path.join(tempDir, 'real'));
      fs.symlinkSync('real', path.join(tempDir, 'link'));
      fs.symlinkSync('nowhere', path.join(tempDir, 'broken'));
      const source = new FsPathSource({ roots: [tempDir] });
      const root = resolvedRoot(source.roots()[0]);

      const children = source.readChildren(root.entry);
      const link = children.find(child => child.name === 'link');
      const broken = children.find(child => child.name === 'broken');

      expect(link).toMatchObject({ kind: 'symlink', linkTarget: 'real', targetKind: 'directory' });
      expect(broken).toMatchObject({ kind: 'symlink', linkTarget: 'nowhere' });
      expect(broken?.targetKind).toBeUndefined();
      expect(link && source.isTraversable(link)).toBe(true);
      expect(broken && source.isTraversable(broken)).toBe(false);
    });

    it('should throw NOT_A_DIRECTORY when listing a file', () => {
      createFile('plain.txt');
      const source = new FsPathSource({ roots: [path.join(tempDir, 'plain.txt')] });
      const root = resolvedRoot(source.roots()[0]);

      expect(() => source.readChildren(root.entry)).toThrow(PathSourceError);
      try {
        source.readChildren(root.entry);
      } catch (error) {
        expect(error instanceof PathSourceError && error.code).toBe('NOT_A_DIRECTORY');
      }
    });
  });

  describe('realPath()', () => {
    it('should resolve symlinks to the canonical directory', () => {
      fs.mkdirSync(path.join(tempDir, 'real'));
      fs.symlinkSync('real', path.join(tempDir, 'link'));
      const source = new FsPathSource({ roots: [tempDir] });
      const root = resolvedRoot(source.roots()[0]);
      const link = source.readChildren(root.entry).find(child => child.name === 'link');

      expect(link && source.realPath(link)).toBe(fs.realpathSync(path.join(tempDir, 'real')));
    });

    it('should return undefined when the path cannot be resolved', () => {
      fs.symlinkSync('nowhere', path.join(tempDir, 'broken'));
      const source = new FsPathSource({ roots: [tempDir] });
      const root = resolvedRoot(source.roots()[0]);
      const broken = source.readChildren(root.entry).find(child => child.name === 'broken');

      expect(broken && source.realPath(broken)).toBeUndefined();
    });
  });
});
