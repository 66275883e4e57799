import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ConsoleSink,
  FileSink,
  FsPathSource,
  IdentityResolver,
  ListingPathSource,
  OutputSinkError,
  Render,
  createLogger,
  createTreeConfig,
} from '@arbor/core';
import { DependencyInjectionService } from './dependency-injection';

describe('DependencyInjectionService', () => {
  const service = DependencyInjectionService.getInstance();
  const logger = createLogger('[test]', 'silent');
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'arbor-di-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return the same instance every time', () => {
    expect(DependencyInjectionService.getInstance()).toBe(service);
  });

  describe('getPathSource()', () => {
    it('should walk the filesystem by default', () => {
      expect(service.getPathSource(createTreeConfig({ roots: [tempDir] }), logger)).toBeInstanceOf(FsPathSource);
    });

    it('should read listings when listing input is enabled', () => {
      const listing = path.join(tempDir, 'paths.txt');
      fs.writeFileSync(listing, 'a/b\n');

      const source = service.getPathSource(createTreeConfig({ roots: [listing], listingInput: true }), logger);

      expect(source).toBeInstanceOf(ListingPathSource);
      expect(source.roots().map(root => root.location)).toEqual([listing]);
    });
  });

  describe('getOutputSink()', () => {
    it('should write to the console without an output file', () => {
      expect(service.getOutputSink(createTreeConfig())).toBeInstanceOf(ConsoleSink);
    });

    it('should open the output file when one is configured', () => {
      const sink = service.getOutputSink(createTreeConfig({ outputFile: path.join(tempDir, 'tree.txt') }));

      expect(sink).toBeInstanceOf(FileSink);
      sink.close();
    });

    it('should surface output files that cannot be opened', () => {
      const config = createTreeConfig({ outputFile: path.join(tempDir, 'missing', 'tree.txt') });

      expect(() => service.getOutputSink(config)).toThrow(OutputSinkError);
    });
  });

  describe('getColorizer()', () => {
    it('should return the plain colorizer when color is disabled', () => {
      expect(service.getColorizer(createTreeConfig({ colorMode: 'never' }))).toBe(Render.PLAIN_COLORIZER);
    });

    it('should use LS_COLORS codes when forced on with a mapping', () => {
      const colorizer = service.getColorizer(createTreeConfig({ colorMode: 'always', lsColors: 'di=34' }));

      expect(colorizer.paint('src', 'directory', 'src')).toBe('\x1b[34msrc\x1b[0m');
    });
  });

  describe('getIdentityResolver()', () => {
    it('should share one resolver', () => {
      const resolver = service.getIdentityResolver();

      expect(resolver).toBeInstanceOf(IdentityResolver);
      expect(service.getIdentityResolver()).toBe(resolver);
    });
  });
});
