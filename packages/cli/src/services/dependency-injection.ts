import {
  ConsoleSink,
  FileSink,
  FsPathSource,
  IdentityResolver,
  ListingPathSource,
  createColorizer,
  readListings,
} from '@arbor/core';
import type { LoggerInstance, OutputSinkInstance, PathSourceInstance, Render, TreeConfig } from '@arbor/core';

/**
 * Dependency Injection Service for the arbor CLI
 *
 * Builds the collaborators a tree run needs from a finished TreeConfig.
 * Commands ask this service instead of constructing sources and sinks
 * themselves, so tests can swap in in-memory stand-ins.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private identityResolver: IdentityResolver | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Filesystem walker, or listing reader when --fromfile is set.
   * Listings are read eagerly so unreadable ones surface as failed roots.
   */
  getPathSource(config: TreeConfig, logger: LoggerInstance): PathSourceInstance {
    if (config.listingInput) {
      return new ListingPathSource(readListings(config.roots));
    }
    return new FsPathSource({ roots: config.roots, logger });
  }

  /**
   * File sink for --output, console otherwise
   * @throws OutputSinkError when the output file cannot be opened
   */
  getOutputSink(config: TreeConfig): OutputSinkInstance {
    return config.outputFile !== undefined ? new FileSink(config.outputFile) : new ConsoleSink();
  }

  getColorizer(config: TreeConfig): Render.Colorizer {
    return createColorizer(config, { isTTY: process.stdout.isTTY === true });
  }

  /**
   * Shared resolver so account files are read at most once per process
   */
  getIdentityResolver(): IdentityResolver {
    if (!this.identityResolver) {
      this.identityResolver = new IdentityResolver();
    }
    return this.identityResolver;
  }
}
