import { Command, InvalidArgumentError, Option } from 'commander';
import {
  ConfigurationError,
  LineFormatter,
  OutputSinkError,
  TreeWalker,
  createTreeConfig,
} from '@arbor/core';
import type { OutputSinkInstance, SortKey, TraversalReport, TreeConfig, TreeConfigInput } from '@arbor/core';
import { BaseCommand, EXIT_CODES } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Tree Command Options
 * Attribute names follow Commander's camel-casing of the long flags
 */
export interface TreeCommandOptions extends BaseCommandOptions {
  all?: boolean;
  dirsOnly?: boolean;
  follow?: boolean;
  fullPath?: boolean;
  /** false when --no-indent is given */
  indent?: boolean;
  level?: number;
  pattern?: string;
  exclude?: string;
  size?: boolean;
  humanReadable?: boolean;
  /** true for --color, false for --no-color, absent for auto */
  color?: boolean;
  ascii?: boolean;
  sortByTime?: boolean;
  versionSort?: boolean;
  sort?: string;
  reverse?: boolean;
  dirsfirst?: boolean;
  filelimit?: number;
  classify?: boolean;
  permissions?: boolean;
  owner?: boolean;
  group?: boolean;
  modDate?: boolean;
  noreport?: boolean;
  output?: string;
  fromfile?: boolean;
}

/**
 * Parses a non-negative integer option value
 */
export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return Number(value);
}

function toSortKey(options: TreeCommandOptions): SortKey | undefined {
  switch (options.sort) {
    case 'name':
    case 'time':
    case 'version':
      return options.sort;
  }
  if (options.versionSort) return 'version';
  if (options.sortByTime) return 'time';
  return undefined;
}

function toColorMode(color: boolean | undefined): TreeConfigInput['colorMode'] {
  if (color === undefined) return 'auto';
  return color ? 'always' : 'never';
}

/**
 * Maps parsed flags and the environment onto a TreeConfig input
 */
export function toTreeConfigInput(
  paths: string[],
  options: TreeCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): TreeConfigInput {
  const lsColors = env['LS_COLORS'];
  return {
    roots: paths,
    maxDepth: options.level,
    includePattern: options.pattern,
    excludePattern: options.exclude,
    directoriesOnly: options.dirsOnly,
    showHidden: options.all,
    sortKey: toSortKey(options),
    reverse: options.reverse,
    directoriesFirst: options.dirsfirst,
    entryLimit: options.filelimit,
    followSymlinks: options.follow,
    colorMode: toColorMode(options.color),
    lsColors: lsColors !== undefined && lsColors.length > 0 ? lsColors : undefined,
    asciiGlyphs: options.ascii,
    fullPath: options.fullPath,
    noIndent: options.indent === false,
    sizeMode: options.humanReadable ? 'human' : options.size ? 'bytes' : 'off',
    showPermissions: options.permissions,
    showOwner: options.owner,
    showGroup: options.group,
    showDate: options.modDate,
    typeIndicators: options.classify,
    suppressSummary: options.noreport,
    outputFile: options.output,
    listingInput: options.fromfile,
  };
}

/**
 * Tree Command - thin wrapper around the core TreeWalker
 *
 * This command is responsible for:
 * - Parsing CLI arguments into a TreeConfig
 * - Injecting the path source, sink and colorizer
 * - Reporting problems on stderr and setting exit codes
 */
export class TreeCommand extends BaseCommand<TreeCommandOptions> {
  protected description = 'List directory contents as an indented tree';

  /**
   * Configures the program itself: arbor has no sub-commands
   */
  register(program: Command): void {
    program
      .description(this.description)
      .argument('[paths...]', 'Directories to list, or listing files with --fromfile')
      .option('-a, --all', 'Include entries whose names start with a dot')
      .option('-d, --dirs-only', 'List directories only')
      .option('-l, --follow', 'Follow symbolic links to directories')
      .option('-f, --full-path', 'Print the full path of every entry')
      .option('-i, --no-indent', 'Do not print indentation lines')
      .option('-L, --level <n>', 'Descend at most n levels', parseCount)
      .option('-P, --pattern <pattern>', 'List only files matching the wildcard pattern')
      .option('-I, --exclude <pattern>', 'Do not list entries matching the wildcard pattern')
      .option('-s, --size', 'Print the size of each entry in bytes')
      .option('-H, --human-readable', 'Print sizes in K, M, G... units')
      .option('-C, --color', 'Always colorize output')
      .option('-n, --no-color', 'Never colorize output')
      .option('-A, --ascii', 'Draw the tree with ASCII characters')
      .option('-t, --sort-by-time', 'Sort by modification time')
      .option('-v, --version-sort', 'Sort by version (natural) order')
      .addOption(new Option('--sort <key>', 'Sort by key').choices(['name', 'time', 'version']))
      .option('-r, --reverse', 'Reverse the sort order')
      .option('--dirsfirst', 'List directories before files')
      .option('--filelimit <n>', 'Do not open directories with more than n entries', parseCount)
      .option('-F, --classify', 'Append / for directories, * for executables, = for sockets, | for FIFOs')
      .option('-p, --permissions', 'Print permissions')
      .option('-u, --owner', 'Print the owner name')
      .option('-g, --group', 'Print the group name')
      .option('-D, --mod-date', 'Print the last modification date')
      .option('--noreport', 'Omit the summary line')
      .option('-o, --output <file>', 'Write the tree to a file instead of stdout')
      .option('--fromfile', 'Read paths from listing files (stdin when none or "-")')
      .option('--verbose', 'Print diagnostics on stderr')
      .action(async (paths: string[], options: TreeCommandOptions) => {
        await this.execute(paths, options);
      });
  }

  /**
   * Execute the tree command
   */
  async execute(paths: string[], options: TreeCommandOptions): Promise<void> {
    this.configureLogger(options);

    let config: TreeConfig;
    try {
      config = createTreeConfig(toTreeConfigInput(paths, options));
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.handleError(error.message, options, error, EXIT_CODES.CONFIG_ERROR);
        return;
      }
      throw error;
    }
    this.logger.debug(`Listing ${config.roots.join(', ')}${config.listingInput ? ' (from listings)' : ''}`);

    let sink: OutputSinkInstance;
    try {
      sink = this.dependencyService.getOutputSink(config);
    } catch (error) {
      if (error instanceof OutputSinkError) {
        this.handleError(error.message, options, error);
        return;
      }
      throw error;
    }

    const walker = new TreeWalker(config, {
      source: this.dependencyService.getPathSource(config, this.logger),
      sink,
      formatter: new LineFormatter(config, {
        colorizer: this.dependencyService.getColorizer(config),
        identity: this.dependencyService.getIdentityResolver(),
      }),
      logger: this.logger,
    });

    let report: TraversalReport;
    try {
      report = walker.walk();
    } catch (error) {
      if (error instanceof OutputSinkError) {
        this.handleError(error.message, options, error);
        return;
      }
      throw error;
    } finally {
      sink.close();
    }

    for (const issue of report.issues) {
      this.logger.warn(issue.error.message);
    }
    this.logger.debug(`${report.directories} directories, ${report.files} files, ${report.issues.length} issues`);

    if (report.issues.length > 0) {
      process.exitCode = EXIT_CODES.ISSUES;
    }
  }
}
