/**
 * Base Command Class for the arbor CLI
 *
 * Provides the dependency service, a logger and uniform error reporting.
 */

import { Command } from 'commander';
import { createLogger } from '@arbor/core';
import type { LoggerInstance } from '@arbor/core';
import { DependencyInjectionService } from '../services/dependency-injection';
import type { BaseCommandOptions, ICommand, IExecutableCommand } from '../interfaces/command';

/**
 * Process exit codes shared by all commands
 */
export const EXIT_CODES = {
  OK: 0,
  ISSUES: 1,
  CONFIG_ERROR: 2,
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand, IExecutableCommand<TOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();
  protected logger: LoggerInstance = createLogger('[arbor] ');

  /**
   * Register the command with Commander.js
   */
  abstract register(program: Command): void;

  /**
   * Execute the command action
   */
  abstract execute(args: string[], options: TOptions): Promise<void>;

  /**
   * Rebuilds the logger at debug level when --verbose is set
   */
  protected configureLogger(options: TOptions): void {
    this.logger = createLogger('[arbor] ', options.verbose ? 'debug' : undefined);
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: ExitCode = EXIT_CODES.ISSUES): void {
    // Only add ❌ if message doesn't already have it
    const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
    console.error(formattedMessage);
    if (options.verbose && error) {
      console.error(`🔍 Technical details: ${error.stack}`);
    }

    // Output already queued on stdout still drains before the process ends
    process.exitCode = exitCode;
  }
}
