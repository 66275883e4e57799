/**
 * Standard Command Interface for the arbor CLI
 *
 * Commands implement this interface so they can be registered on the
 * program and executed directly from tests.
 */

import { Command } from 'commander';

/**
 * Base options that every command supports
 */
export interface BaseCommandOptions {
  verbose?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}

/**
 * Executable command interface
 */
export interface IExecutableCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {
  /**
   * Execute the command
   * @param args - Positional arguments
   * @param options - Command-specific options
   */
  execute(args: string[], options: TOptions): Promise<void>;
}
