#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { TreeCommand } from './commands/tree';
import { EXIT_CODES } from './base/base-command';

const program = new Command();

program
  .name('arbor')
  .version('0.1.0', '-V, --version', 'Print the version number')
  .exitOverride();

new TreeCommand().register(program);

// A closed pipe (arbor | head) ends the run quietly
process.stdout.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EPIPE') {
    process.exit(EXIT_CODES.OK);
  }
  console.error(`❌ Cannot write output: ${error.message}`);
  process.exit(EXIT_CODES.ISSUES);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // Commander already printed help, the version or the usage error
    process.exitCode = error.exitCode === 0 ? EXIT_CODES.OK : EXIT_CODES.CONFIG_ERROR;
    return;
  }
  console.error("❌ Fatal error:", error instanceof Error ? error.message : String(error));
  process.exitCode = EXIT_CODES.ISSUES;
});
