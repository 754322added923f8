#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { LogLevel } from './types/index.js';
import { isDirectory } from './utils/fs.js';
import * as path from 'path';
import { getVersion } from './utils/package.js';

import { setupMapCommand } from './commands/map.js';
import { setupModelCommand } from './commands/model.js';
import { setupConfigCommand } from './commands/config.js';

/**
 * srcpack CLI - Main entry point
 *
 * Collects the materials, textures and models a Source map or model needs.
 */

const program = new Command();

program
  .name('srcpack')
  .description('Collect the content a Source engine map or model depends on')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--verbose', 'print debug logging')
  .configureHelp({ sortSubcommands: true });

setupMapCommand(program);
setupModelCommand(program);
setupConfigCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<{ cwd?: string; verbose?: boolean }>();

  if (opts.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    if (!(await isDirectory(resolvedCwd))) {
      logger.error('Invalid --cwd provided', { cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': not a directory`);
      process.exit(1);
    }
    logger.debug(`Working directory will be: ${resolvedCwd}`);
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('srcpack')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
