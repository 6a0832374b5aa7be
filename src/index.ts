#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/version.js';
import { LogLevel } from './types/index.js';

import { setupAnalyzeCommand } from './commands/analyze.js';
import { setupUnusedCommand } from './commands/unused.js';
import { setupSingleCommand } from './commands/single.js';
import { setupTreeCommand } from './commands/tree.js';
import { setupNeedsCommand } from './commands/needs.js';

/**
 * pathdeps CLI - Main entry point
 *
 * Audits the local path dependencies between the sub-projects of a workspace.
 */

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('pathdeps')
  .description('Find unneeded and single-consumer projects in a workspace of path dependencies')
  .version(getVersion())
  .option('--manifest <name>', 'manifest filename to look for (default: Cargo.toml)')
  .option('--exclude <glob>', 'skip directories matching a glob, relative to the scanned directory (repeatable)', collect)
  .option('--json', 'print machine-readable JSON')
  .option('--verbose', 'print debug logs to stderr')
  .configureHelp({ sortSubcommands: true });

setupAnalyzeCommand(program);
setupUnusedCommand(program);
setupSingleCommand(program);
setupTreeCommand(program);
setupNeedsCommand(program);

program.hook('preAction', () => {
  if (program.opts().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
  logger.debug(`Working directory: ${process.cwd()}`);
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error(`❌ ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason: String(reason) });
  console.error('❌ An unexpected error occurred. Run with --verbose for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}

// Only run main if this module is the one being executed
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('pathdeps')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error: String(error) });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
