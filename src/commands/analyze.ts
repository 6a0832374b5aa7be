/**
 * @fileoverview Analyze command implementation
 *
 * Prints the three workspace reports: unneeded projects, projects needed by
 * only one other, and the dependency tree below --root.
 */

import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runGraphReport } from '../core/analysis.js';
import { readRunFlags } from '../cli/context.js';
import { describeReportFormat } from '../core/dependency-graph/index.js';

export function setupAnalyzeCommand(program: Command): void {
  program
    .command('analyze', { isDefault: true })
    .description('Report unneeded and single-consumer projects and print the dependency tree')
    .argument('[dir]', 'workspace directory to scan (default: current directory)')
    .option('-r, --root <project>', 'project whose dependency tree is printed')
    .addHelpText('after', describeReportFormat(['unused', 'single', 'tree']))
    .action(withErrorHandling(async (dir: string | undefined, _options: unknown, command: Command) => {
      const flags = readRunFlags(command);
      logger.debug('Analyze command invoked', { dir, flags });
      await runGraphReport(dir, flags, ['unused', 'single', 'tree']);
    }));
}
