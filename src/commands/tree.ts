/**
 * @fileoverview Tree command implementation
 *
 * Prints the transitive path dependencies of one project, depth first.
 */

import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { runGraphReport } from '../core/analysis.js';
import { readRunFlags } from '../cli/context.js';
import { describeReportFormat } from '../core/dependency-graph/index.js';

export function setupTreeCommand(program: Command): void {
  program
    .command('tree')
    .description('Print the dependency tree below a project')
    .argument('<project>', 'project directory, or its basename when unique')
    .argument('[dir]', 'workspace directory to scan (default: current directory)')
    .addHelpText('after', describeReportFormat(['tree']))
    .action(withErrorHandling(async (project: string, dir: string | undefined, _options: unknown, command: Command) => {
      logger.debug('Tree command invoked', { project, dir });
      await runGraphReport(dir, { ...readRunFlags(command), root: project }, ['tree']);
    }));
}
