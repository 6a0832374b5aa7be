import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { runGraphReport } from '../core/analysis.js';
import { readRunFlags } from '../cli/context.js';
import { describeReportFormat } from '../core/dependency-graph/index.js';

/**
 * Setup the unused command
 */
export function setupUnusedCommand(program: Command): void {
  program
    .command('unused')
    .description('List projects no other project depends on')
    .argument('[dir]', 'workspace directory to scan (default: current directory)')
    .addHelpText('after', describeReportFormat(['unused']))
    .action(withErrorHandling(async (dir: string | undefined, _options: unknown, command: Command) => {
      await runGraphReport(dir, readRunFlags(command), ['unused']);
    }));
}
