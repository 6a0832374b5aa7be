import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { runGraphReport } from '../core/analysis.js';
import { readRunFlags } from '../cli/context.js';
import { describeReportFormat } from '../core/dependency-graph/index.js';

/**
 * Setup the single command
 */
export function setupSingleCommand(program: Command): void {
  program
    .command('single')
    .description('List projects exactly one other project depends on')
    .argument('[dir]', 'workspace directory to scan (default: current directory)')
    .addHelpText('after', describeReportFormat(['single']))
    .action(withErrorHandling(async (dir: string | undefined, _options: unknown, command: Command) => {
      await runGraphReport(dir, readRunFlags(command), ['single']);
    }));
}
