import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { runNeedsQuery } from '../core/analysis.js';
import { readRunFlags } from '../cli/context.js';

/**
 * Setup the needs command
 */
export function setupNeedsCommand(program: Command): void {
  program
    .command('needs')
    .description('List projects depending on a project whose directory contains <fragment>')
    .argument('<fragment>', 'substring of the depended-on directory')
    .argument('[dir]', 'workspace directory to scan (default: current directory)')
    .action(withErrorHandling(async (fragment: string, dir: string | undefined, _options: unknown, command: Command) => {
      await runNeedsQuery(fragment, dir, readRunFlags(command));
    }));
}
