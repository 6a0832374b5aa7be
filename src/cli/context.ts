/**
 * CLI Context
 *
 * Reads the global options shared by every command (commander stores them
 * on the root program) into typed run flags.
 */

import type { Command } from 'commander';
import type { RunFlags } from '../core/analysis.js';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Collect global and command options into RunFlags
 */
export function readRunFlags(command: Command): RunFlags {
  const opts: Record<string, unknown> = command.optsWithGlobals();
  return {
    manifest: optionalString(opts.manifest),
    exclude: optionalStringList(opts.exclude),
    root: optionalString(opts.root),
    json: opts.json === true
  };
}
