import type { AnalysisOptions } from '../types/index.js';
import type { OutputPort } from './ports/output.js';
import { resolveOutput } from './ports/resolve.js';
import { resolveAnalysisOptions, type AnalysisFlags } from './config.js';
import {
  buildProjectGraph,
  buildGraphReport,
  displayGraphReport,
  findDependentsMatching,
  type GraphReport,
  type ProjectGraph,
  type ReportSection
} from './dependency-graph/index.js';
import { logger } from '../utils/logger.js';

/**
 * Shared pipeline behind the CLI commands: resolve options, build the whole
 * graph, then query and print. Nothing is printed unless construction
 * succeeds.
 */

export interface RunFlags extends AnalysisFlags {
  json?: boolean;
}

export interface RunContext {
  output?: OutputPort;
}

export async function loadWorkspaceGraph(
  dir: string | undefined,
  flags: AnalysisFlags
): Promise<{ graph: ProjectGraph; options: AnalysisOptions }> {
  const options = await resolveAnalysisOptions(dir, flags);
  const graph = await buildProjectGraph(options);
  return { graph, options };
}

export async function runGraphReport(
  dir: string | undefined,
  flags: RunFlags,
  sections: readonly ReportSection[],
  ctx: RunContext = {}
): Promise<GraphReport> {
  const { graph, options } = await loadWorkspaceGraph(dir, flags);
  const report = buildGraphReport(graph, sections, options.root);
  if (report.tree === null) {
    logger.info('No root project configured; dependency tree skipped');
  }
  displayGraphReport(report, { json: flags.json, output: ctx.output });
  return report;
}

/**
 * List the projects depending on a directory that contains `fragment`
 */
export async function runNeedsQuery(
  fragment: string,
  dir: string | undefined,
  flags: RunFlags,
  ctx: RunContext = {}
): Promise<string[]> {
  const { graph } = await loadWorkspaceGraph(dir, flags);
  const matches = findDependentsMatching(graph, fragment).map((project) => project.dir);

  const out = resolveOutput(ctx);
  if (flags.json) {
    out.message(JSON.stringify(matches, null, 2));
  } else {
    for (const match of matches) {
      out.message(`* ${match}`);
    }
  }
  return matches;
}
