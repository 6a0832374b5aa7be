import { join } from 'path';
import type { AnalysisOptions } from '../../types/index.js';
import type { ProjectGraph } from './types.js';
import { locateManifests } from './manifest-locator.js';
import { extractPathDependencies } from './extractor.js';
import { ProjectRegistry } from './registry.js';
import { linkProject } from './linker.js';
import { describeProject } from './queries.js';
import { readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export type BuildGraphOptions = Pick<AnalysisOptions, 'rootDir' | 'manifestName' | 'exclude'>;

/**
 * Build the path-dependency graph of a workspace.
 *
 * Every project is registered before the first edge is linked, so a
 * dependency on a directory without a manifest is always reported as
 * unresolved rather than deferred.
 */
export async function buildProjectGraph(options: BuildGraphOptions): Promise<ProjectGraph> {
  const { rootDir, manifestName, exclude } = options;

  const registry = new ProjectRegistry();
  for (const manifestPath of await locateManifests(rootDir, { manifestName, exclude })) {
    registry.register(manifestPath);
  }

  for (const project of registry.list()) {
    const manifestText = await readTextFile(join(rootDir, project.manifestPath));
    const dependencyDirs = await extractPathDependencies(manifestText, project.dir, rootDir);
    linkProject(registry, project.dir, dependencyDirs);
  }

  const graph = registry.freeze();
  logger.debug(`Built dependency graph: ${graph.projects.length} project(s), ${graph.edgeCount} edge(s)`);
  for (const project of graph.projects) {
    logger.debug(describeProject(project));
  }
  return graph;
}
