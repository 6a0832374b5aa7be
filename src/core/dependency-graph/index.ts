/**
 * Path-dependency graph
 *
 * - types.ts: ProjectNode / ProjectGraph and query result shapes
 * - manifest-locator.ts: finds manifests below a root
 * - extractor.ts: best-effort `path = "..."` extraction
 * - registry.ts: mutable node set, frozen into a ProjectGraph
 * - linker.ts: records edges in both directions
 * - builder.ts: locate → register → extract → link
 * - queries.ts: unused / single-consumer / tree walk / lookups
 * - display.ts: text and JSON reports
 */

export type { ProjectNode, ProjectGraph, SingleConsumer, TreeEntry } from './types.js';

export { locateManifests, type LocateOptions } from './manifest-locator.js';
export {
  scanPathDeclarations,
  extractPathDependencies,
  resolveDeclaredPath,
  normalizeProjectDir
} from './extractor.js';
export { ProjectRegistry } from './registry.js';
export { linkDependency, linkProject } from './linker.js';
export { buildProjectGraph, type BuildGraphOptions } from './builder.js';
export {
  findUnused,
  findSingleConsumers,
  walkDependencyTree,
  resolveProject,
  dependsOn,
  isDependedOnBy,
  findDependentsMatching,
  describeProject
} from './queries.js';
export {
  buildGraphReport,
  displayGraphReport,
  describeReportFormat,
  formatUnused,
  formatSingleConsumers,
  formatTree,
  formatReportJson,
  type GraphReport,
  type ReportSection,
  type DisplayOptions
} from './display.js';
