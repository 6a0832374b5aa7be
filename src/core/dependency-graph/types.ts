/**
 * Project node as seen by graph queries. Edges are stored as directory keys
 * of other projects, never as object references, so cycles need no special
 * handling in the data model.
 */
export interface ProjectNode {
  /** Normalized directory relative to the scan root (`.` for the root itself) */
  readonly dir: string;
  /** Manifest path relative to the scan root */
  readonly manifestPath: string;
  /** Projects this one declares a path dependency on, in declaration order, duplicates kept */
  readonly dependencies: readonly string[];
  /** Reverse edges, one entry per edge, in the order edges were linked */
  readonly dependents: readonly string[];
}

/**
 * Finished, read-only dependency graph
 */
export interface ProjectGraph {
  /** Every project in registry (discovery) order */
  readonly projects: readonly ProjectNode[];
  readonly edgeCount: number;
  get(dir: string): ProjectNode | undefined;
}

export interface SingleConsumer {
  project: ProjectNode;
  dependent: string;
}

export interface TreeEntry {
  project: ProjectNode;
  depth: number;
}
