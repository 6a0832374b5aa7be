import { dirname } from 'path';
import type { ProjectGraph, ProjectNode } from './types.js';
import { normalizeProjectDir } from './extractor.js';
import { DuplicateProjectError } from '../../utils/errors.js';

interface ProjectRecord {
  dir: string;
  manifestPath: string;
  dependencies: string[];
  dependents: string[];
}

/**
 * Mutable node set used while the graph is being built.
 *
 * Projects are keyed by normalized directory and remembered in registration
 * order. Edges only enter through `connect`, which always writes both
 * directions. `freeze` hands the finished graph to the queries.
 */
export class ProjectRegistry {
  private readonly records = new Map<string, ProjectRecord>();

  /**
   * Register the project owning a manifest (path relative to the scan root)
   */
  register(manifestPath: string): ProjectNode {
    const dir = normalizeProjectDir(dirname(manifestPath));
    const existing = this.records.get(dir);
    if (existing) {
      throw new DuplicateProjectError(dir, [existing.manifestPath, manifestPath]);
    }

    const record: ProjectRecord = { dir, manifestPath, dependencies: [], dependents: [] };
    this.records.set(dir, record);
    return record;
  }

  get(dir: string): ProjectNode | undefined {
    return this.records.get(dir);
  }

  /** Projects in registration order */
  list(): ProjectNode[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Record the edge `from -> to` together with its reverse.
   * Returns false when either end is unknown; nothing is written then.
   */
  connect(from: string, to: string): boolean {
    const source = this.records.get(from);
    const target = this.records.get(to);
    if (!source || !target) {
      return false;
    }
    source.dependencies.push(to);
    target.dependents.push(from);
    return true;
  }

  /**
   * Snapshot the registry as an immutable graph
   */
  freeze(): ProjectGraph {
    const nodes = new Map<string, ProjectNode>();
    let edgeCount = 0;
    for (const record of this.records.values()) {
      nodes.set(record.dir, Object.freeze({
        dir: record.dir,
        manifestPath: record.manifestPath,
        dependencies: Object.freeze([...record.dependencies]),
        dependents: Object.freeze([...record.dependents])
      }));
      edgeCount += record.dependencies.length;
    }

    const projects = Object.freeze([...nodes.values()]);
    return Object.freeze({
      projects,
      edgeCount,
      get: (dir: string) => nodes.get(dir)
    });
  }
}
