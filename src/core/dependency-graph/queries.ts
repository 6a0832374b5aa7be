import { basename } from 'path';
import type { ProjectGraph, ProjectNode, SingleConsumer, TreeEntry } from './types.js';
import {
  AmbiguousProjectError,
  DependencyCycleError,
  ProjectNotFoundError
} from '../../utils/errors.js';

/**
 * Read-only queries over a finished project graph
 */

/**
 * Projects nothing in the tree depends on, in registry order
 */
export function findUnused(graph: ProjectGraph): ProjectNode[] {
  return graph.projects.filter((project) => project.dependents.length === 0);
}

/**
 * Projects with exactly one dependent, paired with it, in registry order
 */
export function findSingleConsumers(graph: ProjectGraph): SingleConsumer[] {
  const result: SingleConsumer[] = [];
  for (const project of graph.projects) {
    if (project.dependents.length === 1) {
      result.push({ project, dependent: project.dependents[0] });
    }
  }
  return result;
}

/**
 * Look a project up by exact directory key, falling back to a unique
 * directory basename (`term` for `crates/term`)
 */
export function resolveProject(graph: ProjectGraph, query: string): ProjectNode {
  const exact = graph.get(query);
  if (exact) {
    return exact;
  }

  const candidates = graph.projects.filter((project) => basename(project.dir) === query);
  if (candidates.length === 1) {
    return candidates[0];
  }
  if (candidates.length > 1) {
    throw new AmbiguousProjectError(query, candidates.map((project) => project.dir));
  }
  throw new ProjectNotFoundError(query);
}

function requireProject(graph: ProjectGraph, dir: string): ProjectNode {
  const project = graph.get(dir);
  if (!project) {
    throw new ProjectNotFoundError(dir);
  }
  return project;
}

/**
 * Depth-first walk of the dependencies below `rootDir`, root first, each
 * project followed by its dependencies in declaration order. A project
 * reachable along several paths is listed once per path.
 *
 * Re-entering a project that is already on the current path throws
 * DependencyCycleError instead of recursing forever.
 */
export function walkDependencyTree(graph: ProjectGraph, rootDir: string): TreeEntry[] {
  const entries: TreeEntry[] = [];
  const path: string[] = [];

  const visit = (project: ProjectNode, depth: number): void => {
    const index = path.indexOf(project.dir);
    if (index !== -1) {
      throw new DependencyCycleError([...path.slice(index), project.dir]);
    }

    entries.push({ project, depth });
    path.push(project.dir);
    for (const dependency of project.dependencies) {
      visit(requireProject(graph, dependency), depth + 1);
    }
    path.pop();
  };

  visit(requireProject(graph, rootDir), 0);
  return entries;
}

/**
 * True when `dir` depends on a project whose directory contains `fragment`
 */
export function dependsOn(graph: ProjectGraph, dir: string, fragment: string): boolean {
  return requireProject(graph, dir).dependencies.some((dependency) => dependency.includes(fragment));
}

/**
 * True when a project whose directory contains `fragment` depends on `dir`
 */
export function isDependedOnBy(graph: ProjectGraph, dir: string, fragment: string): boolean {
  return requireProject(graph, dir).dependents.some((dependent) => dependent.includes(fragment));
}

/**
 * Projects that depend on a directory containing `fragment`, in registry order
 */
export function findDependentsMatching(graph: ProjectGraph, fragment: string): ProjectNode[] {
  return graph.projects.filter((project) => dependsOn(graph, project.dir, fragment));
}

/**
 * One-line rendering used in debug output
 */
export function describeProject(project: ProjectNode): string {
  return `Project(${project.dir}) -> [${project.dependencies.join(', ')}]`;
}
