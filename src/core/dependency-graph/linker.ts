import type { ProjectRegistry } from './registry.js';
import { UnresolvedDependencyError } from '../../utils/errors.js';

/**
 * Link `dependentDir` to the project at `dependencyDir` (exact key match).
 * A dependency directory that exists on disk but holds no registered
 * project aborts construction.
 */
export function linkDependency(registry: ProjectRegistry, dependentDir: string, dependencyDir: string): void {
  if (!registry.connect(dependentDir, dependencyDir)) {
    throw new UnresolvedDependencyError(dependencyDir, dependentDir);
  }
}

/**
 * Link every extracted dependency of one project, in extraction order
 */
export function linkProject(registry: ProjectRegistry, dependentDir: string, dependencyDirs: readonly string[]): void {
  for (const dependencyDir of dependencyDirs) {
    linkDependency(registry, dependentDir, dependencyDir);
  }
}
