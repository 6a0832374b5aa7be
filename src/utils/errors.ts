import { PathDepsError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the failure modes of a pathdeps run
 */

export class DiscoveryError extends PathDepsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Discovery error: ${message}`, ErrorCodes.DISCOVERY_ERROR, details);
    this.name = 'DiscoveryError';
  }
}

export class UnresolvedDependencyError extends PathDepsError {
  constructor(dependencyDir: string, dependentDir: string) {
    super(`cannot find dependency ${dependencyDir}`, ErrorCodes.UNRESOLVED_DEPENDENCY, {
      dependencyDir,
      dependentDir
    });
    this.name = 'UnresolvedDependencyError';
  }
}

export class DuplicateProjectError extends PathDepsError {
  constructor(dir: string, manifestPaths: string[]) {
    super(`Project '${dir}' is declared by more than one manifest: ${manifestPaths.join(', ')}`, ErrorCodes.DUPLICATE_PROJECT, {
      dir,
      manifestPaths
    });
    this.name = 'DuplicateProjectError';
  }
}

export class ProjectNotFoundError extends PathDepsError {
  constructor(query: string) {
    super(`Project '${query}' not found`, ErrorCodes.PROJECT_NOT_FOUND, { query });
    this.name = 'ProjectNotFoundError';
  }
}

export class AmbiguousProjectError extends PathDepsError {
  constructor(query: string, candidates: string[]) {
    super(`Project '${query}' is ambiguous: ${candidates.join(', ')}`, ErrorCodes.AMBIGUOUS_PROJECT, {
      query,
      candidates
    });
    this.name = 'AmbiguousProjectError';
  }
}

export class DependencyCycleError extends PathDepsError {
  constructor(cycle: string[]) {
    super(`Dependency cycle: ${cycle.join(' -> ')}`, ErrorCodes.DEPENDENCY_CYCLE, { cycle });
    this.name = 'DependencyCycleError';
  }
}

export class ConfigError extends PathDepsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PathDepsError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
