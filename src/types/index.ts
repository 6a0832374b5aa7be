/**
 * Common types and interfaces for the pathdeps CLI
 */

// Configuration types

/**
 * Shape of a `pathdeps.jsonc` / `pathdeps.json` file in the scanned directory.
 */
export interface PathDepsConfig {
  manifest?: string;
  exclude?: string[];
  root?: string;
}

/**
 * Effective settings for one analysis run, after flags and config are merged.
 */
export interface AnalysisOptions {
  /** Absolute path of the directory being scanned */
  rootDir: string;
  /** Manifest filename looked for in every directory */
  manifestName: string;
  /** Directory globs (relative to rootDir) pruned from discovery */
  exclude: string[];
  /** Project whose dependency tree is printed, if any */
  root?: string;
}

export interface CommandResult {
  success: boolean;
  error?: string;
}

// Error types
export class PathDepsError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PathDepsError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  DISCOVERY_ERROR = 'DISCOVERY_ERROR',
  UNRESOLVED_DEPENDENCY = 'UNRESOLVED_DEPENDENCY',
  DUPLICATE_PROJECT = 'DUPLICATE_PROJECT',
  PROJECT_NOT_FOUND = 'PROJECT_NOT_FOUND',
  AMBIGUOUS_PROJECT = 'AMBIGUOUS_PROJECT',
  DEPENDENCY_CYCLE = 'DEPENDENCY_CYCLE',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
