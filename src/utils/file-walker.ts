/**
 * File Walker Utility
 *
 * Deterministic, top-down traversal of a directory tree. Within a directory
 * entries are visited in byte-wise name order, and the directory's own files
 * are yielded before anything from its subdirectories. A symbolic link to a
 * file is yielded like the file itself; links to directories are never
 * descended into, and dangling links are skipped. Read failures propagate as
 * DiscoveryError.
 */

import { promises as fs, Dirent } from 'fs';
import { join } from 'path';
import { DiscoveryError } from './errors.js';
import { logger } from './logger.js';

/**
 * Filter predicate for file walking. Returning false for a directory prunes
 * the whole subtree.
 */
export type FileFilter = (path: string, isDirectory: boolean) => boolean;

/**
 * Options for file walking
 */
export interface WalkOptions {
  filter?: FileFilter;
}

async function isLinkToFile(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile();
  } catch (error) {
    logger.debug(`Skipping dangling symbolic link: ${path}`, { error: String(error) });
    return false;
  }
}

function compareNames(a: Dirent, b: Dirent): number {
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Async generator that walks a directory tree and yields file paths
 *
 * @example
 * for await (const filePath of walkFiles('/path/to/dir')) {
 *   console.log(filePath);
 * }
 */
export async function* walkFiles(
  dir: string,
  options: WalkOptions = {}
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new DiscoveryError(`Failed to read directory: ${dir}`, { dir, error: String(error) });
  }
  entries.sort(compareNames);

  const subdirs: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isSymbolicLink()) {
      if (await isLinkToFile(fullPath) && (!options.filter || options.filter(fullPath, false))) {
        yield fullPath;
      }
      continue;
    }

    const isDirectory = entry.isDirectory();
    if (options.filter && !options.filter(fullPath, isDirectory)) {
      continue;
    }

    if (isDirectory) {
      subdirs.push(fullPath);
    } else if (entry.isFile()) {
      yield fullPath;
    }
  }

  for (const subdir of subdirs) {
    yield* walkFiles(subdir, options);
  }
}

/**
 * Walk directory and collect all files into an array
 */
export async function collectFiles(
  dir: string,
  options: WalkOptions = {}
): Promise<string[]> {
  const files: string[] = [];

  for await (const filePath of walkFiles(dir, options)) {
    files.push(filePath);
  }

  return files;
}
