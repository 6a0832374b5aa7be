/**
 * Path-dependency extraction.
 *
 * Line-oriented, not a manifest parser: any line that, once whitespace is
 * removed, contains `path="<value>"` declares a dependency on `<value>`
 * relative to the manifest's directory. Known misses:
 *   - values with uppercase letters or characters outside `a-z 0-9 _ / . -`
 *   - declarations spread over several lines
 *   - several `path=` assignments on one line (only the last one counts)
 */

import { isAbsolute, join, normalize, resolve } from 'path';
import { MANIFEST_SYNTAX } from '../../constants/index.js';
import { isDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * Raw `path="..."` values declared by a manifest, in line order
 */
export function scanPathDeclarations(manifestText: string): string[] {
  const declared: string[] = [];
  for (const rawLine of manifestText.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim();
    if (line.startsWith(MANIFEST_SYNTAX.COMMENT_MARKER)) {
      continue;
    }
    const compact = line.replace(/\s+/g, '');
    const match = MANIFEST_SYNTAX.PATH_DEPENDENCY.exec(compact);
    if (match) {
      declared.push(match[1]);
    } else if (compact.includes('path=')) {
      logger.debug(`Ignoring unrecognized path declaration: ${compact}`);
    }
  }
  return declared;
}

/**
 * Project key of a root-relative directory: `.` and `..` segments collapsed,
 * no trailing separator, `.` for the root itself
 */
export function normalizeProjectDir(dir: string): string {
  const normalized = normalize(dir);
  const trimmed = normalized.length > 1 ? normalized.replace(/[\\/]+$/, '') : normalized;
  return trimmed === '' ? '.' : trimmed;
}

/**
 * Resolve a declared value against the manifest's directory into a project key.
 * An absolute value is taken as-is and can never match a registered project.
 */
export function resolveDeclaredPath(manifestDir: string, declared: string): string {
  return normalizeProjectDir(isAbsolute(declared) ? declared : join(manifestDir, declared));
}

/**
 * Path dependencies of one manifest as root-relative directory keys.
 * Targets that do not exist as directories under rootDir are dropped.
 */
export async function extractPathDependencies(
  manifestText: string,
  manifestDir: string,
  rootDir: string
): Promise<string[]> {
  const dependencies: string[] = [];
  for (const declared of scanPathDeclarations(manifestText)) {
    const dependencyDir = resolveDeclaredPath(manifestDir, declared);
    if (await isDirectory(resolve(rootDir, dependencyDir))) {
      dependencies.push(dependencyDir);
    } else {
      logger.debug(`Dropping missing path dependency: ${dependencyDir}`, { manifestDir });
    }
  }
  return dependencies;
}
