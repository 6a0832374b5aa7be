import { basename, relative } from 'path';
import { minimatch } from 'minimatch';
import { walkFiles, type FileFilter } from '../../utils/file-walker.js';
import { logger } from '../../utils/logger.js';

export interface LocateOptions {
  manifestName: string;
  /** Globs matched against directory paths relative to the root */
  exclude?: string[];
}

function createManifestFilter(rootDir: string, options: LocateOptions): FileFilter {
  const exclude = options.exclude ?? [];
  return (path, isDirectory) => {
    if (!isDirectory) {
      return basename(path) === options.manifestName;
    }
    const relativeDir = relative(rootDir, path);
    const excluded = exclude.some((pattern) => minimatch(relativeDir, pattern, { dot: true }));
    if (excluded) {
      logger.debug(`Skipping excluded directory: ${relativeDir}`);
    }
    return !excluded;
  };
}

/**
 * Find every manifest below rootDir, the root itself included.
 *
 * Returns paths relative to rootDir in walk order: a directory's own manifest
 * comes before those of its subdirectories, siblings in name order.
 */
export async function locateManifests(rootDir: string, options: LocateOptions): Promise<string[]> {
  const manifests: string[] = [];
  for await (const filePath of walkFiles(rootDir, { filter: createManifestFilter(rootDir, options) })) {
    manifests.push(relative(rootDir, filePath));
  }
  logger.debug(`Found ${manifests.length} ${options.manifestName} manifest(s)`, { rootDir });
  return manifests;
}
