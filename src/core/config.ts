import { join, resolve } from 'path';
import jsonc, { type ParseError } from 'jsonc-parser';
import type { AnalysisOptions, PathDepsConfig } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { exists, readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration for a pathdeps run.
 *
 * Precedence is CLI flags, then `pathdeps.jsonc` / `pathdeps.json` in the
 * scanned directory, then built-in defaults.
 */

const KNOWN_KEYS = new Set(['manifest', 'exclude', 'root']);

export interface AnalysisFlags {
  manifest?: string;
  exclude?: string[];
  root?: string;
}

/**
 * Find the config file in a directory, if any
 */
export async function findConfigFile(dir: string): Promise<string | null> {
  for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
    const path = join(dir, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Validate parsed config content
 */
export function validateConfig(raw: unknown, source: string): PathDepsConfig {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError(`Invalid configuration in ${source}: expected an object`, { source });
  }

  const config: PathDepsConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.debug(`Ignoring unknown config key '${key}'`, { source });
      continue;
    }
    if (key === 'exclude') {
      if (!isStringArray(value)) {
        throw new ConfigError(`Invalid configuration in ${source}: 'exclude' must be an array of strings`, { source });
      }
      config.exclude = value;
    } else {
      if (typeof value !== 'string' || value.length === 0) {
        throw new ConfigError(`Invalid configuration in ${source}: '${key}' must be a non-empty string`, { source });
      }
      if (key === 'manifest') {
        config.manifest = value;
      } else {
        config.root = value;
      }
    }
  }
  return config;
}

/**
 * Load the config file of a scanned directory; an absent file is an empty config
 */
export async function loadConfig(dir: string): Promise<PathDepsConfig> {
  const configPath = await findConfigFile(dir);
  if (!configPath) {
    logger.debug('Config file not found, using defaults', { dir });
    return {};
  }

  logger.debug(`Loading config from: ${configPath}`);
  const content = await readTextFile(configPath);
  const errors: ParseError[] = [];
  const raw: unknown = jsonc.parse(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const reasons = errors.map((e) => `${jsonc.printParseErrorCode(e.error)} at offset ${e.offset}`);
    throw new ConfigError(`Failed to parse ${configPath}: ${reasons.join(', ')}`, { configPath });
  }
  return validateConfig(raw, configPath);
}

/**
 * Merge flags, config and defaults into the options of one run
 */
export async function resolveAnalysisOptions(
  dir: string | undefined,
  flags: AnalysisFlags
): Promise<AnalysisOptions> {
  const rootDir = resolve(process.cwd(), dir ?? '.');
  const config = await loadConfig(rootDir);

  const options: AnalysisOptions = {
    rootDir,
    manifestName: flags.manifest ?? config.manifest ?? FILE_PATTERNS.DEFAULT_MANIFEST,
    exclude: flags.exclude && flags.exclude.length > 0 ? flags.exclude : config.exclude ?? [],
    root: flags.root ?? config.root
  };
  logger.debug('Resolved analysis options', options);
  return options;
}
