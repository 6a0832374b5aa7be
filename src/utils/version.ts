import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './logger.js';

/**
 * Read the CLI version from package.json. Both src/utils and dist/utils sit
 * two levels below the package root.
 */
export function getVersion(): string {
  try {
    const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { error: String(error) });
  }
  return '0.0.0';
}
