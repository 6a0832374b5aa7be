/**
 * Shared constants for the pathdeps CLI
 */

export const FILE_PATTERNS = {
  /** Manifest looked for when neither a flag nor the config names one */
  DEFAULT_MANIFEST: 'Cargo.toml',
  /** Config files, in lookup order */
  CONFIG_FILES: ['pathdeps.jsonc', 'pathdeps.json']
} as const;

export const MANIFEST_SYNTAX = {
  COMMENT_MARKER: '#',
  /**
   * A `path="<value>"` assignment anywhere in a whitespace-stripped line.
   * Only lowercase letters, digits and `_ / . -` are accepted in the value;
   * uppercase letters, `~`, `\` or any other character make the line a miss.
   * The leading `.*` is greedy, so the last assignment on a line wins.
   */
  PATH_DEPENDENCY: /^.*path="([a-z0-9_/.-]*)".*$/
} as const;

export const REPORT_HEADERS = {
  UNUSED: '[unneeded]',
  SINGLE_CONSUMER: '[needed by only 1]'
} as const;

export const TREE_INDENT = '  ';

export const ENV_VARS = {
  VERBOSE: 'PATHDEPS_VERBOSE'
} as const;
