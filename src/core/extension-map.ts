/**
 * Built-in extension map and merging of caller-supplied entries.
 *
 * The extension map is a value, not a registry: DEFAULT_EXTENSIONS is
 * frozen, and each merge returns a new frozen map in which later sources
 * replace earlier ones key by key.
 */

import type { ExtensionMap } from '../types/config.js';
import { ConfigError } from './pipeline-error.js';

/** Commands used when nothing overrides them. */
export const DEFAULT_EXTENSIONS: ExtensionMap = Object.freeze({
  '.hql': Object.freeze(['hive', '-f']),
  '.py': Object.freeze(['python']),
  '.R': Object.freeze(['Rscript']),
  '.scala': Object.freeze(['scala']),
  '.sh': Object.freeze(['bash']),
});

/** A dot followed by characters other than dots and path separators. */
export const EXTENSION_PATTERN = /^\.[^./\\]+$/;

/**
 * Merge extension maps left to right.
 *
 * @throws ConfigError if an entry has a malformed extension or an empty command.
 */
export function mergeExtensions(...maps: ReadonlyArray<ExtensionMap | undefined>): ExtensionMap {
  const merged: Record<string, readonly string[]> = {};
  for (const map of maps) {
    if (!map) continue;
    for (const [extension, command] of Object.entries(map)) {
      const problem = checkEntry(extension, command);
      if (problem) {
        throw new ConfigError('extension map', [problem]);
      }
      merged[extension] = Object.freeze([...command]);
    }
  }
  return Object.freeze(merged);
}

function checkEntry(extension: string, command: readonly string[]): string | null {
  if (!EXTENSION_PATTERN.test(extension)) {
    return `"${extension}" is not an extension like ".py"`;
  }
  if (command.length === 0) {
    return `"${extension}" maps to an empty command`;
  }
  if (command.some((token) => token.length === 0)) {
    return `"${extension}" has an empty command token`;
  }
  return null;
}

/**
 * Parse a command-line mapping such as `.hql=hive -f` into one entry.
 * The command is split on whitespace.
 *
 * @throws ConfigError if the text has no `=` or either side is empty.
 */
export function parseExtensionSpec(spec: string): [string, string[]] {
  const eq = spec.indexOf('=');
  const extension = eq === -1 ? '' : spec.slice(0, eq).trim();
  const command = eq === -1 ? [] : spec.slice(eq + 1).trim().split(/\s+/).filter(Boolean);

  if (extension === '' || command.length === 0) {
    throw new ConfigError('--ext', [`expected ".ext=command [args]", got "${spec}"`]);
  }
  const problem = checkEntry(extension, command);
  if (problem) {
    throw new ConfigError('--ext', [problem]);
  }
  return [extension, command];
}
