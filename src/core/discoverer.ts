/**
 * Pipeline step discovery.
 *
 * Lists the direct entries of a directory and keeps the regular files
 * whose names start with `<integer><separator>`, where the separator is
 * one of `-`, `_` or `.`. Steps are ordered by the integer, then by
 * filename, so the result never depends on the order the filesystem
 * happens to list entries in.
 */

import { readdirSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { DuplicatePrefixPolicy } from '../types/config.js';
import { createLogger, type Logger } from './logger.js';
import { DirectoryNotFoundError, DuplicatePrefixError } from './pipeline-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One file to execute, paired with its position in the pipeline. */
export interface PipelineStep {
  /** Parsed integer prefix. */
  readonly order: number;
  /** Entry name inside the pipeline directory. */
  readonly filename: string;
  /** Absolute path to the file. */
  readonly filepath: string;
}

export type EntryKind = 'file' | 'directory' | 'other';

/** Filesystem access used by discovery (injectable for testing). */
export interface DiscoveryFs {
  /** Kind of the entry at `path`, following symlinks. Throws when it cannot be stat'ed. */
  kindOf(path: string): EntryKind;
  /** Names of the direct entries of a directory. */
  readdir(path: string): string[];
}

export interface DiscoverOptions {
  /** Defaults to `'sort'`. */
  duplicatePrefix?: DuplicatePrefixPolicy;
  fs?: DiscoveryFs;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Prefix parsing
// ---------------------------------------------------------------------------

/** `<digits><separator><at least one more character>` */
export const PREFIX_PATTERN = /^(\d+)[-_.](.+)$/;

/**
 * Parse the integer prefix of a filename.
 *
 * Leading zeros are allowed and ignored (`007-x` → 7). Returns null when
 * the name has no prefix, or when the prefix is too large to represent
 * exactly.
 */
export function parsePrefix(name: string): { order: number; rest: string } | null {
  const match = PREFIX_PATTERN.exec(name);
  if (!match) return null;

  const order = Number(match[1]);
  if (!Number.isSafeInteger(order)) return null;

  return { order, rest: match[2] };
}

/** Order by prefix, then by filename (code-unit order). */
export function compareSteps(a: PipelineStep, b: PipelineStep): number {
  if (a.order !== b.order) return a.order - b.order;
  if (a.filename < b.filename) return -1;
  if (a.filename > b.filename) return 1;
  return 0;
}

// ---------------------------------------------------------------------------
// Default filesystem
// ---------------------------------------------------------------------------

export const nodeDiscoveryFs: DiscoveryFs = {
  kindOf(path) {
    const stats = statSync(path);
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
  },
  readdir(path) {
    return readdirSync(path);
  },
};

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function isAccessError(err: unknown): boolean {
  const code = errnoCode(err);
  return code === 'EACCES' || code === 'EPERM';
}

// ---------------------------------------------------------------------------
// discoverSteps()
// ---------------------------------------------------------------------------

/**
 * Find the pipeline steps in `directory`.
 *
 * @throws DirectoryNotFoundError if the directory is missing, is not a
 *   directory, or cannot be listed.
 * @throws DuplicatePrefixError if two files share a prefix and the
 *   policy is `'error'`.
 */
export function discoverSteps(directory: string, options: DiscoverOptions = {}): PipelineStep[] {
  const fs = options.fs ?? nodeDiscoveryFs;
  const logger = options.logger ?? createLogger('discoverer');
  const root = resolve(directory);

  let kind: EntryKind;
  try {
    kind = fs.kindOf(root);
  } catch (err) {
    throw new DirectoryNotFoundError(root, isAccessError(err) ? 'unreadable' : 'missing', err);
  }
  if (kind !== 'directory') {
    throw new DirectoryNotFoundError(root, 'not-a-directory');
  }

  let names: string[];
  try {
    names = fs.readdir(root);
  } catch (err) {
    throw new DirectoryNotFoundError(root, isAccessError(err) ? 'unreadable' : 'missing', err);
  }

  const steps: PipelineStep[] = [];
  for (const name of names) {
    const prefix = parsePrefix(name);
    if (!prefix) {
      if (PREFIX_PATTERN.test(name)) {
        logger.debug('skipping entry whose prefix is too large', { file: name });
      }
      continue;
    }

    const filepath = join(root, name);
    let entryKind: EntryKind;
    try {
      entryKind = fs.kindOf(filepath);
    } catch (err) {
      // Dangling symlink or entry removed since readdir
      logger.debug('skipping entry that cannot be stat-ed', { file: name, error: err });
      continue;
    }
    if (entryKind !== 'file') {
      logger.debug('skipping prefixed entry that is not a file', { file: name, kind: entryKind });
      continue;
    }

    steps.push(Object.freeze({ order: prefix.order, filename: name, filepath }));
  }

  steps.sort(compareSteps);

  const duplicates = findDuplicatePrefixes(steps);
  for (const [order, files] of duplicates) {
    if (options.duplicatePrefix === 'error') {
      throw new DuplicatePrefixError(order, files);
    }
    logger.info('steps share a prefix, running them by filename', { order, files });
  }

  logger.debug('discovered steps', { directory: root, count: steps.length });
  return steps;
}

/** Prefixes used by more than one step, with their files in run order. */
export function findDuplicatePrefixes(sorted: readonly PipelineStep[]): Map<number, string[]> {
  const byOrder = new Map<number, string[]>();
  for (const step of sorted) {
    const files = byOrder.get(step.order);
    if (files) {
      files.push(step.filename);
    } else {
      byOrder.set(step.order, [step.filename]);
    }
  }

  for (const [order, files] of byOrder) {
    if (files.length < 2) byOrder.delete(order);
  }
  return byOrder;
}
