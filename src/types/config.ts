/**
 * prefixrun configuration types: the extension map, run policies, and
 * the parsed form of `.prefixrun.toml`.
 */

import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// ExtensionMap
// ---------------------------------------------------------------------------

/**
 * File extension (leading dot included, case-sensitive) to the command
 * tokens that run a file with that extension.
 */
export type ExtensionMap = Readonly<Record<string, readonly string[]>>;

// ---------------------------------------------------------------------------
// Policies
// ---------------------------------------------------------------------------

/**
 * What to do with a step whose extension has no command.
 *
 * - `abort`: fail the run before any step executes.
 * - `skip`: log a warning, leave the step out, run the rest.
 */
export type UnknownExtensionPolicy = 'abort' | 'skip';

/**
 * What to do when two files share a prefix.
 *
 * - `sort`: run both, ordered by filename.
 * - `error`: refuse to run the pipeline.
 */
export type DuplicatePrefixPolicy = 'sort' | 'error';

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

/** Name of the optional config file looked up in the pipeline directory. */
export const CONFIG_FILE_NAME = '.prefixrun.toml';

/** `[runner]` section of `.prefixrun.toml`. */
export interface RunnerConfig {
  unknown_extension: UnknownExtensionPolicy;
  duplicate_prefix: DuplicatePrefixPolicy;
}

/** `[logging]` section of `.prefixrun.toml`. */
export interface LoggingConfig {
  level: LogLevel;
}

/** Fully resolved configuration file contents. */
export interface PrefixRunConfig {
  extensions: ExtensionMap;
  runner: RunnerConfig;
  logging: LoggingConfig;
}

/** Shape of `.prefixrun.toml` before defaults are applied. */
export interface RawConfigFile {
  extensions?: Record<string, string[]>;
  runner?: Partial<RunnerConfig>;
  logging?: Partial<LoggingConfig>;
}

/** Configuration used when no config file is present. */
export const DEFAULT_CONFIG: PrefixRunConfig = {
  extensions: {},
  runner: { unknown_extension: 'abort', duplicate_prefix: 'sort' },
  logging: { level: 'warn' },
};
