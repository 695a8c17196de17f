/**
 * TOML-based configuration loader for prefixrun.
 *
 * Reads `.prefixrun.toml` from the pipeline directory (or an explicit
 * path), parses it with smol-toml, validates it against
 * CONFIG_JSON_SCHEMA with ajv, and applies defaults.
 */

import { parse as parseTOML } from 'smol-toml';
import _Ajv, { type ErrorObject } from 'ajv';
// ajv ESM interop: the constructor lives on `default`
const Ajv = _Ajv.default;
import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { CONFIG_JSON_SCHEMA } from '../types/config-schema.js';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from '../types/config.js';
import type { PrefixRunConfig, RawConfigFile } from '../types/config.js';
import { mergeExtensions } from './extension-map.js';
import { ConfigError } from './pipeline-error.js';

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<RawConfigFile>(CONFIG_JSON_SCHEMA);

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Result of loadConfig(). */
export interface LoadedConfig {
  config: PrefixRunConfig;
  /** Absolute path of the file that was read, or null when defaults apply. */
  source: string | null;
}

// ---------------------------------------------------------------------------
// resolveConfig()
// ---------------------------------------------------------------------------

/** Apply defaults to a schema-valid config file. */
export function resolveConfig(raw: RawConfigFile): PrefixRunConfig {
  return {
    extensions: mergeExtensions(raw.extensions),
    runner: {
      unknown_extension: raw.runner?.unknown_extension ?? DEFAULT_CONFIG.runner.unknown_extension,
      duplicate_prefix: raw.runner?.duplicate_prefix ?? DEFAULT_CONFIG.runner.duplicate_prefix,
    },
    logging: {
      level: raw.logging?.level ?? DEFAULT_CONFIG.logging.level,
    },
  };
}

// ---------------------------------------------------------------------------
// parseConfigText()
// ---------------------------------------------------------------------------

/**
 * Parse and validate the text of a config file.
 *
 * @param source - Where the text came from, used in error messages.
 * @throws ConfigError on TOML syntax errors or schema violations.
 */
export function parseConfigText(text: string, source: string): PrefixRunConfig {
  if (text.trim().length === 0) {
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = parseTOML(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(source, [reason], err);
  }

  if (!validateConfigFile(raw)) {
    throw new ConfigError(source, formatSchemaErrors(validateConfigFile.errors ?? []));
  }

  return resolveConfig(raw);
}

function formatSchemaErrors(errors: readonly ErrorObject[]): string[] {
  return errors.map((e) => {
    const at = e.instancePath === '' ? '(root)' : e.instancePath;
    const allowed =
      e.keyword === 'enum' && Array.isArray(e.params.allowedValues)
        ? ` (${e.params.allowedValues.join(', ')})`
        : '';
    return `${at} ${e.message ?? 'is invalid'}${allowed}`;
  });
}

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load configuration for a pipeline directory.
 *
 * Without `configPath`, reads `<directory>/.prefixrun.toml` if it exists
 * and falls back to DEFAULT_CONFIG otherwise. With `configPath`, the file
 * must exist.
 */
export function loadConfig(directory: string, configPath?: string): LoadedConfig {
  const path = configPath !== undefined ? resolve(configPath) : join(directory, CONFIG_FILE_NAME);

  if (!existsSync(path)) {
    if (configPath !== undefined) {
      throw new ConfigError(path, ['file not found']);
    }
    return { config: DEFAULT_CONFIG, source: null };
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(path, [reason], err);
  }

  return { config: parseConfigText(text, path), source: path };
}
