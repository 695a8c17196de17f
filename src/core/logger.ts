/**
 * Structured JSON logging for prefixrun.
 *
 * Provides component-scoped loggers with level filtering and injectable
 * sinks for testing. Every entry is one JSON object with level, ts,
 * component and msg fields; step context (order, file) is promoted
 * to top-level fields.
 *
 * Entries go to stderr by default. Stdout belongs to the pipeline steps.
 *
 * @example
 * ```ts
 * const logger = createLogger('runner');
 * logger.info('step started', { order: 2, file: '2-load.py' });
 * // → {"level":"info","ts":"...","component":"runner","msg":"step started","order":2,"file":"2-load.py"}
 * ```
 */

import { mkdirSync, appendFileSync } from 'node:fs';
import { dirname } from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  order?: number;
  file?: string;
  duration_ms?: number;
  exit_code?: number;
  error_code?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  order?: number;
  file?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'warn';
let globalSink: LogSink = defaultSink;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: warn, sink: stderr JSON). */
export function resetLogging(): void {
  globalLevel = 'warn';
  globalSink = defaultSink;
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

function defaultSink(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n');
}

/** The stderr JSON sink used when nothing else is configured. */
export const stderrSink: LogSink = defaultSink;

/** Forward every entry to each of the given sinks, in order. */
export function createTeeSink(...sinks: LogSink[]): LogSink {
  return (entry) => {
    for (const sink of sinks) {
      sink(entry);
    }
  };
}

/** A LogSink that appends JSONL to a file, with a close() method. */
export interface FileLogSink extends LogSink {
  (entry: LogEntry): void;
  close(): void;
}

/**
 * Create a LogSink that appends JSONL to the file at `filePath`,
 * creating its parent directory first.
 *
 * @param fs - Optional filesystem abstraction for testing.
 */
export function createFileLogSink(
  filePath: string,
  fs?: {
    mkdirSync: (path: string, options: { recursive: boolean }) => void;
    appendFileSync: (path: string, data: string) => void;
  },
): FileLogSink {
  const fsMkdir = fs?.mkdirSync ?? mkdirSync;
  const fsAppend = fs?.appendFileSync ?? appendFileSync;

  fsMkdir(dirname(filePath), { recursive: true });

  let closed = false;

  const write = (entry: LogEntry): void => {
    if (closed) return;
    fsAppend(filePath, JSON.stringify(entry) + '\n');
  };

  return Object.assign(write, {
    close: () => {
      closed = true;
    },
  });
}

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

const PROMOTED_KEYS = new Set(['order', 'file', 'duration_ms', 'exit_code', 'error_code']);

/**
 * Drop promoted keys, truncate long strings and serialize Errors.
 */
function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> | undefined {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (PROMOTED_KEYS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'runner'`, `'runner:process'`).
 * @param boundContext - Context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      if (boundContext.order !== undefined) entry.order = boundContext.order;
      if (boundContext.file !== undefined) entry.file = boundContext.file;
    }

    if (meta) {
      if (typeof meta.order === 'number') entry.order = meta.order;
      if (typeof meta.file === 'string') entry.file = meta.file;
      if (typeof meta.duration_ms === 'number') entry.duration_ms = meta.duration_ms;
      if (typeof meta.exit_code === 'number') entry.exit_code = meta.exit_code;
      if (typeof meta.error_code === 'string') entry.error_code = meta.error_code;

      const remaining = sanitizeMeta(meta);
      if (remaining !== undefined) {
        entry.meta = remaining;
      }
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => createLogger(component, { ...boundContext, ...ctx }),
  };
}
