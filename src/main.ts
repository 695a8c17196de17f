#!/usr/bin/env node
/**
 * Production entry point for prefixrun.
 *
 * Wires real dependencies (filesystem, child processes, signals, logging)
 * into CliDeps and dispatches to the CLI.
 *
 * Usage:
 *   node dist/main.js --directory ./pipeline
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { loadConfig } from './core/config-loader.js';
import {
  configureLogging,
  createFileLogSink,
  createTeeSink,
  stderrSink,
  type LogLevel,
} from './core/logger.js';

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

function setupLogging(options: { level: LogLevel; logFile?: string }): () => void {
  if (options.logFile === undefined) {
    configureLogging({ level: options.level, sink: stderrSink });
    return () => {};
  }

  const fileSink = createFileLogSink(options.logFile);
  configureLogging({ level: options.level, sink: createTeeSink(stderrSink, fileSink) });
  return () => fileSink.close();
}

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main(): wires real deps and runs the CLI.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    cwd: process.cwd(),
    env: process.env,
    loadConfig,
    setupLogging,
  };

  return runCommand(parseArgs(argv), deps);
}

// ---------------------------------------------------------------------------
// Entry point, when executed directly
// ---------------------------------------------------------------------------

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

/* c8 ignore next 11 */
if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`prefixrun: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    },
  );
}
