/**
 * prefixrun CLI.
 *
 *   prefixrun [--directory <path>] [options]
 *
 * Runs the prefixed files of a directory in order. The tool prints
 * nothing of its own except errors, unless `--dry-run`, `--report` or a
 * more verbose log level asks for it.
 *
 * All external dependencies are injected via {@link CliDeps} for
 * testability. `main()` wires the production ones.
 */

import { resolve } from 'node:path';
import { VERSION } from './index.js';
import { formatCommandLine, type ExecutionPlan } from './core/command-resolver.js';
import type { LoadedConfig } from './core/config-loader.js';
import { compareSteps, type DiscoveryFs } from './core/discoverer.js';
import { parseExtensionSpec } from './core/extension-map.js';
import { createLogger, isLogLevel, type LogLevel } from './core/logger.js';
import { isPrefixRunError } from './core/pipeline-error.js';
import type { SignalSubscribeFn, SpawnFn } from './core/process-runner.js';
import { renderTable, type Clock } from './core/run-report.js';
import { PrefixRun } from './prefix-run.js';
import { ErrorCode, ERROR_EXIT_CODES } from './types/errors.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for the CLI. */
export interface CliDeps {
  /** Write a line to stdout. */
  stdout: (msg: string) => void;
  /** Write a line to stderr. */
  stderr: (msg: string) => void;
  /** Directory that relative paths are resolved against. */
  cwd: string;
  env: Readonly<Record<string, string | undefined>>;
  /** Load `.prefixrun.toml` (or an explicit config file). */
  loadConfig: (directory: string, configPath?: string) => LoadedConfig;
  /** Point logging at stderr (and `logFile`, if given); returns a function that closes the file. */
  setupLogging: (options: { level: LogLevel; logFile?: string }) => () => void;
  spawn?: SpawnFn;
  signals?: SignalSubscribeFn;
  fs?: DiscoveryFs;
  clock?: Clock;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Options that take a value, as `--name value` or `--name=value`. */
const VALUE_OPTIONS: ReadonlySet<string> = new Set(['directory', 'config', 'ext', 'log-file']);

/** Options that may be given more than once. */
const REPEATABLE_OPTIONS: ReadonlySet<string> = new Set(['ext']);

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  'skip-unknown',
  'strict-prefixes',
  'dry-run',
  'report',
  'verbose',
  'debug',
  'help',
  'version',
]);

/** Parsed CLI arguments. */
export interface ParsedArgs {
  flags: Record<string, boolean>;
  /** Values of value options, in the order given. */
  options: Record<string, string[]>;
  /** Problems found while parsing; non-empty means a usage error. */
  errors: string[];
}

/**
 * Parse process.argv.
 *
 * Expects argv in the form: [node, script, ...args]. Never throws;
 * problems are collected in `errors`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  const options: Record<string, string[]> = {};
  const errors: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('--') || arg === '--') {
      errors.push(`Unexpected argument: "${arg}"`);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (BOOLEAN_FLAGS.has(name)) {
      if (eq !== -1) {
        errors.push(`Option --${name} does not take a value`);
      } else {
        flags[name] = true;
      }
      continue;
    }

    if (!VALUE_OPTIONS.has(name)) {
      errors.push(`Unknown option: --${name}`);
      continue;
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < args.length) {
      value = args[++i];
    } else {
      errors.push(`Option --${name} requires a value`);
      continue;
    }

    const seen = options[name] ?? [];
    if (seen.length > 0 && !REPEATABLE_OPTIONS.has(name)) {
      errors.push(`Option --${name} given more than once`);
      continue;
    }
    options[name] = [...seen, value];
  }

  return { flags, options, errors };
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

export const USAGE = `Usage: prefixrun [options]

Runs every file in a directory whose name starts with <integer>- (or _ or .),
in order of the integer, with a command chosen by the file's extension.

Options:
  --directory <path>    Directory to scan (default: current directory)
  --config <path>       Config file (default: <directory>/.prefixrun.toml)
  --ext <.ext=command>  Add or override a command, e.g. --ext ".hql=hive -f"
  --skip-unknown        Skip files whose extension has no command
  --strict-prefixes     Fail when two files share a prefix
  --dry-run             Print the steps and their commands; run nothing
  --report              Print a timing table to stderr after the run
  --log-file <path>     Also write JSON logs to a file
  --verbose             Log progress to stderr
  --debug               Log everything to stderr
  --version             Show version number
  --help                Show this help message

Default commands:
  .hql    hive -f
  .py     python
  .R      Rscript
  .scala  scala
  .sh     bash`;

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

/**
 * Run the CLI with parsed arguments.
 *
 * @returns Process exit code: 0 on success, the failing step's exit
 *   status when a step fails, 2 for usage errors, otherwise non-zero.
 */
export async function runCommand(args: ParsedArgs, deps: CliDeps): Promise<number> {
  if (args.errors.length > 0) {
    for (const error of args.errors) {
      deps.stderr(`prefixrun: ${error}`);
    }
    deps.stderr('Run "prefixrun --help" for usage.');
    return ERROR_EXIT_CODES[ErrorCode.USAGE];
  }

  if (args.flags['help']) {
    deps.stdout(USAGE);
    return 0;
  }

  if (args.flags['version']) {
    deps.stdout(VERSION);
    return 0;
  }

  const directory = resolve(deps.cwd, args.options['directory']?.[0] ?? '.');
  const configPath = args.options['config']?.[0];
  let closeLogging: (() => void) | undefined;

  try {
    const { config, source } = deps.loadConfig(
      directory,
      configPath === undefined ? undefined : resolve(deps.cwd, configPath),
    );

    const envLevel = deps.env['PREFIXRUN_LOG_LEVEL'];
    const level: LogLevel = args.flags['debug']
      ? 'debug'
      : args.flags['verbose']
        ? 'info'
        : isLogLevel(envLevel)
          ? envLevel
          : config.logging.level;
    const logFile = args.options['log-file']?.[0];
    closeLogging = deps.setupLogging({
      level,
      logFile: logFile === undefined ? undefined : resolve(deps.cwd, logFile),
    });

    const logger = createLogger('cli');
    if (envLevel !== undefined && !isLogLevel(envLevel)) {
      logger.warn('ignoring invalid PREFIXRUN_LOG_LEVEL', { value: envLevel });
    }
    logger.debug('configuration loaded', { source: source ?? '(defaults)', directory });

    const extensions = Object.fromEntries((args.options['ext'] ?? []).map(parseExtensionSpec));

    const pipeline = new PrefixRun({
      directory,
      config,
      extensions,
      unknownExtension: args.flags['skip-unknown'] ? 'skip' : undefined,
      duplicatePrefix: args.flags['strict-prefixes'] ? 'error' : undefined,
      spawn: deps.spawn,
      signals: deps.signals,
      fs: deps.fs,
      clock: deps.clock,
    });

    if (args.flags['dry-run']) {
      deps.stdout(formatPlan(pipeline.plan()));
      return 0;
    }

    try {
      await pipeline.run();
    } finally {
      if (args.flags['report'] && pipeline.lastReport) {
        deps.stderr(pipeline.lastReport.toTable());
      }
    }
    return 0;
  } catch (err) {
    if (isPrefixRunError(err)) {
      createLogger('cli').info('pipeline failed', { ...err.toErrorPayload() });
      deps.stderr(`prefixrun: ${err.message}`);
      return err.exitCode;
    }
    deps.stderr(`prefixrun: unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  } finally {
    closeLogging?.();
  }
}

/** Render a plan for `--dry-run`. */
export function formatPlan(plan: ExecutionPlan): string {
  if (plan.steps.length === 0 && plan.skipped.length === 0) {
    return `No prefixed files found in ${plan.directory}`;
  }

  const rows = [
    ...plan.steps.map((p) => ({ step: p.step, command: formatCommandLine(p) })),
    ...plan.skipped.map((s) => ({
      step: s.step,
      command: `(skipped: no command for ${s.extension === '' ? 'files without an extension' : s.extension})`,
    })),
  ]
    .sort((a, b) => compareSteps(a.step, b.step))
    .map(({ step, command }) => [String(step.order), step.filename, command]);

  return renderTable(['Order', 'File name', 'Command'], rows, ['right', 'left', 'left']);
}
