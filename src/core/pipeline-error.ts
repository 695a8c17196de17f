/**
 * Typed errors raised while discovering, planning and running a pipeline.
 *
 * Every failure extends PrefixRunError, which carries a machine-readable
 * code and the exit status the CLI should report. Callers branch on the
 * concrete subclass (or on `code`) to decide what to show the operator.
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ErrorCode, ERROR_EXIT_CODES } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Brand used by isPrefixRunError(). Survives duplicate copies of this
 * module, where instanceof would not.
 */
const PREFIXRUN_ERROR_BRAND = Symbol.for('prefixrun.PrefixRunError');

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/** Options for constructing a PrefixRunError. */
export interface PrefixRunErrorOptions {
  code: ErrorCodeValue;
  message: string;
  /** Overrides the default exit status for `code`. */
  exitCode?: number;
  /** Order of the step involved, when there is one. */
  order?: number;
  /** Filename of the step involved, when there is one. */
  file?: string;
  cause?: unknown;
}

export class PrefixRunError extends Error {
  readonly code: ErrorCodeValue;
  readonly exitCode: number;
  readonly order?: number;
  readonly file?: string;

  /** @internal */
  readonly [PREFIXRUN_ERROR_BRAND] = true as const;

  constructor(options: PrefixRunErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PrefixRunError';
    this.code = options.code;
    this.exitCode = options.exitCode ?? ERROR_EXIT_CODES[options.code];

    if (options.order !== undefined) {
      this.order = options.order;
    }
    if (options.file !== undefined) {
      this.file = options.file;
    }
  }

  toErrorPayload(): ErrorPayload {
    const payload: ErrorPayload = {
      code: this.code,
      message: this.message,
      exit_code: this.exitCode,
    };

    if (this.order !== undefined) {
      payload.order = this.order;
    }
    if (this.file !== undefined) {
      payload.file = this.file;
    }

    return payload;
  }
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export type DirectoryProblem = 'missing' | 'not-a-directory' | 'unreadable';

export class DirectoryNotFoundError extends PrefixRunError {
  readonly directory: string;
  readonly reason: DirectoryProblem;

  constructor(directory: string, reason: DirectoryProblem, cause?: unknown) {
    const detail =
      reason === 'missing'
        ? 'does not exist'
        : reason === 'not-a-directory'
          ? 'is not a directory'
          : 'cannot be read';
    super({
      code: ErrorCode.DIRECTORY_NOT_FOUND,
      message: `Pipeline directory ${directory} ${detail}`,
      cause,
    });
    this.name = 'DirectoryNotFoundError';
    this.directory = directory;
    this.reason = reason;
  }
}

export class DuplicatePrefixError extends PrefixRunError {
  /** Filenames sharing the prefix, in tie-break order. */
  readonly files: readonly string[];

  constructor(order: number, files: readonly string[]) {
    super({
      code: ErrorCode.DUPLICATE_PREFIX,
      message: `Prefix ${order} is shared by ${files.join(', ')}`,
      order,
    });
    this.name = 'DuplicatePrefixError';
    this.files = files;
  }
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

export class UnknownExtensionError extends PrefixRunError {
  readonly extension: string;

  constructor(order: number, file: string, extension: string) {
    const shown = extension === '' ? '(none)' : `"${extension}"`;
    super({
      code: ErrorCode.UNKNOWN_EXTENSION,
      message: `No command is mapped for extension ${shown} of ${file}`,
      order,
      file,
    });
    this.name = 'UnknownExtensionError';
    this.extension = extension;
  }
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export class StepFailedError extends PrefixRunError {
  declare readonly order: number;
  declare readonly file: string;
  /** Signal that terminated the child, or null when it exited on its own. */
  readonly signal: NodeJS.Signals | null;

  constructor(order: number, file: string, exitCode: number, signal: NodeJS.Signals | null = null) {
    const how = signal ? `was terminated by ${signal}` : `exited with status ${exitCode}`;
    super({
      code: ErrorCode.STEP_FAILED,
      message: `Step ${order} (${file}) ${how}`,
      exitCode,
      order,
      file,
    });
    this.name = 'StepFailedError';
    this.signal = signal;
  }
}

export class StepLaunchError extends PrefixRunError {
  declare readonly order: number;
  declare readonly file: string;
  readonly command: string;

  constructor(order: number, file: string, command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super({
      code: ErrorCode.STEP_LAUNCH_FAILED,
      message: `Step ${order} (${file}) could not start "${command}": ${reason}`,
      order,
      file,
      cause,
    });
    this.name = 'StepLaunchError';
    this.command = command;
  }
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export class ConfigError extends PrefixRunError {
  readonly source: string;

  constructor(source: string, problems: readonly string[], cause?: unknown) {
    super({
      code: ErrorCode.CONFIG_INVALID,
      message: `Invalid configuration in ${source}: ${problems.join('; ')}`,
      cause,
    });
    this.name = 'ConfigError';
    this.source = source;
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/** True for any PrefixRunError, including instances from another copy of this module. */
export function isPrefixRunError(value: unknown): value is PrefixRunError {
  if (value instanceof PrefixRunError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    PREFIXRUN_ERROR_BRAND in value &&
    value[PREFIXRUN_ERROR_BRAND] === true
  );
}
