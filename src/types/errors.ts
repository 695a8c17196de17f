/**
 * Error codes shared by every prefixrun failure.
 *
 * Each code maps to a default process exit code used by the CLI. A failed
 * step overrides the default with the child's own exit status.
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  DIRECTORY_NOT_FOUND: 'DIRECTORY_NOT_FOUND',
  UNKNOWN_EXTENSION: 'UNKNOWN_EXTENSION',
  DUPLICATE_PREFIX: 'DUPLICATE_PREFIX',
  STEP_FAILED: 'STEP_FAILED',
  STEP_LAUNCH_FAILED: 'STEP_LAUNCH_FAILED',
  CONFIG_INVALID: 'CONFIG_INVALID',
  USAGE: 'USAGE',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

/** Exit status the CLI reports for each error code. */
export const ERROR_EXIT_CODES: Readonly<Record<ErrorCodeValue, number>> = {
  [ErrorCode.DIRECTORY_NOT_FOUND]: 1,
  [ErrorCode.UNKNOWN_EXTENSION]: 1,
  [ErrorCode.DUPLICATE_PREFIX]: 1,
  [ErrorCode.STEP_FAILED]: 1,
  [ErrorCode.STEP_LAUNCH_FAILED]: 127,
  [ErrorCode.CONFIG_INVALID]: 1,
  [ErrorCode.USAGE]: 2,
};

// ---------------------------------------------------------------------------
// ErrorPayload
// ---------------------------------------------------------------------------

/** Plain-object form of an error, as written to structured logs. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
  exit_code: number;
  order?: number;
  file?: string;
}
