/**
 * Maps discovered steps to the commands that run them.
 *
 * The whole plan is resolved before anything executes, so under the
 * `abort` policy an unmapped extension fails the run with no step
 * started.
 */

import type { ExtensionMap, UnknownExtensionPolicy } from '../types/config.js';
import type { PipelineStep } from './discoverer.js';
import { createLogger, type Logger } from './logger.js';
import { UnknownExtensionError } from './pipeline-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A step with the command line that runs it. */
export interface PlannedStep {
  readonly step: PipelineStep;
  readonly extension: string;
  /** Executable, i.e. the first token of the mapped command. */
  readonly command: string;
  /** Remaining command tokens followed by the filename. */
  readonly args: readonly string[];
}

/** A step left out under the `skip` policy. */
export interface SkippedStep {
  readonly step: PipelineStep;
  readonly extension: string;
  readonly reason: 'unknown-extension';
}

export interface ExecutionPlan {
  /** Working directory for every step. */
  readonly directory: string;
  readonly steps: readonly PlannedStep[];
  readonly skipped: readonly SkippedStep[];
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Extension of a filename: everything from the last `.` on, or `''`
 * when there is no dot.
 */
export function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot);
}

/**
 * Resolve the command line for one step. The filename is passed relative
 * to the pipeline directory, which is the child's working directory.
 *
 * @throws UnknownExtensionError if the extension has no mapped command.
 */
export function resolveCommand(step: PipelineStep, extensions: ExtensionMap): PlannedStep {
  const extension = extensionOf(step.filename);
  const tokens = Object.hasOwn(extensions, extension) ? extensions[extension] : undefined;
  if (!tokens || tokens.length === 0) {
    throw new UnknownExtensionError(step.order, step.filename, extension);
  }

  const [command, ...prefixArgs] = tokens;
  return { step, extension, command, args: [...prefixArgs, step.filename] };
}

/** Render a planned step as a shell-like command line, for display only. */
export function formatCommandLine(planned: PlannedStep): string {
  return [planned.command, ...planned.args].map(quoteToken).join(' ');
}

function quoteToken(token: string): string {
  return /^[\w@%+=:,./-]+$/.test(token) ? token : `'${token.replace(/'/g, `'\\''`)}'`;
}

export interface BuildPlanOptions {
  /** Defaults to `'abort'`. */
  unknownExtension?: UnknownExtensionPolicy;
  logger?: Logger;
}

/**
 * Resolve every step of a pipeline.
 *
 * @throws UnknownExtensionError on the first unmapped step when the
 *   policy is `'abort'`.
 */
export function buildPlan(
  directory: string,
  steps: readonly PipelineStep[],
  extensions: ExtensionMap,
  options: BuildPlanOptions = {},
): ExecutionPlan {
  const policy = options.unknownExtension ?? 'abort';
  const logger = options.logger ?? createLogger('planner');

  const planned: PlannedStep[] = [];
  const skipped: SkippedStep[] = [];

  for (const step of steps) {
    try {
      planned.push(resolveCommand(step, extensions));
    } catch (err) {
      if (policy === 'abort' || !(err instanceof UnknownExtensionError)) {
        throw err;
      }
      logger.warn('skipping step with unmapped extension', {
        order: step.order,
        file: step.filename,
        extension: err.extension,
      });
      skipped.push({ step, extension: err.extension, reason: 'unknown-extension' });
    }
  }

  return { directory, steps: planned, skipped };
}
