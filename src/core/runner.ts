/**
 * Sequential pipeline execution.
 *
 * Runs each planned step as a child process in the pipeline directory,
 * one at a time, and stops at the first step that does not exit 0.
 * Signals received while a step runs are forwarded to it, so interrupting
 * prefixrun also interrupts the step instead of orphaning it. An
 * interrupted step ends the run with the signal's status even when the
 * step handles the signal and exits 0.
 */

import { formatCommandLine, type ExecutionPlan, type PlannedStep } from './command-resolver.js';
import { createLogger, type Logger } from './logger.js';
import { StepFailedError, StepLaunchError } from './pipeline-error.js';
import {
  FORWARDED_SIGNALS,
  exitStatusOf,
  processSignals,
  spawnInherited,
  type ChildExit,
  type ChildHandle,
  type SignalSubscribeFn,
  type SpawnFn,
} from './process-runner.js';
import { RunReport, systemClock, type Clock } from './run-report.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RunnerOptions {
  /** Defaults to spawnInherited. */
  spawn?: SpawnFn;
  /** Defaults to subscribing on `process`. */
  signals?: SignalSubscribeFn;
  clock?: Clock;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export class Runner {
  private readonly spawnFn: SpawnFn;
  private readonly signals: SignalSubscribeFn;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: RunnerOptions = {}) {
    this.spawnFn = options.spawn ?? spawnInherited;
    this.signals = options.signals ?? processSignals;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('runner');
  }

  /**
   * Execute a plan to completion.
   *
   * `report` is updated as steps start and finish, so a caller holding it
   * can still inspect it after a failure.
   *
   * @throws StepFailedError when a step exits non-zero or is killed.
   * @throws StepLaunchError when a step's command cannot be started.
   */
  async run(plan: ExecutionPlan, report?: RunReport): Promise<RunReport> {
    const target = report ?? new RunReport(plan, this.clock);

    this.logger.info('pipeline started', {
      directory: plan.directory,
      steps: plan.steps.length,
      skipped: plan.skipped.length,
    });

    for (const planned of plan.steps) {
      await this.runStep(plan.directory, planned, target);
    }

    this.logger.info('pipeline finished', { directory: plan.directory });
    return target;
  }

  private async runStep(directory: string, planned: PlannedStep, report: RunReport): Promise<void> {
    const { step } = planned;
    const log = this.logger.withContext({ order: step.order, file: step.filename });

    log.info('step started', { command: formatCommandLine(planned) });
    report.markStarted(step);

    let child: ChildHandle;
    try {
      child = this.spawnFn({ command: planned.command, args: planned.args, cwd: directory });
    } catch (err) {
      report.markFinished(step, null);
      throw new StepLaunchError(step.order, step.filename, planned.command, err);
    }

    const received: NodeJS.Signals[] = [];
    const unsubscribe = FORWARDED_SIGNALS.map((signal) =>
      this.signals(signal, () => {
        log.warn('forwarding signal to step', { signal });
        received.push(signal);
        child.kill(signal);
      }),
    );

    let exit: ChildExit;
    try {
      exit = await child.wait();
    } finally {
      for (const off of unsubscribe) off();
    }

    if (exit.kind === 'spawn-error') {
      report.markFinished(step, null);
      log.info('step could not be started', { error: exit.error });
      throw new StepLaunchError(step.order, step.filename, planned.command, exit.error);
    }

    // The parent's own interrupt wins over whatever the step made of it
    const interrupt = received.at(0);
    const signal = interrupt ?? (exit.kind === 'signaled' ? exit.signal : undefined);
    const status = signal === undefined ? exitStatusOf(exit) : exitStatusOf({ kind: 'signaled', signal });
    const duration_ms = report.markFinished(step, status).durationMs;

    if (signal !== undefined) {
      log.info('step terminated by signal', {
        signal,
        exit_code: status,
        duration_ms,
        interrupted: interrupt !== undefined,
      });
      throw new StepFailedError(step.order, step.filename, status, signal);
    }
    if (status !== 0) {
      log.info('step failed', { exit_code: status, duration_ms });
      throw new StepFailedError(step.order, step.filename, status);
    }

    log.info('step succeeded', { exit_code: 0, duration_ms });
  }
}
