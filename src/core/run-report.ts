/**
 * Per-step timing and status for a pipeline run, with a psql-style text
 * table for display after the run.
 */

import type { ExecutionPlan } from './command-resolver.js';
import { compareSteps, type PipelineStep } from './discoverer.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StepStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'skipped';

export interface StepRecord {
  order: number;
  filename: string;
  status: StepStatus;
  startedAt: string | null;
  endedAt: string | null;
  durationMs: number | null;
  /** Exit status of the child; null until it exits, or if it never started. */
  exitCode: number | null;
}

/** Time source (injectable for testing). */
export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

// ---------------------------------------------------------------------------
// RunReport
// ---------------------------------------------------------------------------

export class RunReport {
  readonly directory: string;
  private readonly clock: Clock;
  private readonly records = new Map<string, StepRecord>();
  private readonly startTimes = new Map<string, number>();

  constructor(plan: ExecutionPlan, clock: Clock = systemClock) {
    this.directory = plan.directory;
    this.clock = clock;

    const entries: Array<{ step: PipelineStep; status: StepStatus }> = [
      ...plan.steps.map((p) => ({ step: p.step, status: 'pending' as const })),
      ...plan.skipped.map((s) => ({ step: s.step, status: 'skipped' as const })),
    ];
    entries.sort((a, b) => compareSteps(a.step, b.step));

    for (const { step, status } of entries) {
      this.records.set(step.filename, {
        order: step.order,
        filename: step.filename,
        status,
        startedAt: null,
        endedAt: null,
        durationMs: null,
        exitCode: null,
      });
    }
  }

  /** Records in run order. */
  get steps(): readonly StepRecord[] {
    return [...this.records.values()].map((r) => ({ ...r }));
  }

  /** True when every step that was not skipped succeeded. */
  get succeeded(): boolean {
    return this.steps.every((r) => r.status === 'succeeded' || r.status === 'skipped');
  }

  markStarted(step: PipelineStep): void {
    const record = this.recordFor(step);
    const now = this.clock.now();
    this.startTimes.set(step.filename, now);
    record.status = 'running';
    record.startedAt = new Date(now).toISOString();
  }

  /**
   * Record the end of a step. `exitCode` is null when the child never
   * started.
   */
  markFinished(step: PipelineStep, exitCode: number | null): StepRecord {
    const record = this.recordFor(step);
    const now = this.clock.now();
    const started = this.startTimes.get(step.filename) ?? now;
    record.status = exitCode === 0 ? 'succeeded' : 'failed';
    record.endedAt = new Date(now).toISOString();
    record.durationMs = now - started;
    record.exitCode = exitCode;
    return { ...record };
  }

  /** Render the report as a text table. */
  toTable(): string {
    const headers = ['Order', 'File name', 'Start time', 'End time', 'Elapsed (s)', 'Status'];
    const rows = this.steps.map((r) => [
      String(r.order),
      r.filename,
      r.startedAt ?? 'NA',
      r.endedAt ?? 'NA',
      r.durationMs === null ? 'NA' : (r.durationMs / 1000).toFixed(2),
      STATUS_LABELS[r.status],
    ]);
    return renderTable(headers, rows, ['right', 'left', 'left', 'left', 'right', 'left']);
  }

  private recordFor(step: PipelineStep): StepRecord {
    const record = this.records.get(step.filename);
    if (!record) {
      throw new Error(`Step ${step.filename} is not part of this run`);
    }
    return record;
  }
}

const STATUS_LABELS: Record<StepStatus, string> = {
  pending: 'NA',
  running: 'Running',
  succeeded: 'Success',
  failed: 'Failure',
  skipped: 'Skipped',
};

// ---------------------------------------------------------------------------
// Table rendering
// ---------------------------------------------------------------------------

export type Alignment = 'left' | 'right';

/**
 * Render rows as a psql-style table. Headers follow their column's
 * alignment.
 */
export function renderTable(
  headers: readonly string[],
  rows: ReadonlyArray<readonly string[]>,
  align: readonly Alignment[],
): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((row) => row[i].length)));

  const pad = (text: string, i: number): string =>
    align[i] === 'right' ? text.padStart(widths[i]) : text.padEnd(widths[i]);
  const line = (cells: readonly string[]): string =>
    `| ${cells.map((c, i) => pad(c, i)).join(' | ')} |`;
  const rule = (edge: string, cross: string): string =>
    `${edge}${widths.map((w) => '-'.repeat(w + 2)).join(cross)}${edge}`;

  return [
    rule('+', '+'),
    line(headers),
    rule('|', '+'),
    ...rows.map(line),
    rule('+', '+'),
  ].join('\n');
}
