import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { buildPlan } from './command-resolver.js';
import type { PipelineStep } from './discoverer.js';
import { DEFAULT_EXTENSIONS } from './extension-map.js';
import { RunReport, renderTable } from './run-report.js';
import { createFakeClock } from '../testing/fakes.js';

const ROOT = '/pipeline';

function step(order: number, filename: string): PipelineStep {
  return { order, filename, filepath: join(ROOT, filename) };
}

const A = step(1, '1-a.sh');
const B = step(2, '2-b.py');
const C = step(3, '3-c.R');
const D = step(4, '4-d.xyz');

// ---------------------------------------------------------------------------
// renderTable
// ---------------------------------------------------------------------------

describe('renderTable', () => {
  it('pads columns to the widest cell', () => {
    const table = renderTable(['N', 'Name'], [['1', 'a'], ['10', 'bcdef']], ['right', 'left']);
    expect(table.split('\n')).toEqual([
      '+----+-------+',
      '|  N | Name  |',
      '|----+-------|',
      '|  1 | a     |',
      '| 10 | bcdef |',
      '+----+-------+',
    ]);
  });

  it('renders headers alone when there are no rows', () => {
    expect(renderTable(['A'], [], ['left'])).toBe(['+---+', '| A |', '|---|', '+---+'].join('\n'));
  });
});

// ---------------------------------------------------------------------------
// RunReport
// ---------------------------------------------------------------------------

describe('RunReport', () => {
  it('starts with every planned step pending and skipped steps marked', () => {
    const plan = buildPlan(ROOT, [A, B, D], DEFAULT_EXTENSIONS, { unknownExtension: 'skip' });
    const report = new RunReport(plan, createFakeClock());

    expect(report.directory).toBe(ROOT);
    expect(report.steps.map((r) => [r.filename, r.status])).toEqual([
      ['1-a.sh', 'pending'],
      ['2-b.py', 'pending'],
      ['4-d.xyz', 'skipped'],
    ]);
    expect(report.succeeded).toBe(false);
  });

  it('records start, end and duration from the clock', () => {
    const report = new RunReport(buildPlan(ROOT, [A], DEFAULT_EXTENSIONS), createFakeClock(0, 1500));

    report.markStarted(A);
    expect(report.steps[0].status).toBe('running');
    const record = report.markFinished(A, 0);

    expect(record).toEqual({
      order: 1,
      filename: '1-a.sh',
      status: 'succeeded',
      startedAt: '1970-01-01T00:00:00.000Z',
      endedAt: '1970-01-01T00:00:01.500Z',
      durationMs: 1500,
      exitCode: 0,
    });
    expect(report.succeeded).toBe(true);
  });

  it('marks a non-zero exit as failed', () => {
    const report = new RunReport(buildPlan(ROOT, [A], DEFAULT_EXTENSIONS), createFakeClock());
    report.markStarted(A);
    expect(report.markFinished(A, 2).status).toBe('failed');
    expect(report.succeeded).toBe(false);
  });

  it('marks a step that never started as failed with no exit code', () => {
    const report = new RunReport(buildPlan(ROOT, [A], DEFAULT_EXTENSIONS), createFakeClock());
    report.markStarted(A);
    const record = report.markFinished(A, null);
    expect(record.status).toBe('failed');
    expect(record.exitCode).toBeNull();
  });

  it('returns copies of its records', () => {
    const report = new RunReport(buildPlan(ROOT, [A], DEFAULT_EXTENSIONS), createFakeClock());
    const [record] = report.steps;
    record.status = 'succeeded';
    expect(report.steps[0].status).toBe('pending');
  });

  it('rejects steps that are not part of the run', () => {
    const report = new RunReport(buildPlan(ROOT, [A], DEFAULT_EXTENSIONS), createFakeClock());
    expect(() => report.markStarted(B)).toThrow('Step 2-b.py is not part of this run');
  });

  it('renders a timing table', () => {
    const plan = buildPlan(ROOT, [A, B, C], DEFAULT_EXTENSIONS);
    const report = new RunReport(plan, createFakeClock(Date.UTC(2024, 0, 1), 1000));

    report.markStarted(A);
    report.markFinished(A, 0);
    report.markStarted(B);
    report.markFinished(B, 1);

    expect(report.toTable().split('\n')).toEqual([
      '+-------+-----------+--------------------------+--------------------------+-------------+---------+',
      '| Order | File name | Start time               | End time                 | Elapsed (s) | Status  |',
      '|-------+-----------+--------------------------+--------------------------+-------------+---------|',
      '|     1 | 1-a.sh    | 2024-01-01T00:00:00.000Z | 2024-01-01T00:00:01.000Z |        1.00 | Success |',
      '|     2 | 2-b.py    | 2024-01-01T00:00:02.000Z | 2024-01-01T00:00:03.000Z |        1.00 | Failure |',
      '|     3 | 3-c.R     | NA                       | NA                       |          NA | NA      |',
      '+-------+-----------+--------------------------+--------------------------+-------------+---------+',
    ]);
  });
});
