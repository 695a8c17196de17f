import { describe, it, expect } from 'vitest';
import { constants } from 'node:os';
import { exitStatusOf, processSignals, signalNumber } from './process-runner.js';

describe('signalNumber', () => {
  it('returns the platform number of a signal', () => {
    expect(signalNumber('SIGINT')).toBe(constants.signals.SIGINT);
    expect(signalNumber('SIGKILL')).toBe(constants.signals.SIGKILL);
  });
});

describe('exitStatusOf', () => {
  it('returns the exit code of a child that exited', () => {
    expect(exitStatusOf({ kind: 'exited', code: 0 })).toBe(0);
    expect(exitStatusOf({ kind: 'exited', code: 3 })).toBe(3);
  });

  it('returns 128 plus the signal number for a signaled child', () => {
    expect(exitStatusOf({ kind: 'signaled', signal: 'SIGTERM' })).toBe(128 + constants.signals.SIGTERM);
  });

  it.runIf(process.platform === 'linux')('reports SIGINT as 130 on Linux', () => {
    expect(exitStatusOf({ kind: 'signaled', signal: 'SIGINT' })).toBe(130);
  });
});

describe('processSignals', () => {
  it('subscribes on the process and unsubscribes', () => {
    const before = process.listenerCount('SIGHUP');
    const off = processSignals('SIGHUP', () => {});
    expect(process.listenerCount('SIGHUP')).toBe(before + 1);
    off();
    expect(process.listenerCount('SIGHUP')).toBe(before);
  });
});
