/**
 * Child process plumbing for pipeline steps.
 *
 * Steps run with inherited stdio so their output reaches the terminal as
 * it is written. Spawning and signal subscription are injectable so the
 * runner can be tested without starting real processes.
 */

import { spawn } from 'node:child_process';
import { constants } from 'node:os';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpawnRequest {
  command: string;
  args: readonly string[];
  cwd: string;
}

/** How a child process ended. */
export type ChildExit =
  | { kind: 'exited'; code: number }
  | { kind: 'signaled'; signal: NodeJS.Signals }
  | { kind: 'spawn-error'; error: Error };

/** A started child process. */
export interface ChildHandle {
  /** Send a signal; returns false if the child is already gone. */
  kill(signal: NodeJS.Signals): boolean;
  /** Resolves once, when the child has exited or failed to start. Never rejects. */
  wait(): Promise<ChildExit>;
}

export type SpawnFn = (request: SpawnRequest) => ChildHandle;

/** Subscribe to a signal delivered to this process; returns an unsubscribe function. */
export type SignalSubscribeFn = (signal: NodeJS.Signals, handler: () => void) => () => void;

/** Signals relayed to the running step while the parent waits on it. */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Spawn a child that shares this process's stdin, stdout and stderr. */
export const spawnInherited: SpawnFn = (request) => {
  const child = spawn(request.command, [...request.args], {
    cwd: request.cwd,
    stdio: 'inherit',
  });

  const exit = new Promise<ChildExit>((resolve) => {
    child.once('error', (error) => resolve({ kind: 'spawn-error', error }));
    child.once('close', (code, signal) => {
      if (signal !== null) {
        resolve({ kind: 'signaled', signal });
      } else {
        resolve({ kind: 'exited', code: code ?? 1 });
      }
    });
  });

  return {
    kill: (signal) => child.kill(signal),
    wait: () => exit,
  };
};

export const processSignals: SignalSubscribeFn = (signal, handler) => {
  process.on(signal, handler);
  return () => {
    process.off(signal, handler);
  };
};

// ---------------------------------------------------------------------------
// Exit status
// ---------------------------------------------------------------------------

/** Platform number of a signal, if it has one. */
export function signalNumber(signal: NodeJS.Signals): number | undefined {
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal && typeof value === 'number') return value;
  }
  return undefined;
}

/**
 * Shell-style exit status for a finished child: its own code, or 128 plus
 * the signal number when a signal ended it.
 */
export function exitStatusOf(exit: Exclude<ChildExit, { kind: 'spawn-error' }>): number {
  if (exit.kind === 'exited') return exit.code;
  return 128 + (signalNumber(exit.signal) ?? 0);
}
