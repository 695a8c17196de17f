/**
 * PrefixRun: run every `<integer>-` prefixed file in a directory, in
 * prefix order, with an interpreter chosen by file extension.
 *
 * Given a directory containing
 *
 *   1-transfer_data.sh
 *   2-build_tables.hql
 *   3-pull_ingest.py
 *   myproject.py
 *
 * `new PrefixRun({ directory }).run()` runs `bash 1-transfer_data.sh`,
 * then `hive -f 2-build_tables.hql`, then `python 3-pull_ingest.py`, and
 * ignores `myproject.py`.
 *
 * @example
 * ```ts
 * const run = new PrefixRun({ extensions: { '.js': ['node'] } });
 * const report = await run.run();
 * ```
 */

import { resolve } from 'node:path';
import {
  DEFAULT_CONFIG,
  type DuplicatePrefixPolicy,
  type ExtensionMap,
  type PrefixRunConfig,
  type UnknownExtensionPolicy,
} from './types/config.js';
import { buildPlan, type ExecutionPlan } from './core/command-resolver.js';
import { DEFAULT_EXTENSIONS, mergeExtensions } from './core/extension-map.js';
import { discoverSteps, type DiscoveryFs, type PipelineStep } from './core/discoverer.js';
import { createLogger, type Logger } from './core/logger.js';
import type { SignalSubscribeFn, SpawnFn } from './core/process-runner.js';
import { RunReport, systemClock, type Clock } from './core/run-report.js';
import { Runner } from './core/runner.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PrefixRunOptions {
  /** Directory to scan. Defaults to the working directory at construction time. */
  directory?: string;
  /** Loaded config file; its extensions sit between the defaults and `extensions`. */
  config?: PrefixRunConfig;
  /** Extra or replacement commands, keyed by extension (e.g. `{ '.sh': ['zsh'] }`). */
  extensions?: ExtensionMap;
  unknownExtension?: UnknownExtensionPolicy;
  duplicatePrefix?: DuplicatePrefixPolicy;

  spawn?: SpawnFn;
  signals?: SignalSubscribeFn;
  clock?: Clock;
  fs?: DiscoveryFs;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// PrefixRun
// ---------------------------------------------------------------------------

export class PrefixRun {
  readonly directory: string;
  /** Effective extension map: defaults, then config file, then caller entries. */
  readonly extensions: ExtensionMap;
  readonly unknownExtension: UnknownExtensionPolicy;
  readonly duplicatePrefix: DuplicatePrefixPolicy;

  /** Report of the most recent run(), kept after a failure as well. */
  lastReport: RunReport | null = null;

  private readonly runner: Runner;
  private readonly clock: Clock;
  private readonly fs?: DiscoveryFs;
  private readonly logger: Logger;

  constructor(options: PrefixRunOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG;

    this.directory = resolve(options.directory ?? process.cwd());
    this.extensions = mergeExtensions(DEFAULT_EXTENSIONS, config.extensions, options.extensions);
    this.unknownExtension = options.unknownExtension ?? config.runner.unknown_extension;
    this.duplicatePrefix = options.duplicatePrefix ?? config.runner.duplicate_prefix;

    this.clock = options.clock ?? systemClock;
    this.fs = options.fs;
    this.logger = options.logger ?? createLogger('prefixrun');
    this.runner = new Runner({
      spawn: options.spawn,
      signals: options.signals,
      clock: this.clock,
      logger: this.logger.child('runner'),
    });
  }

  /** A fresh, mutable copy of the built-in extension map. */
  static defaultExtensions(): Record<string, string[]> {
    return Object.fromEntries(
      Object.entries(DEFAULT_EXTENSIONS).map(([extension, command]) => [extension, [...command]]),
    );
  }

  /** Discover the steps in the directory, in run order. */
  steps(): PipelineStep[] {
    return discoverSteps(this.directory, {
      duplicatePrefix: this.duplicatePrefix,
      fs: this.fs,
      logger: this.logger.child('discoverer'),
    });
  }

  /** Discover the steps and resolve the command for each. Runs nothing. */
  plan(): ExecutionPlan {
    return buildPlan(this.directory, this.steps(), this.extensions, {
      unknownExtension: this.unknownExtension,
      logger: this.logger.child('planner'),
    });
  }

  /**
   * Discover, plan and execute the pipeline.
   *
   * Every error is raised before any step starts except StepFailedError
   * and StepLaunchError, which stop the run at the failing step.
   */
  async run(): Promise<RunReport> {
    const plan = this.plan();
    const report = new RunReport(plan, this.clock);
    this.lastReport = report;
    return this.runner.run(plan, report);
  }
}
