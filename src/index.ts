export const VERSION = '0.1.0';

export { PrefixRun, type PrefixRunOptions } from './prefix-run.js';

export {
  type ExtensionMap,
  type UnknownExtensionPolicy,
  type DuplicatePrefixPolicy,
  type PrefixRunConfig,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './types/config.js';

export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
  ERROR_EXIT_CODES,
} from './types/errors.js';

export {
  PrefixRunError,
  DirectoryNotFoundError,
  DuplicatePrefixError,
  UnknownExtensionError,
  StepFailedError,
  StepLaunchError,
  ConfigError,
  isPrefixRunError,
} from './core/pipeline-error.js';

export { DEFAULT_EXTENSIONS, mergeExtensions } from './core/extension-map.js';
export { discoverSteps, parsePrefix, type PipelineStep } from './core/discoverer.js';
export {
  buildPlan,
  extensionOf,
  resolveCommand,
  type ExecutionPlan,
  type PlannedStep,
  type SkippedStep,
} from './core/command-resolver.js';
export { Runner, type RunnerOptions } from './core/runner.js';
export { RunReport, type StepRecord, type StepStatus } from './core/run-report.js';
export { loadConfig, parseConfigText, type LoadedConfig } from './core/config-loader.js';
export {
  configureLogging,
  createLogger,
  type Logger,
  type LogLevel,
  type LogSink,
} from './core/logger.js';
