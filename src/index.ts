// Config
export { getConfig, configure, resetConfig, loadConfigFile, defaults } from "./config.js";
export type { HarnessConfig, DeepPartial } from "./config.js";

// Errors
export { HarnessError, ValidationError, ConfigError, CatalogError } from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  CatalogFileSchema,
  ConfigFileSchema,
  RunCommandOptionsSchema,
  ListCommandOptionsSchema,
  OutputModeSchema,
  SchedulePolicySchema,
} from "./schemas.js";

// Core
export { Harness } from "./harness.js";
export type { HarnessOptions, RunOptions, RunCallbacks, RunReport } from "./harness.js";

// Catalog
export { resolveCatalog, describeTask, displayName } from "./catalog/resolver.js";
export { loadCatalog, DEFAULT_CATALOG_PATH } from "./catalog/default.js";
export type { TaskDescriptor, ResolvedCatalog } from "./catalog/types.js";

// Executor
export { ProcessRunner, createOutcome } from "./executor/process-runner.js";
export type { ProcessRunnerOptions } from "./executor/process-runner.js";
export type { OutputMode, TaskFailure, TaskOutcome, TaskRunner } from "./executor/types.js";

// Scheduler
export { Scheduler } from "./scheduler/scheduler.js";
export { CompletionCounter } from "./scheduler/completion-counter.js";
export type { CompletionView } from "./scheduler/completion-counter.js";
export type {
  SchedulePolicy,
  ScheduleOptions,
  ScheduleCallbacks,
  ScheduleResult,
  ProgressSnapshot,
} from "./scheduler/types.js";
export { ProgressReporter } from "./progress/reporter.js";
export type { ProgressReporterOptions } from "./progress/reporter.js";

// Report
export { summarize, exitCodeFor, renderSummary } from "./report/aggregator.js";
export type { RunSummary, RenderOptions } from "./report/aggregator.js";
export { createConsoleCallbacks, outputWillInterleave } from "./report/console.js";
export type { LineWriter } from "./report/console.js";
export * from "./report/format.js";

// Utils
export { log, setLogLevel, isLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
