/**
 * @driftcheck/cli
 *
 * Config-driven runner for reconciliation and schema-drift jobs
 */

export {
  ConfigError,
  configFileSchema,
  connectionEntrySchema,
  datasetEntrySchema,
  jobEntrySchema,
  runtimeSchema,
  expandEnvVars,
  formatZodError,
  jobDatasetIds,
  loadConfig,
  parseConfig,
} from './config.js';
export type {
  AbsoluteWindowEntry,
  ConfigFile,
  ConnectionEntry,
  DatasetEntry,
  EnvExpansionOptions,
  JobEntry,
  RuntimeConfig,
  WindowEntry,
} from './config.js';

export { DatasetRegistry } from './dataset-registry.js';
export type { DatasetRegistryOptions } from './dataset-registry.js';

export { InstrumentedDataset, InstrumentedSqlDataset, instrumentDataset, isRetryableError } from './instrument-dataset.js';
export type { InstrumentDatasetOptions } from './instrument-dataset.js';

export { runJob, toProfileWindow } from './jobs.js';
export type { DatasetLookup } from './jobs.js';

export { Logger, createRunId, redactFields, redactSecrets } from './logger.js';
export type { LogFormat, LogLevel, LoggerOptions } from './logger.js';

export {
  renderReport,
  renderSummaryCsv,
  sanitizeFormula,
  summaryRows,
  timestampSlug,
  writeReportFiles,
} from './report-writer.js';
export type { ReportFormat, SummaryRow, SummaryValue } from './report-writer.js';

export { computeBackoffDelayMs, sleep, withRetries } from './retry.js';
export type { RetryConfig, RetryContext, RetryHooks } from './retry.js';

export {
  EXIT_FAILED,
  EXIT_OK,
  EXIT_USAGE,
  USAGE,
  UsageError,
  executeConfig,
  exitCodeFor,
  parseCliArgs,
  renderOutcomes,
  selectJobs,
} from './runner.js';
export type { CliArgs, ExecuteOptions, ExecuteResult, FailOn, JobOutcome } from './runner.js';

export { Semaphore } from './semaphore.js';
export { TimeoutError, withTimeout } from './timeout.js';
