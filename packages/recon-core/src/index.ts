/**
 * @driftcheck/recon-core
 *
 * Dataset reconciliation and schema-drift engine: introspection, key
 * inference, row coverage, schema drift, profiling and reporting.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export { ReconError, toReconError } from './errors/index.js';
export type { ReconErrorCode, ReconErrorDetails, ReconFailure, FailureStage } from './errors/index.js';

// Schema
export { describe, describeWithFallback, resolveColumns } from './schema/schema-introspector.js';
export type { IntrospectionResult } from './schema/schema-introspector.js';
export { diffSchemas, checkColumnCoverage, columnDeltas, deltaRules } from './schema/schema-drift.js';
export type { DeltaRules } from './schema/schema-drift.js';

// Keys
export { inferKeys, explicitKeys, commonColumns, looksLikeKey, KEY_PATTERNS } from './keys/key-inference.js';
export { findDuplicateKeys, DUPLICATE_EXAMPLE_LIMIT } from './keys/duplicate-keys.js';

// Rows
export { reconcile, reconcileUnion, compareVersions, DEFAULT_SAMPLE_LIMIT } from './rows/row-reconciler.js';
export type { RowComparisonOptions } from './rows/row-reconciler.js';
export { compareValues, classifyValues } from './rows/value-comparison.js';
export type { ValueComparisonOptions } from './rows/value-comparison.js';
export { BatchProcessor } from './scan/batch-processor.js';
export type { LoadedRows } from './scan/batch-processor.js';

// Profiling
export { profile, nullPercentage } from './profile/profiler.js';
export { aggregateBy, isGroupStat, GROUP_STATS } from './profile/aggregate-by.js';
export type { AggregateByOptions } from './profile/aggregate-by.js';
export { compareProfiles } from './profile/profile-comparison.js';
export { resolveWindow, windowConditions, DEFAULT_LOOKBACK_DAYS, DEFAULT_FORWARD_DAYS } from './profile/window.js';
export type { ResolvedWindow } from './profile/window.js';

// Reporting
export { buildReport, deriveReasons, statusOf } from './report/report-builder.js';
export { formatReportLines } from './formatters/report-formatter.js';
export { formatRow, formatValue } from './formatters/utils.js';

// Engine
import { ReconciliationEngine as _ReconciliationEngine } from './reconciliation/reconciliation-engine.js';
import type { ReconciliationEngineOptions } from './reconciliation/reconciliation-engine.js';
export { ReconciliationEngine } from './reconciliation/reconciliation-engine.js';
export type { ReconciliationEngineOptions } from './reconciliation/reconciliation-engine.js';

/**
 * Factory function to create a ReconciliationEngine
 */
export function createReconciliationEngine(options?: ReconciliationEngineOptions): _ReconciliationEngine {
  return new _ReconciliationEngine(options);
}
