/**
 * Reconciliation Engine Interface
 */

import type { FilterCondition, IDataset } from '@driftcheck/core';
import type {
  ProfiledColumn,
  GroupStat,
  KeyFallback,
  ProfileWindow,
  ReconciliationReport,
} from '../types/index.js';

/**
 * rows: per-source coverage; union: coverage of all sources together;
 * schema: drift and column coverage; full: all of them
 */
export type ComparisonScope = 'rows' | 'union' | 'schema' | 'full';

export const COMPARISON_SCOPES: readonly ComparisonScope[] = ['rows', 'union', 'schema', 'full'];

export interface KeyOptions {
  /** Explicit keys override inference */
  keys?: string[];
  /** Used when no common column looks like a key (default: first_common) */
  keyFallback?: KeyFallback;
}

export interface ReconciliationRequest extends KeyOptions {
  target: IDataset;
  sources: IDataset[];
  /** Default: full */
  scope?: ComparisonScope;
  /** Columns whose removal or change raises a warning, besides keys and non-nullable columns */
  requiredColumns?: string[];
  /** Columns assumed present when a catalog is unavailable (keys are always included) */
  fallbackColumns?: string[];
  /** Profile every dataset and report shifts of each source against the target */
  profile?: { columns?: ProfiledColumn[]; window?: ProfileWindow };
  /** Check the target for duplicate keys */
  checkDuplicates?: boolean;
  title?: string;
}

export interface VersionRequest extends KeyOptions {
  oldDataset: IDataset;
  newDataset: IDataset;
  title?: string;
}

export interface ProfileRequest {
  /** The first dataset is the baseline shifts are reported against */
  datasets: IDataset[];
  columns?: ProfiledColumn[];
  window?: ProfileWindow;
  title?: string;
}

export interface AggregateRequest {
  datasets: IDataset[];
  groupColumn: string;
  measureColumn: string;
  stats: GroupStat[];
  where?: FilterCondition[];
  title?: string;
}

export interface DuplicateRequest extends KeyOptions {
  datasets: IDataset[];
  title?: string;
}

export interface ValueRequest extends KeyOptions {
  oldDataset: IDataset;
  newDataset: IDataset;
  columns?: string[];
  maxRows?: number;
  title?: string;
}

/**
 * Every method returns a report; failures scoped to one dataset, column
 * or comparison are recorded in it rather than thrown.
 */
export interface IReconciliationEngine {
  /**
   * Reconcile sources against a target
   * @throws ReconError TARGET_UNRESOLVED when the target's row count cannot be queried
   */
  run(request: ReconciliationRequest): Promise<ReconciliationReport>;

  compareVersions(request: VersionRequest): Promise<ReconciliationReport>;

  profile(request: ProfileRequest): Promise<ReconciliationReport>;

  aggregate(request: AggregateRequest): Promise<ReconciliationReport>;

  findDuplicates(request: DuplicateRequest): Promise<ReconciliationReport>;

  compareValues(request: ValueRequest): Promise<ReconciliationReport>;
}

