/**
 * Reconciliation report types
 */

import type { SchemaOrigin, SchemaSnapshot } from '@driftcheck/core';
import type { ReconFailure } from '../errors/index.js';
import type { KeySet } from './keys.js';
import type {
  DuplicateKeyReport,
  RowDiffResult,
  UnionCoverageResult,
  ValueComparison,
  VersionComparison,
} from './rows.js';
import type { ColumnCoverage, SchemaDiff } from './schema.js';
import type { DatasetProfile, GroupedAggregateResult, ProfileShift } from './profile.js';

export type ReportStatus = 'OK' | 'WARNING' | 'ERROR';

export interface DatasetSummary {
  id: string;
  name: string;
  type: string;
  rowCount?: number;
}

export interface SchemaDriftResult {
  beforeName: string;
  afterName: string;
  /** Origin of the before snapshot; inferred nullability protects no column */
  beforeOrigin?: SchemaOrigin;
  diff: SchemaDiff;
}

/** Status reason; severity decides which status it raises */
export interface StatusReason {
  severity: 'warning' | 'error';
  message: string;
}

/** Findings handed to the report builder */
export interface ReportFindings {
  id: string;
  generatedAt: Date;
  processingTimeMs: number;
  title?: string;
  target?: DatasetSummary;
  sources?: DatasetSummary[];
  schemas?: SchemaSnapshot[];
  keys?: KeySet;
  requiredColumns?: string[];
  rowDiffs?: RowDiffResult[];
  unionCoverage?: UnionCoverageResult;
  versionComparison?: VersionComparison;
  schemaDrift?: SchemaDriftResult[];
  columnCoverage?: ColumnCoverage;
  profiles?: DatasetProfile[];
  profileShifts?: ProfileShift[];
  aggregates?: GroupedAggregateResult[];
  duplicates?: DuplicateKeyReport[];
  valueComparison?: ValueComparison;
  failures?: ReconFailure[];
}

export interface ReconciliationReport {
  id: string;
  generatedAt: Date;
  processingTimeMs: number;
  title?: string;
  status: ReportStatus;
  reasons: StatusReason[];
  target?: DatasetSummary;
  sources: DatasetSummary[];
  schemas: SchemaSnapshot[];
  keys?: KeySet;
  requiredColumns: string[];
  rowDiffs: RowDiffResult[];
  unionCoverage?: UnionCoverageResult;
  versionComparison?: VersionComparison;
  schemaDrift: SchemaDriftResult[];
  columnCoverage?: ColumnCoverage;
  profiles: DatasetProfile[];
  profileShifts: ProfileShift[];
  aggregates: GroupedAggregateResult[];
  duplicates: DuplicateKeyReport[];
  valueComparison?: ValueComparison;
  failures: ReconFailure[];
}
