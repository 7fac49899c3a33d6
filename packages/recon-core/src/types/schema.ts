/**
 * Schema drift and column coverage types
 */

import type { ColumnDescriptor } from '@driftcheck/core';

export type ColumnDeltaField = 'declaredType' | 'maxLength' | 'nullable';

export interface ColumnDelta {
  field: ColumnDeltaField;
  before: string | number | boolean | null;
  after: string | number | boolean | null;
}

export interface ColumnChange {
  name: string;
  before: ColumnDescriptor;
  after: ColumnDescriptor;
  deltas: ColumnDelta[];
}

export interface SchemaDiff {
  added: ColumnDescriptor[];
  removed: ColumnDescriptor[];
  changed: ColumnChange[];
}

export interface SourceColumnCoverage {
  dataset: string;
  columnCount: number;
  /** Columns also present in the target */
  commonColumns: string[];
  /** Columns absent from the target */
  missingColumns: string[];
}

/** A column name seen in several sources with different descriptors */
export interface ColumnMergeConflict {
  name: string;
  /** Dataset whose descriptor was kept */
  keptFrom: string;
  conflictingDataset: string;
  deltas: ColumnDelta[];
}

export interface ColumnCoverage {
  targetName: string;
  sources: SourceColumnCoverage[];
  /** Merged source columns, first-seen descriptor wins */
  mergedColumns: ColumnDescriptor[];
  conflicts: ColumnMergeConflict[];
  /** Merged source columns absent from the target, key columns excluded */
  missingFromTarget: string[];
}
