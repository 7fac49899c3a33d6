/**
 * Row-level comparison results
 */

import type { Row } from '@driftcheck/core';

/** pushdown: anti-join ran inside the database; scan: key sets built in memory */
export type DiffMethod = 'pushdown' | 'scan';

export interface RowDiffResult {
  sourceName: string;
  targetName: string;
  keys: string[];
  /** Source rows with no key match in the target */
  missingCount: number;
  /** Source rows examined, when known */
  sourceRowCount?: number;
  /** Up to five missing source rows, ordered by key */
  sampleMissingRows: Row[];
  method: DiffMethod;
}

export interface UnionCoverageResult {
  sourceNames: string[];
  targetName: string;
  keys: string[];
  /** Distinct key tuples across all sources, when known */
  unionKeyCount?: number;
  missingKeyCount: number;
  /** Up to five missing key tuples named after the target's key columns */
  sampleMissingKeys: Row[];
  method: DiffMethod;
}

export interface VersionComparison {
  oldName: string;
  newName: string;
  keys: string[];
  oldRecordCount: number;
  newRecordCount: number;
  rowsInOldNotInNew: number;
  rowsInNewNotInOld: number;
  /** Absolute difference of the record counts */
  recordCountDifference: number;
  /** Difference relative to the old count in percent, two decimals; null when the old count is 0 */
  percentageChange: number | null;
  sampleOldNotInNew: Row[];
  sampleNewNotInOld: Row[];
}

export interface DuplicateKeyExample {
  key: Row;
  occurrences: number;
}

export interface DuplicateKeyReport {
  dataset: string;
  keys: string[];
  /** Distinct key tuples occurring more than once */
  duplicateKeyCount: number;
  /** Rows carrying a duplicated key */
  totalDuplicateRows: number;
  maxOccurrences: number;
  /** Up to ten duplicated keys, most frequent first */
  examples: DuplicateKeyExample[];
}

export interface ColumnValueComparison {
  column: string;
  /** Equal, or NULL on both sides */
  same: number;
  different: number;
  nullToValue: number;
  valueToNull: number;
}

export interface ValueComparison {
  oldName: string;
  newName: string;
  keys: string[];
  /** Rows matched by key on both sides */
  matchedRows: number;
  onlyInOld: number;
  onlyInNew: number;
  columns: ColumnValueComparison[];
  /** True when a row cap stopped loading before the end of either dataset */
  truncated: boolean;
}
