/**
 * Shifts between two dataset profiles
 */

import type { ColumnProfile, ColumnShift, DatasetProfile, ProfileShift } from '../types/index.js';

function delta(before: number | null | undefined, after: number | null | undefined): number | null {
  return before === null || before === undefined || after === null || after === undefined ? null : after - before;
}

function distinctCount(profile: ColumnProfile): number | null {
  return profile.category === 'string' ? profile.distinctCount : null;
}

function mean(profile: ColumnProfile): number | null {
  return profile.category === 'numeric' ? profile.mean : null;
}

/**
 * Row-count delta and, per column profiled on both sides,
 * null-percentage, distinct-count and mean deltas
 */
export function compareProfiles(before: DatasetProfile, after: DatasetProfile): ProfileShift {
  const afterColumns = new Map(after.columns.map((column) => [column.column.toLowerCase(), column]));

  const columns: ColumnShift[] = [];
  for (const beforeColumn of before.columns) {
    const afterColumn = afterColumns.get(beforeColumn.column.toLowerCase());
    if (!afterColumn) continue;

    columns.push({
      column: beforeColumn.column,
      nullPercentageBefore: beforeColumn.nullPercentage,
      nullPercentageAfter: afterColumn.nullPercentage,
      nullPercentageDelta: delta(beforeColumn.nullPercentage, afterColumn.nullPercentage),
      distinctCountDelta: delta(distinctCount(beforeColumn), distinctCount(afterColumn)),
      meanDelta: delta(mean(beforeColumn), mean(afterColumn)),
    });
  }

  return {
    beforeName: before.dataset,
    afterName: after.dataset,
    rowCountBefore: before.totalRows,
    rowCountAfter: after.totalRows,
    rowCountDelta: after.totalRows - before.totalRows,
    columns,
  };
}
