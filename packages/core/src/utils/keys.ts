/**
 * Key-tuple helpers for in-memory anti-joins and grouping
 */

import type { Row } from '../types/index.js';
import { canonicalValue, compareValues, isNullish } from './values.js';

/**
 * Serialize the key columns of a row into a set-friendly string.
 * Returns null when any key value is NULL: a NULL key never matches.
 */
export function keyTuple(row: Row, columns: string[]): string | null {
  const parts: (string | number | boolean | null)[] = [];
  for (const column of columns) {
    const value = row[column];
    if (isNullish(value)) {
      return null;
    }
    parts.push(canonicalValue(value));
  }
  return JSON.stringify(parts);
}

/**
 * Serialize group columns; NULLs form their own group
 */
export function groupTuple(row: Row, columns: string[]): string {
  return JSON.stringify(columns.map((column) => canonicalValue(row[column])));
}

/**
 * Order rows by their key columns, column by column
 */
export function compareByKeys(a: Row, b: Row, columns: string[]): number {
  for (const column of columns) {
    const comparison = compareValues(a[column], b[column]);
    if (comparison !== 0) {
      return comparison;
    }
  }
  return 0;
}

/**
 * Project a row onto the given columns, optionally renaming them
 */
export function pickColumns(row: Row, columns: string[], rename?: string[]): Row {
  const picked: Row = {};
  columns.forEach((column, index) => {
    picked[rename?.[index] ?? column] = row[column] ?? null;
  });
  return picked;
}
