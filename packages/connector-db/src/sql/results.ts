/**
 * Driver result normalization. pg returns bigint and numeric values as
 * strings; mysql2 returns DECIMAL as strings.
 */

import { toNumber } from '@driftcheck/core';
import type { AggregateFunction, AggregateValue, Row } from '@driftcheck/core';

const NUMERIC_RESULTS: ReadonlySet<AggregateFunction> = new Set<AggregateFunction>([
  'count',
  'count_non_null',
  'count_distinct',
  'sum',
  'avg',
  'median',
  'stddev',
  'min_length',
  'max_length',
  'avg_length',
  'span_days',
]);

export function normalizeAggregateValue(fn: AggregateFunction, raw: unknown): AggregateValue {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (NUMERIC_RESULTS.has(fn)) {
    return toNumber(raw);
  }
  if (typeof raw === 'number' || typeof raw === 'string' || raw instanceof Date) {
    return raw;
  }
  return String(raw);
}

/**
 * Numeric string from a driver as a number. Integers outside the safe
 * range stay strings.
 */
export function normalizeNumericValue(raw: unknown): unknown {
  if (typeof raw !== 'string') {
    return raw;
  }
  const parsed = toNumber(raw);
  if (parsed === null || (Number.isInteger(parsed) && !Number.isSafeInteger(parsed))) {
    return raw;
  }
  return parsed;
}

export function normalizeNumericColumns(rows: Row[], numericColumns: ReadonlySet<string>): Row[] {
  if (numericColumns.size === 0) {
    return rows;
  }
  return rows.map((row) => {
    const normalized: Row = { ...row };
    for (const column of numericColumns) {
      if (Object.prototype.hasOwnProperty.call(row, column)) {
        normalized[column] = normalizeNumericValue(row[column]);
      }
    }
    return normalized;
  });
}

export function readCount(raw: unknown): number {
  return toNumber(raw) ?? 0;
}

/**
 * Driver-specific error code (pg SQLSTATE or mysql2 error name), if any
 */
export function driverErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
