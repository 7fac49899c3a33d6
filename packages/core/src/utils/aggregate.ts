/**
 * In-memory evaluation of aggregate queries.
 * Mirrors the SQL semantics used by database datasets: aggregates ignore
 * NULLs, sum/avg over no values are NULL, stddev is the sample deviation.
 */

import type {
  AggregateMeasure,
  AggregateQuery,
  AggregateRow,
  AggregateValue,
  HavingCondition,
  Row,
} from '../types/index.js';
import { ConnectorError } from '../errors/index.js';
import { matchRow } from './filter.js';
import { groupTuple } from './keys.js';
import { canonicalValue, compareValues, isNullish, toNumber, toTimestamp } from './values.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function numericValues(values: unknown[]): number[] {
  const numbers: number[] = [];
  for (const value of values) {
    const numeric = toNumber(value);
    if (numeric !== null) {
      numbers.push(numeric);
    }
  }
  return numbers;
}

function mean(numbers: number[]): number | null {
  if (numbers.length === 0) {
    return null;
  }
  return numbers.reduce((sum, n) => sum + n, 0) / numbers.length;
}

export function median(numbers: number[]): number | null {
  if (numbers.length === 0) {
    return null;
  }
  const sorted = [...numbers].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[middle - 1] ?? upper;
  return (lower + upper) / 2;
}

export function sampleStddev(numbers: number[]): number | null {
  if (numbers.length < 2) {
    return null;
  }
  const avg = mean(numbers) ?? 0;
  const squared = numbers.reduce((sum, n) => sum + (n - avg) ** 2, 0);
  return Math.sqrt(squared / (numbers.length - 1));
}

function asAggregateValue(value: unknown): AggregateValue {
  if (isNullish(value)) {
    return null;
  }
  if (typeof value === 'number' || typeof value === 'string' || value instanceof Date) {
    return value;
  }
  return String(value);
}

function extreme(values: unknown[], direction: 1 | -1): AggregateValue {
  let best: unknown = null;
  for (const value of values) {
    if (best === null || compareValues(value, best) * direction > 0) {
      best = value;
    }
  }
  return asAggregateValue(best);
}

function lengths(values: unknown[]): number[] {
  return values.map((value) => String(value).length);
}

/**
 * Smallest and largest number in one pass; columns can be too long to
 * spread into Math.min and Math.max.
 */
function numericRange(numbers: number[]): { min: number; max: number } | null {
  if (numbers.length === 0) {
    return null;
  }
  let min = Infinity;
  let max = -Infinity;
  for (const n of numbers) {
    if (n < min) min = n;
    if (n > max) max = n;
  }
  return { min, max };
}

/**
 * Compute one measure over the rows of a group
 */
export function computeMeasure(rows: Row[], measure: AggregateMeasure): AggregateValue {
  if (measure.fn === 'count') {
    return rows.length;
  }

  const column = measure.column;
  if (!column) {
    throw new ConnectorError({
      code: 'VALIDATION_ERROR',
      message: `Aggregate "${measure.fn}" (alias "${measure.alias}") requires a column`,
      suggestion: 'Set the column of every measure except count',
    });
  }

  const values = rows.map((row) => row[column]).filter((value) => !isNullish(value));

  switch (measure.fn) {
    case 'count_non_null':
      return values.length;
    case 'count_distinct':
      return new Set(values.map((value) => canonicalValue(value))).size;
    case 'sum': {
      const numbers = numericValues(values);
      return numbers.length === 0 ? null : numbers.reduce((sum, n) => sum + n, 0);
    }
    case 'avg':
      return mean(numericValues(values));
    case 'min':
      return extreme(values, -1);
    case 'max':
      return extreme(values, 1);
    case 'median':
      return median(numericValues(values));
    case 'stddev':
      return sampleStddev(numericValues(values));
    case 'min_length':
      return numericRange(lengths(values))?.min ?? null;
    case 'max_length':
      return numericRange(lengths(values))?.max ?? null;
    case 'avg_length':
      return mean(lengths(values));
    case 'span_days': {
      const times = values.map((value) => toTimestamp(value)).filter((time): time is number => time !== null);
      const range = numericRange(times);
      if (!range) {
        return null;
      }
      // calendar days (UTC), matching a date cast in SQL
      return Math.floor(range.max / MS_PER_DAY) - Math.floor(range.min / MS_PER_DAY);
    }
  }
}

function matchHaving(values: AggregateRow['values'], condition: HavingCondition): boolean {
  const actual = toNumber(values[condition.alias]);
  if (actual === null) {
    return false;
  }
  switch (condition.op) {
    case 'gt':
      return actual > condition.value;
    case 'gte':
      return actual >= condition.value;
    case 'lt':
      return actual < condition.value;
    case 'lte':
      return actual <= condition.value;
    case 'eq':
      return actual === condition.value;
  }
}

/**
 * Evaluate an aggregate query over rows held in memory.
 * Groups are returned in order of first appearance.
 */
export function evaluateAggregate(rows: Row[], query: AggregateQuery): AggregateRow[] {
  const where = query.where;
  const filtered = where && where.length > 0 ? rows.filter((row) => matchRow(row, where)) : rows;
  const groupBy = query.groupBy ?? [];

  const groups = new Map<string, { group: Row; rows: Row[] }>();
  if (groupBy.length === 0) {
    groups.set('', { group: {}, rows: filtered });
  } else {
    for (const row of filtered) {
      const tuple = groupTuple(row, groupBy);
      let entry = groups.get(tuple);
      if (!entry) {
        const group: Row = {};
        for (const column of groupBy) {
          group[column] = row[column] ?? null;
        }
        entry = { group, rows: [] };
        groups.set(tuple, entry);
      }
      entry.rows.push(row);
    }
  }

  const result: AggregateRow[] = [];
  for (const { group, rows: groupRows } of groups.values()) {
    const values: AggregateRow['values'] = {};
    for (const measure of query.measures) {
      values[measure.alias] = computeMeasure(groupRows, measure);
    }
    if ((query.having ?? []).every((condition) => matchHaving(values, condition))) {
      result.push({ group, values });
    }
  }
  return result;
}
