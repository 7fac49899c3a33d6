/**
 * Filter utilities for applying filters to rows in memory
 * Used by file datasets and for client-side filtering
 */

import type { FilterCondition, FilterOptions, Row } from '../types/index.js';
import { compareValues, isNullish, toTimestamp, valuesEqual } from './values.js';

/**
 * Ordering between a row value and a filter value.
 * Date filter values compare chronologically against dates and ISO strings.
 */
function compareForFilter(value: unknown, filterValue: unknown): number | null {
  if (isNullish(value)) {
    return null;
  }
  if (filterValue instanceof Date) {
    const time = toTimestamp(value);
    const bound = toTimestamp(filterValue);
    return time === null || bound === null ? null : time - bound;
  }
  return compareValues(value, filterValue);
}

function matchCondition(value: unknown, condition: FilterCondition): boolean {
  const { op, value: filterValue } = condition;

  switch (op) {
    case 'eq':
      return !isNullish(value) && valuesEqual(value, filterValue);

    case 'neq':
      return !isNullish(value) && !valuesEqual(value, filterValue);

    case 'gt': {
      const comparison = compareForFilter(value, filterValue);
      return comparison !== null && comparison > 0;
    }

    case 'lt': {
      const comparison = compareForFilter(value, filterValue);
      return comparison !== null && comparison < 0;
    }

    case 'gte': {
      const comparison = compareForFilter(value, filterValue);
      return comparison !== null && comparison >= 0;
    }

    case 'lte': {
      const comparison = compareForFilter(value, filterValue);
      return comparison !== null && comparison <= 0;
    }

    case 'contains':
      return !isNullish(value) && String(value).toLowerCase().includes(String(filterValue).toLowerCase());

    case 'in':
      return Array.isArray(filterValue) && filterValue.some((candidate) => valuesEqual(value, candidate));

    case 'is_null':
      return isNullish(value);

    case 'not_null':
      return !isNullish(value);

    default:
      return false;
  }
}

/**
 * Check if a row matches all filter conditions
 */
export function matchRow(row: Row, conditions: FilterCondition[]): boolean {
  return conditions.every((condition) => matchCondition(row[condition.field], condition));
}

/**
 * Apply filter options to an array of rows
 * Handles filtering, sorting, pagination, and column selection
 */
export function applyFilter(rows: Row[], options?: FilterOptions): Row[] {
  if (!options) {
    return rows;
  }

  let result = [...rows];

  const where = options.where;
  if (where && where.length > 0) {
    result = result.filter((row) => matchRow(row, where));
  }

  const orderBy = options.orderBy;
  if (orderBy && orderBy.length > 0) {
    result.sort((a, b) => {
      for (const { field, direction } of orderBy) {
        const comparison = compareValues(a[field], b[field]);
        if (comparison !== 0) {
          return direction === 'desc' ? -comparison : comparison;
        }
      }
      return 0;
    });
  }

  const offset = options.offset ?? 0;
  const limit = options.limit ?? result.length;
  result = result.slice(offset, offset + limit);

  if (options.select && options.select.length > 0) {
    const selectedFields = new Set(options.select);
    result = result.map((row) => {
      const selected: Row = {};
      for (const field of selectedFields) {
        if (Object.prototype.hasOwnProperty.call(row, field)) {
          selected[field] = row[field];
        }
      }
      return selected;
    });
  }

  return result;
}

/**
 * Count rows matching filter conditions (without pagination)
 */
export function countMatching(rows: Row[], conditions?: FilterCondition[]): number {
  if (!conditions || conditions.length === 0) {
    return rows.length;
  }
  return rows.filter((row) => matchRow(row, conditions)).length;
}
