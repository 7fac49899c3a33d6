/**
 * Aggregate Profiler
 *
 * Per-column statistics computed through the dataset's aggregate
 * capability, one query per column. A failing column is recorded on its
 * profile; the others continue.
 */

import { categorizeType, toNumber } from '@driftcheck/core';
import type { AggregateMeasure, AggregateRow, ColumnCategory, FilterCondition, IDataset } from '@driftcheck/core';
import { toReconError } from '../errors/index.js';
import { describe } from '../schema/schema-introspector.js';
import type { ColumnProfile, ProfiledColumn, DatasetProfile, ProfileOptions } from '../types/index.js';
import { resolveWindow, windowConditions } from './window.js';

const NON_NULL = 'non_null';

const MEASURES: Record<ColumnCategory, Omit<AggregateMeasure, 'column'>[]> = {
  numeric: [
    { fn: 'min', alias: 'min_value' },
    { fn: 'max', alias: 'max_value' },
    { fn: 'avg', alias: 'mean_value' },
    { fn: 'median', alias: 'median_value' },
  ],
  string: [
    { fn: 'min_length', alias: 'min_length' },
    { fn: 'max_length', alias: 'max_length' },
    { fn: 'avg_length', alias: 'avg_length' },
    { fn: 'count_distinct', alias: 'distinct_count' },
  ],
  temporal: [
    { fn: 'min', alias: 'min_value' },
    { fn: 'max', alias: 'max_value' },
    { fn: 'span_days', alias: 'span_days' },
  ],
  other: [],
};

/**
 * Null percentage of a column; null when there are no rows
 */
export function nullPercentage(nullCount: number, totalRows: number): number | null {
  return totalRows === 0 ? null : (100 * nullCount) / totalRows;
}

function emptyProfile(target: ProfiledColumn): ColumnProfile {
  const base = { column: target.name, nonNullCount: null, nullCount: null, nullPercentage: null };
  switch (target.category) {
    case 'numeric':
      return { ...base, category: 'numeric', min: null, max: null, mean: null, median: null };
    case 'string':
      return { ...base, category: 'string', minLength: null, maxLength: null, avgLength: null, distinctCount: null };
    case 'temporal':
      return { ...base, category: 'temporal', min: null, max: null, spanDays: null };
    case 'other':
      return { ...base, category: 'other' };
  }
}

function toProfile(target: ProfiledColumn, values: AggregateRow['values'], totalRows: number): ColumnProfile {
  const nonNullCount = toNumber(values[NON_NULL]) ?? 0;
  const nullCount = totalRows - nonNullCount;
  const base = {
    column: target.name,
    nonNullCount,
    nullCount,
    nullPercentage: nullPercentage(nullCount, totalRows),
  };

  switch (target.category) {
    case 'numeric':
      return {
        ...base,
        category: 'numeric',
        min: toNumber(values.min_value),
        max: toNumber(values.max_value),
        mean: toNumber(values.mean_value),
        median: toNumber(values.median_value),
      };
    case 'string':
      return {
        ...base,
        category: 'string',
        minLength: toNumber(values.min_length),
        maxLength: toNumber(values.max_length),
        avgLength: toNumber(values.avg_length),
        distinctCount: toNumber(values.distinct_count),
      };
    case 'temporal':
      return {
        ...base,
        category: 'temporal',
        min: values.min_value ?? null,
        max: values.max_value ?? null,
        spanDays: toNumber(values.span_days),
      };
    case 'other':
      return { ...base, category: 'other' };
  }
}

async function profileColumn(
  dataset: IDataset,
  target: ProfiledColumn,
  where: FilterCondition[],
  totalRows: number
): Promise<ColumnProfile> {
  const measures: AggregateMeasure[] = [
    { fn: 'count_non_null', column: target.name, alias: NON_NULL },
    ...MEASURES[target.category].map((measure) => ({ ...measure, column: target.name })),
  ];

  try {
    const [row] = await dataset.aggregate({ measures, ...(where.length > 0 ? { where } : {}) });
    return toProfile(target, row?.values ?? {}, totalRows);
  } catch (error) {
    const failure = toReconError(error, 'QUERY_EXECUTION_FAILURE', {
      dataset: dataset.config.name,
      column: target.name,
    }).toFailure('profiling');
    return { ...emptyProfile(target), failure };
  }
}

/**
 * Profile a dataset. Without explicit columns, every column of the
 * dataset's schema is profiled under the category of its declared type.
 *
 * @throws ReconError METADATA_UNAVAILABLE when columns must be derived and the catalog is unavailable,
 *   QUERY_EXECUTION_FAILURE when the row count fails, INVALID_OPTIONS for a malformed window
 */
export async function profile(
  dataset: IDataset,
  columns?: ProfiledColumn[],
  options: ProfileOptions = {}
): Promise<DatasetProfile> {
  const window = options.window ? resolveWindow(options.window) : undefined;
  const where = window ? windowConditions(window) : [];

  const profiledColumns =
    columns && columns.length > 0
      ? columns
      : (await describe(dataset)).columns.map((column) => ({
          name: column.name,
          category: categorizeType(column.declaredType),
        }));

  let totalRows: number;
  try {
    totalRows = await dataset.countRows(where.length > 0 ? where : undefined);
  } catch (error) {
    throw toReconError(error, 'QUERY_EXECUTION_FAILURE', { dataset: dataset.config.name });
  }

  const profiles = await Promise.all(profiledColumns.map((target) => profileColumn(dataset, target, where, totalRows)));

  return {
    dataset: dataset.config.name,
    totalRows,
    columns: profiles,
    ...(window ? { window } : {}),
  };
}
