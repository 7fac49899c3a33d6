/**
 * Aggregate query types, executed as SQL by database datasets
 * and evaluated in memory by file datasets
 */

import type { FilterCondition } from './filter.js';

export type AggregateFunction =
  | 'count'          // row count, ignores column
  | 'count_non_null'
  | 'count_distinct'
  | 'sum'
  | 'avg'
  | 'min'
  | 'max'
  | 'median'
  | 'stddev'         // sample standard deviation
  | 'min_length'
  | 'max_length'
  | 'avg_length'
  | 'span_days';     // whole days between min and max of a temporal column

export interface AggregateMeasure {
  fn: AggregateFunction;
  /** Required for every function except 'count' */
  column?: string;
  /** Name of the value in the result row */
  alias: string;
}

export interface HavingCondition {
  /** Alias of a measure in the same query */
  alias: string;
  op: 'gt' | 'gte' | 'lt' | 'lte' | 'eq';
  value: number;
}

export interface AggregateQuery {
  measures: AggregateMeasure[];
  /** Group columns; omitted means a single result row */
  groupBy?: string[];
  where?: FilterCondition[];
  having?: HavingCondition[];
}

/** Scalar result of an aggregate; temporal min/max stay Dates */
export type AggregateValue = number | string | Date | null;

export interface AggregateRow {
  /** Group column values, keyed by column name (empty when not grouped) */
  group: { [column: string]: unknown };
  values: { [alias: string]: AggregateValue };
}
