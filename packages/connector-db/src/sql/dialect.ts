/**
 * SQL dialect differences between PostgreSQL and MySQL
 */

import type { AggregateFunction } from '@driftcheck/core';

export interface SqlDialect {
  readonly name: 'postgresql' | 'mysql';
  /** Quote an already validated identifier */
  quote(identifier: string): string;
  /** Positional parameter marker for the 1-based index */
  placeholder(index: number): string;
  /** Operator used for the case-insensitive 'contains' filter */
  readonly containsOperator: string;
  /**
   * SQL expression for an aggregate over a quoted column.
   * Null when the dialect has no single-expression form (MySQL median).
   */
  aggregate(fn: AggregateFunction, column: string): string | null;
  /** Ascending sort expression that puts NULLs last */
  ascNullsLast(expression: string): string;
}

export const postgresDialect: SqlDialect = {
  name: 'postgresql',
  quote: (identifier) => `"${identifier}"`,
  placeholder: (index) => `$${index}`,
  containsOperator: 'ILIKE',
  aggregate(fn, column) {
    switch (fn) {
      case 'count':
        return 'COUNT(*)';
      case 'count_non_null':
        return `COUNT(${column})`;
      case 'count_distinct':
        return `COUNT(DISTINCT ${column})`;
      case 'sum':
        return `SUM(${column})`;
      case 'avg':
        return `AVG(${column})`;
      case 'min':
        return `MIN(${column})`;
      case 'max':
        return `MAX(${column})`;
      case 'median':
        return `PERCENTILE_CONT(0.5) WITHIN GROUP (ORDER BY ${column})`;
      case 'stddev':
        return `STDDEV_SAMP(${column})`;
      case 'min_length':
        return `MIN(LENGTH(CAST(${column} AS TEXT)))`;
      case 'max_length':
        return `MAX(LENGTH(CAST(${column} AS TEXT)))`;
      case 'avg_length':
        return `AVG(LENGTH(CAST(${column} AS TEXT)))`;
      case 'span_days':
        return `(CAST(MAX(${column}) AS DATE) - CAST(MIN(${column}) AS DATE))`;
    }
  },
  ascNullsLast: (expression) => `${expression} ASC NULLS LAST`,
};

export const mysqlDialect: SqlDialect = {
  name: 'mysql',
  quote: (identifier) => `\`${identifier}\``,
  placeholder: () => '?',
  containsOperator: 'LIKE',
  aggregate(fn, column) {
    switch (fn) {
      case 'count':
        return 'COUNT(*)';
      case 'count_non_null':
        return `COUNT(${column})`;
      case 'count_distinct':
        return `COUNT(DISTINCT ${column})`;
      case 'sum':
        return `SUM(${column})`;
      case 'avg':
        return `AVG(${column})`;
      case 'min':
        return `MIN(${column})`;
      case 'max':
        return `MAX(${column})`;
      case 'median':
        return null;
      case 'stddev':
        return `STDDEV_SAMP(${column})`;
      case 'min_length':
        return `MIN(CHAR_LENGTH(CAST(${column} AS CHAR)))`;
      case 'max_length':
        return `MAX(CHAR_LENGTH(CAST(${column} AS CHAR)))`;
      case 'avg_length':
        return `AVG(CHAR_LENGTH(CAST(${column} AS CHAR)))`;
      case 'span_days':
        return `DATEDIFF(MAX(${column}), MIN(${column}))`;
    }
  },
  ascNullsLast: (expression) => `${expression} IS NULL, ${expression} ASC`,
};
