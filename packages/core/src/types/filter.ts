/**
 * Unified filter syntax for scanning rows across all datasets
 */

export type FilterOperator =
  | 'eq'       // equals
  | 'neq'      // not equals
  | 'gt'       // greater than
  | 'lt'       // less than
  | 'gte'      // greater than or equal
  | 'lte'      // less than or equal
  | 'contains' // string contains (case-insensitive)
  | 'in'       // value in array
  | 'is_null'
  | 'not_null';

export const FILTER_OPERATORS: readonly FilterOperator[] = [
  'eq',
  'neq',
  'gt',
  'lt',
  'gte',
  'lte',
  'contains',
  'in',
  'is_null',
  'not_null',
];

export interface FilterCondition {
  field: string;
  op: FilterOperator;
  value?: unknown;
}

export interface OrderBy {
  field: string;
  direction: 'asc' | 'desc';
}

export interface FilterOptions {
  /** Filter conditions (AND logic) */
  where?: FilterCondition[];
  /** Columns to return (empty = all) */
  select?: string[];
  /** Sort configuration */
  orderBy?: OrderBy[];
  /** Pagination: number of rows to skip */
  offset?: number;
  /** Pagination: max rows to return */
  limit?: number;
}

/**
 * Type guard to check if a value is a valid FilterOperator
 */
export function isFilterOperator(value: unknown): value is FilterOperator {
  return typeof value === 'string' && FILTER_OPERATORS.some((op) => op === value);
}
