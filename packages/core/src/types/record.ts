/**
 * Row types exchanged between datasets and the reconciliation engine
 */

/** A single row of a tabular dataset, keyed by column name */
export type Row = {
  [column: string]: unknown;
};

/** Result of a row scan */
export interface ReadResult {
  /** The retrieved rows */
  rows: Row[];
  /** Total count matching the filter (if available, for pagination) */
  totalCount?: number;
  /** Whether more rows exist beyond the current page */
  hasMore?: boolean;
}
