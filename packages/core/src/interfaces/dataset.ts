/**
 * Dataset capability interface
 *
 * Every dataset (database table, CSV, JSON, Excel) implements IDataset.
 * The reconciliation engine only relies on these narrow capabilities:
 * schema introspection, row scans, row counts and aggregate queries.
 */

import type {
  AggregateQuery,
  AggregateRow,
  FilterCondition,
  FilterOptions,
  ReadResult,
  Row,
  SchemaSnapshot,
} from '../types/index.js';

/** Configuration common to all datasets */
export interface DatasetConfig {
  /** Unique identifier for this dataset */
  id: string;
  /** Human-readable name, used in reports */
  name: string;
  /** Dataset type (csv, json, excel, postgresql, mysql) */
  type: string;
}

/** Connection state */
export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'error';

export interface IDataset<TConfig extends DatasetConfig = DatasetConfig> {
  readonly config: TConfig;

  readonly state: ConnectionState;

  /**
   * Open the underlying connection or load the file
   * @throws ConnectorError if the dataset cannot be reached
   */
  connect(): Promise<void>;

  disconnect(): Promise<void>;

  /**
   * Describe the dataset's columns
   * @param forceRefresh - Re-read the catalog even if a snapshot is cached
   */
  describe(forceRefresh?: boolean): Promise<SchemaSnapshot>;

  /** Scan rows, optionally filtered, sorted and paginated */
  readRows(options?: FilterOptions): Promise<ReadResult>;

  /** Count rows matching the conditions (all rows when omitted) */
  countRows(where?: FilterCondition[]): Promise<number>;

  /** Execute an aggregate query, grouped or not */
  aggregate(query: AggregateQuery): Promise<AggregateRow[]>;

  testConnection(): Promise<boolean>;
}

/** Schema-qualified table reference */
export interface RelationRef {
  schema?: string;
  table: string;
}

export interface AntiJoinOptions {
  /** Max rows (or key tuples) to return as samples */
  sampleLimit: number;
}

export interface AntiJoinResult {
  missingCount: number;
  /** Rows (or distinct key tuples for unions) examined on the source side, when known */
  totalCount?: number;
  /** Sample of missing rows, ordered by key */
  sample: Row[];
}

/**
 * Datasets backed by a SQL relation. Two relations with the same
 * pushdownGroup live on the same connection, so anti-joins between
 * them can run inside the database.
 */
export interface ISqlRelation {
  readonly pushdownGroup: string;

  relation(): RelationRef;

  /**
   * Count rows of source with no key match in target.
   * Samples are full source rows.
   */
  antiJoin(
    source: RelationRef,
    target: RelationRef,
    sourceKeys: string[],
    targetKeys: string[],
    options: AntiJoinOptions
  ): Promise<AntiJoinResult>;

  /**
   * Count distinct key tuples of the union of sources absent from target.
   * Samples contain key columns only, named after the target keys.
   */
  unionAntiJoin(
    sources: { relation: RelationRef; keys: string[] }[],
    target: RelationRef,
    targetKeys: string[],
    options: AntiJoinOptions
  ): Promise<AntiJoinResult>;
}

/**
 * Type guard for datasets that can push anti-joins down
 */
export function isSqlRelation<T extends IDataset>(dataset: T): dataset is T & ISqlRelation {
  return (
    'pushdownGroup' in dataset &&
    typeof dataset.pushdownGroup === 'string' &&
    'antiJoin' in dataset &&
    typeof dataset.antiJoin === 'function' &&
    'unionAntiJoin' in dataset &&
    typeof dataset.unionAntiJoin === 'function' &&
    'relation' in dataset &&
    typeof dataset.relation === 'function'
  );
}

/**
 * Factory function type for creating datasets
 */
export type DatasetFactory<TConfig extends DatasetConfig> = (
  config: TConfig
) => IDataset<TConfig>;
