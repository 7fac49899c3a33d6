/**
 * Base SQL Dataset
 *
 * Implements IDataset and ISqlRelation over a table or view reached
 * through a SqlClient. Datasets may share one client; only a dataset
 * that created its own client closes it on disconnect.
 */

import { ConnectorError, aggregateQuerySchema } from '@driftcheck/core';
import type {
  AggregateQuery,
  AggregateRow,
  AntiJoinOptions,
  AntiJoinResult,
  ConnectionState,
  DatasetConfig,
  FilterCondition,
  FilterOptions,
  IDataset,
  ISqlRelation,
  ReadResult,
  RelationRef,
  SchemaSnapshot,
} from '@driftcheck/core';
import type { SqlClient } from './client.js';

export interface SqlDatasetConfig extends DatasetConfig {
  /** Table or view name */
  table: string;
  /** Schema (PostgreSQL default: public; MySQL default: the connection's database) */
  schema?: string;
}

export abstract class BaseSqlDataset<TConfig extends SqlDatasetConfig>
  implements IDataset<TConfig>, ISqlRelation
{
  readonly config: TConfig;
  readonly pushdownGroup: string;

  protected readonly client: SqlClient;
  private readonly ownsClient: boolean;
  private _state: ConnectionState = 'disconnected';
  private _snapshot: SchemaSnapshot | null = null;

  constructor(config: TConfig, client: SqlClient, ownsClient: boolean) {
    this.config = config;
    this.client = client;
    this.ownsClient = ownsClient;
    this.pushdownGroup = `${client.dialect.name}:${client.connectionKey}`;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';
    try {
      await this.client.connect();
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof ConnectorError) {
        throw new ConnectorError({
          code: error.code,
          message: error.message,
          connectorId: this.config.id,
          suggestion: error.suggestion,
          cause: error,
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to connect to ${this.client.dialect.name}: ${String(error)}`,
        connectorId: this.config.id,
        suggestion: 'Check connection parameters and network connectivity.',
      });
    }
  }

  async disconnect(): Promise<void> {
    if (this.ownsClient && this.client.isConnected) {
      await this.client.disconnect();
    }
    this._snapshot = null;
    this._state = 'disconnected';
  }

  async describe(forceRefresh = false): Promise<SchemaSnapshot> {
    this.ensureConnected();

    if (this._snapshot && !forceRefresh) {
      return this._snapshot;
    }
    if (forceRefresh) {
      this.client.clearColumnCache();
    }

    const columns = await this.client.getColumns(this.config.table, this.relation().schema);

    this._snapshot = {
      dataset: this.config.name,
      columns: columns.map((col) => ({
        name: col.name,
        declaredType: col.dataType,
        nullable: col.isNullable,
        ordinalPosition: col.ordinalPosition,
        maxLength: col.maxLength,
      })),
      capturedAt: new Date(),
      origin: 'catalog',
      dialect: this.client.dialect.name,
    };

    return this._snapshot;
  }

  async readRows(options?: FilterOptions): Promise<ReadResult> {
    this.ensureConnected();
    const ref = this.relation();

    const [rows, totalCount] = await Promise.all([
      this.client.select(ref, options),
      this.client.count(ref, options?.where),
    ]);

    const offset = options?.offset ?? 0;
    const limit = options?.limit ?? rows.length;
    const hasMore = offset + limit < totalCount;

    return { rows, totalCount, hasMore };
  }

  async countRows(where?: FilterCondition[]): Promise<number> {
    this.ensureConnected();
    return this.client.count(this.relation(), where);
  }

  async aggregate(query: AggregateQuery): Promise<AggregateRow[]> {
    this.ensureConnected();

    const parsed = aggregateQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new ConnectorError({
        code: 'VALIDATION_ERROR',
        message: `Invalid aggregate query: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
        connectorId: this.config.id,
      });
    }

    return this.client.aggregate(this.relation(), query);
  }

  relation(): RelationRef {
    return this.client.ref(this.config.table, this.config.schema);
  }

  async antiJoin(
    source: RelationRef,
    target: RelationRef,
    sourceKeys: string[],
    targetKeys: string[],
    options: AntiJoinOptions
  ): Promise<AntiJoinResult> {
    this.ensureConnected();
    return this.client.antiJoin(source, target, sourceKeys, targetKeys, options);
  }

  async unionAntiJoin(
    sources: { relation: RelationRef; keys: string[] }[],
    target: RelationRef,
    targetKeys: string[],
    options: AntiJoinOptions
  ): Promise<AntiJoinResult> {
    this.ensureConnected();
    return this.client.unionAntiJoin(sources, target, targetKeys, options);
  }

  async testConnection(): Promise<boolean> {
    try {
      if (!this.client.isConnected) {
        await this.client.connect();
      }
      await this.client.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  protected ensureConnected(): void {
    if (this._state !== 'connected') {
      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: 'Dataset is not connected',
        connectorId: this.config.id,
        suggestion: 'Call connect() before performing operations.',
      });
    }
  }
}
