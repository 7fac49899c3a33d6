/**
 * Base class for file datasets
 * Loads the whole file on connect; schema inference, filtering and
 * aggregates run in memory
 */

import { readFile, access } from 'node:fs/promises';
import { constants } from 'node:fs';
import type {
  AggregateQuery,
  AggregateRow,
  ColumnDescriptor,
  ConnectionState,
  DatasetConfig,
  FilterCondition,
  FilterOptions,
  IDataset,
  ReadResult,
  Row,
  SchemaSnapshot,
} from '@driftcheck/core';
import {
  ConnectorError,
  aggregateQuerySchema,
  applyFilter,
  countMatching,
  errorMessage,
  evaluateAggregate,
  extractFieldNames,
} from '@driftcheck/core';

export interface FileDatasetConfig extends DatasetConfig {
  /** Path to the file */
  filePath: string;
  /** Character encoding (default: utf-8) */
  encoding?: BufferEncoding;
}

/** Declared types assigned to file columns */
export type InferredType = 'string' | 'number' | 'integer' | 'boolean' | 'date' | 'datetime' | 'array' | 'object';

/**
 * Infer a declared type from a sample value
 */
function inferValueType(value: unknown): InferredType {
  if (typeof value === 'boolean') {
    return 'boolean';
  }

  if (typeof value === 'number' || typeof value === 'bigint') {
    return typeof value === 'bigint' || Number.isInteger(value) ? 'integer' : 'number';
  }

  if (value instanceof Date) {
    return 'datetime';
  }

  if (Array.isArray(value)) {
    return 'array';
  }

  if (typeof value === 'object' && value !== null) {
    return 'object';
  }

  const strValue = String(value);

  if (/^\d{4}-\d{2}-\d{2}$/.test(strValue)) {
    return 'date';
  }

  if (/^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/.test(strValue)) {
    return 'datetime';
  }

  if (/^-?\d+$/.test(strValue)) {
    return 'integer';
  }

  if (/^-?\d+\.\d*$/.test(strValue)) {
    return 'number';
  }

  return 'string';
}

/**
 * Infer column descriptors from rows by analyzing values.
 * The most common type wins; integer and number together widen to number.
 * A column is nullable when any row lacks a value for it.
 */
export function inferColumnsFromRows(rows: Row[], columnNames: string[] = extractFieldNames(rows)): ColumnDescriptor[] {
  return columnNames.map((name, index) => {
    const values = rows.map((row) => row[name]).filter((v) => v !== null && v !== undefined && v !== '');

    const typeCount = new Map<InferredType, number>();
    for (const value of values) {
      const type = inferValueType(value);
      typeCount.set(type, (typeCount.get(type) ?? 0) + 1);
    }

    let declaredType: InferredType = 'string';
    let maxCount = 0;
    for (const [type, count] of typeCount) {
      if (count > maxCount) {
        maxCount = count;
        declaredType = type;
      }
    }
    if (declaredType === 'integer' && typeCount.has('number')) {
      declaredType = 'number';
    }

    return {
      name,
      declaredType,
      nullable: values.length < rows.length,
      ordinalPosition: index + 1,
    };
  });
}

/**
 * Abstract base class for file datasets
 */
export abstract class BaseFileDataset<TConfig extends FileDatasetConfig> implements IDataset<TConfig> {
  readonly config: TConfig;
  protected _state: ConnectionState = 'disconnected';
  protected _snapshot: SchemaSnapshot | null = null;
  protected _rows: Row[] = [];
  /** Column order as declared by the file (header row), when it has one */
  protected _columns: string[] | null = null;

  constructor(config: TConfig) {
    this.config = config;
  }

  get state(): ConnectionState {
    return this._state;
  }

  async connect(): Promise<void> {
    this._state = 'connecting';

    try {
      await access(this.config.filePath, constants.R_OK);

      const content = await readFile(this.config.filePath, this.config.encoding ?? 'utf-8');

      this._rows = await this.parseContent(content);
      this._state = 'connected';
    } catch (error) {
      this._state = 'error';

      if (error instanceof ConnectorError) {
        throw error;
      }

      const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;

      if (code === 'ENOENT') {
        throw new ConnectorError({
          code: 'NOT_FOUND',
          message: `File not found: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check that the file path is correct and the file exists.',
        });
      }

      if (code === 'EACCES') {
        throw new ConnectorError({
          code: 'PERMISSION_DENIED',
          message: `Cannot read file: ${this.config.filePath}`,
          connectorId: this.config.id,
          suggestion: 'Check file permissions.',
        });
      }

      throw new ConnectorError({
        code: 'CONNECTION_FAILED',
        message: `Failed to read file: ${errorMessage(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async disconnect(): Promise<void> {
    this._rows = [];
    this._columns = null;
    this._snapshot = null;
    this._state = 'disconnected';
  }

  async describe(forceRefresh = false): Promise<SchemaSnapshot> {
    this.ensureConnected();

    if (!this._snapshot || forceRefresh) {
      this._snapshot = {
        dataset: this.config.name,
        columns: inferColumnsFromRows(this._rows, this._columns ?? undefined),
        capturedAt: new Date(),
        origin: 'inferred',
      };
    }

    return this._snapshot;
  }

  async readRows(options?: FilterOptions): Promise<ReadResult> {
    this.ensureConnected();

    const totalCount = countMatching(this._rows, options?.where);
    const rows = applyFilter(this._rows, options);

    const offset = options?.offset ?? 0;
    const limit = options?.limit ?? rows.length;
    const hasMore = offset + limit < totalCount;

    return { rows, totalCount, hasMore };
  }

  async countRows(where?: FilterCondition[]): Promise<number> {
    this.ensureConnected();
    return countMatching(this._rows, where);
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

    return evaluateAggregate(this._rows, query);
  }

  async testConnection(): Promise<boolean> {
    try {
      await access(this.config.filePath, constants.R_OK);
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

  /**
   * Parse file content into rows (implemented by subclasses)
   */
  protected abstract parseContent(content: string): Promise<Row[]>;
}
