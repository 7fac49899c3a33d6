/**
 * Dataset Registry
 *
 * Builds the datasets of a config file. SQL datasets naming the same
 * connection share one client (and so one pushdown group); the registry
 * owns those clients and closes them after the datasets.
 */

import { resolve } from 'node:path';
import { ConnectorError, errorMessage } from '@driftcheck/core';
import type { IDataset } from '@driftcheck/core';
import {
  MySQLClient,
  PostgresClient,
  createMySQLDataset,
  createPostgresDataset,
} from '@driftcheck/connector-db';
import type { SqlClient } from '@driftcheck/connector-db';
import { createCsvDataset, createExcelDataset, createJsonDataset } from '@driftcheck/connector-file';
import type { ConnectionEntry, DatasetEntry, RuntimeConfig } from './config.js';
import { instrumentDataset } from './instrument-dataset.js';
import type { Logger } from './logger.js';

export interface DatasetRegistryOptions {
  logger: Logger;
  /** Runtime defaults for every dataset */
  runtimeDefaults?: RuntimeConfig;
  /** Relative file paths resolve against this directory (default: cwd) */
  baseDir?: string;
}

function createClient(entry: ConnectionEntry): SqlClient {
  switch (entry.type) {
    case 'postgresql':
      return new PostgresClient({
        id: entry.id,
        connectionString: entry.connectionString,
        host: entry.host,
        port: entry.port,
        database: entry.database,
        user: entry.user,
        password: entry.password,
        ssl: entry.ssl,
        max: entry.max,
        statementTimeoutMs: entry.statementTimeoutMs,
        connectionTimeoutMs: entry.connectionTimeoutMs,
      });
    case 'mysql':
      return new MySQLClient({
        id: entry.id,
        uri: entry.uri,
        host: entry.host,
        port: entry.port,
        database: entry.database,
        user: entry.user,
        password: entry.password,
        ssl: entry.ssl,
        connectionLimit: entry.connectionLimit,
        queryTimeoutMs: entry.queryTimeoutMs,
        connectionTimeoutMs: entry.connectionTimeoutMs,
      });
  }
}

export class DatasetRegistry {
  private readonly datasets = new Map<string, IDataset>();
  private readonly clients = new Map<string, SqlClient>();
  private readonly connectionEntries = new Map<string, ConnectionEntry>();
  private readonly options: DatasetRegistryOptions;

  constructor(options: DatasetRegistryOptions) {
    this.options = options;
  }

  addConnection(entry: ConnectionEntry): void {
    if (this.connectionEntries.has(entry.id)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Connection '${entry.id}' is already registered`,
        suggestion: 'Use a unique id for each connection.',
      });
    }
    this.connectionEntries.set(entry.id, entry);
  }

  /**
   * Build and register a dataset from its config entry
   */
  addDataset(entry: DatasetEntry): IDataset {
    if (this.datasets.has(entry.id)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Dataset '${entry.id}' is already registered`,
        connectorId: entry.id,
        suggestion: 'Use a unique id for each dataset.',
      });
    }

    const dataset = instrumentDataset(this.createDataset(entry), this.options.logger, {
      runtime: entry.runtime,
      defaults: this.options.runtimeDefaults,
    });
    this.datasets.set(entry.id, dataset);
    return dataset;
  }

  /**
   * Register a dataset built elsewhere (already instrumented or not)
   */
  register(dataset: IDataset): void {
    const id = dataset.config.id;
    if (this.datasets.has(id)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Dataset '${id}' is already registered`,
        connectorId: id,
        suggestion: 'Use a unique id for each dataset.',
      });
    }
    this.datasets.set(id, dataset);
  }

  get(id: string): IDataset | undefined {
    return this.datasets.get(id);
  }

  getOrThrow(id: string): IDataset {
    const dataset = this.datasets.get(id);
    if (!dataset) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Dataset '${id}' not found`,
        suggestion: `Available datasets: ${this.listIds().join(', ') || 'none'}`,
      });
    }
    return dataset;
  }

  listIds(): string[] {
    return Array.from(this.datasets.keys());
  }

  get size(): number {
    return this.datasets.size;
  }

  /**
   * Connect the given datasets (default: all). A dataset that fails to
   * connect is logged and left disconnected; its comparisons then fail
   * on their own and are recorded in the report.
   */
  async connect(ids: string[] = this.listIds()): Promise<string[]> {
    const unique = [...new Set(ids)];
    const results = await Promise.allSettled(unique.map((id) => this.getOrThrow(id).connect()));

    const failed: string[] = [];
    results.forEach((result, index) => {
      const id = unique[index];
      if (result.status === 'rejected' && id !== undefined) {
        failed.push(id);
        this.options.logger.warn('Dataset could not be connected', { dataset: id, error: result.reason });
      }
    });
    return failed;
  }

  async disconnectAll(): Promise<void> {
    const datasets = await Promise.allSettled(Array.from(this.datasets.values()).map((d) => d.disconnect()));
    const clients = await Promise.allSettled(
      Array.from(this.clients.values())
        .filter((client) => client.isConnected)
        .map((client) => client.disconnect())
    );

    for (const result of [...datasets, ...clients]) {
      if (result.status === 'rejected') {
        this.options.logger.warn('Disconnect failed', { error: errorMessage(result.reason) });
      }
    }
  }

  private createDataset(entry: DatasetEntry): IDataset {
    const name = entry.name ?? entry.id;
    const baseDir = this.options.baseDir ?? process.cwd();

    switch (entry.type) {
      case 'csv':
        return createCsvDataset({
          id: entry.id,
          name,
          filePath: resolve(baseDir, entry.filePath),
          encoding: entry.encoding,
          delimiter: entry.delimiter,
          headers: entry.headers,
          quote: entry.quote,
          skipEmptyLines: entry.skipEmptyLines,
          nullValues: entry.nullValues,
        });

      case 'json':
        return createJsonDataset({
          id: entry.id,
          name,
          filePath: resolve(baseDir, entry.filePath),
          encoding: entry.encoding,
          recordsPath: entry.recordsPath,
        });

      case 'excel':
        return createExcelDataset({
          id: entry.id,
          name,
          filePath: resolve(baseDir, entry.filePath),
          sheet: entry.sheet,
          headers: entry.headers,
          startRow: entry.startRow,
          startColumn: entry.startColumn,
        });

      case 'postgresql': {
        const client = this.clientFor(entry.connection);
        if (!(client instanceof PostgresClient)) {
          throw this.connectionMismatch(entry.id, entry.connection, 'postgresql');
        }
        return createPostgresDataset({ id: entry.id, name, table: entry.table, schema: entry.schema }, client);
      }

      case 'mysql': {
        const client = this.clientFor(entry.connection);
        if (!(client instanceof MySQLClient)) {
          throw this.connectionMismatch(entry.id, entry.connection, 'mysql');
        }
        return createMySQLDataset({ id: entry.id, name, table: entry.table, schema: entry.schema }, client);
      }
    }
  }

  private clientFor(connectionId: string): SqlClient {
    const existing = this.clients.get(connectionId);
    if (existing) return existing;

    const entry = this.connectionEntries.get(connectionId);
    if (!entry) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Unknown connection '${connectionId}'`,
        suggestion: `Declare it under connections (known: ${Array.from(this.connectionEntries.keys()).join(', ') || 'none'})`,
      });
    }
    const client = createClient(entry);
    this.clients.set(connectionId, client);
    return client;
  }

  private connectionMismatch(datasetId: string, connectionId: string, type: string): ConnectorError {
    return new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Dataset '${datasetId}' needs a ${type} connection, but '${connectionId}' is not one`,
      connectorId: datasetId,
    });
  }
}
