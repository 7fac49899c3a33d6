/**
 * PostgreSQL Client
 *
 * Read-only wrapper around a pg pool: catalog introspection plus the
 * shared scan, aggregate and anti-join operations.
 */

import pg from 'pg';
import { ConnectorError, errorMessage, toNumber } from '@driftcheck/core';
import type { Row } from '@driftcheck/core';
import { SqlClient, type SqlColumn } from '../sql/client.js';
import { postgresDialect } from '../sql/dialect.js';
import { validateIdentifier } from '../sql/identifiers.js';
import { driverErrorCode } from '../sql/results.js';

const { Pool } = pg;

export interface PostgresClientConfig {
  /** Connection id; datasets sharing it can push anti-joins down */
  id?: string;
  /** Connection string or individual params */
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL mode */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  max?: number;
  /** Server-side statement timeout in milliseconds */
  statementTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

const ERROR_CODES: { [sqlState: string]: ConnectorError['code'] } = {
  '57014': 'TIMEOUT',
  '42P01': 'NOT_FOUND',
  '42703': 'SCHEMA_MISMATCH',
  '42501': 'PERMISSION_DENIED',
  '28P01': 'AUTHENTICATION_FAILED',
};

export class PostgresClient extends SqlClient {
  readonly dialect = postgresDialect;
  readonly connectionKey: string;
  protected readonly defaultSchema = 'public';

  private pool: pg.Pool;
  private connected = false;

  constructor(config: PostgresClientConfig) {
    super();
    this.connectionKey =
      config.id ??
      config.connectionString ??
      `${config.host ?? 'localhost'}:${config.port ?? 5432}/${config.database ?? ''}`;
    this.pool = new Pool({
      connectionString: config.connectionString,
      host: config.host,
      port: config.port ?? 5432,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl,
      max: config.max ?? 10,
      statement_timeout: config.statementTimeoutMs,
      connectionTimeoutMillis: config.connectionTimeoutMs,
    });
  }

  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Test connection. Safe to call once per dataset sharing this client.
   */
  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }
    try {
      const client = await this.pool.connect();
      client.release();
      this.connected = true;
    } catch (error) {
      const authFailed = driverErrorCode(error) === '28P01';
      throw new ConnectorError({
        code: authFailed ? 'AUTHENTICATION_FAILED' : 'CONNECTION_FAILED',
        message: `PostgreSQL connection failed: ${errorMessage(error)}`,
        suggestion: 'Check host, port, database, user, and password.',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  /**
   * Close all connections
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
    this.connected = false;
  }

  async query(sql: string, params?: unknown[]): Promise<Row[]> {
    try {
      const result = await this.pool.query(sql, params);
      return result.rows;
    } catch (error) {
      const sqlState = driverErrorCode(error);
      throw new ConnectorError({
        code: (sqlState && ERROR_CODES[sqlState]) || 'READ_FAILED',
        message: `Query failed: ${errorMessage(error)}`,
        cause: error instanceof Error ? error : undefined,
        context: sqlState ? { sqlState } : undefined,
      });
    }
  }

  /**
   * Get columns for a table, in ordinal order
   */
  async getColumns(table: string, schema = 'public'): Promise<SqlColumn[]> {
    validateIdentifier(schema, 'schema');
    validateIdentifier(table, 'table');

    const sql = `
      SELECT
        c.column_name AS name,
        c.data_type AS data_type,
        c.is_nullable = 'YES' AS is_nullable,
        c.character_maximum_length AS max_length,
        c.ordinal_position AS ordinal_position
      FROM information_schema.columns c
      WHERE c.table_schema = $1 AND c.table_name = $2
      ORDER BY c.ordinal_position
    `;

    const rows = await this.query(sql, [schema, table]);
    if (rows.length === 0) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Table "${schema}"."${table}" not found or has no visible columns`,
        suggestion: 'Check the table name, schema and the privileges of the configured user.',
      });
    }

    return rows.map((row, index) => ({
      name: String(row.name),
      dataType: String(row.data_type),
      isNullable: row.is_nullable === true,
      maxLength: toNumber(row.max_length),
      ordinalPosition: toNumber(row.ordinal_position) ?? index + 1,
    }));
  }
}
