/**
 * MySQL Client
 *
 * Read-only wrapper around mysql2/promise.
 * Requires MySQL 8 (window functions and common table expressions).
 */

import mysql from 'mysql2/promise';
import { ConnectorError, errorMessage, toNumber } from '@driftcheck/core';
import type { Row } from '@driftcheck/core';
import { SqlClient, type SqlColumn } from '../sql/client.js';
import { mysqlDialect } from '../sql/dialect.js';
import { validateIdentifier } from '../sql/identifiers.js';
import { driverErrorCode } from '../sql/results.js';

export interface MySQLClientConfig {
  /** Connection id; datasets sharing it can push anti-joins down */
  id?: string;
  /** Connection string (alternative to individual params) */
  uri?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  /** SSL configuration */
  ssl?: boolean | { rejectUnauthorized?: boolean };
  /** Connection pool size */
  connectionLimit?: number;
  /** Per-query timeout in milliseconds */
  queryTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

const ERROR_CODES: { [code: string]: ConnectorError['code'] } = {
  PROTOCOL_SEQUENCE_TIMEOUT: 'TIMEOUT',
  ER_QUERY_TIMEOUT: 'TIMEOUT',
  ER_NO_SUCH_TABLE: 'NOT_FOUND',
  ER_BAD_FIELD_ERROR: 'SCHEMA_MISMATCH',
  ER_TABLEACCESS_DENIED_ERROR: 'PERMISSION_DENIED',
  ER_ACCESS_DENIED_ERROR: 'AUTHENTICATION_FAILED',
};

function isTruthyFlag(value: unknown): boolean {
  return value === true || value === 1 || value === '1' || value === 'YES';
}

export class MySQLClient extends SqlClient {
  readonly dialect = mysqlDialect;
  readonly connectionKey: string;
  protected readonly defaultSchema: string | undefined;

  private pool: mysql.Pool;
  private queryTimeoutMs?: number;
  private connected = false;

  constructor(config: MySQLClientConfig) {
    super();
    this.connectionKey =
      config.id ?? config.uri ?? `${config.host ?? 'localhost'}:${config.port ?? 3306}/${config.database ?? ''}`;
    this.defaultSchema = config.database;
    this.queryTimeoutMs = config.queryTimeoutMs;
    this.pool = mysql.createPool({
      uri: config.uri,
      host: config.host,
      port: config.port ?? 3306,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? (typeof config.ssl === 'object' ? config.ssl : {}) : undefined,
      connectionLimit: config.connectionLimit ?? 10,
      connectTimeout: config.connectionTimeoutMs,
      waitForConnections: true,
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
      const connection = await this.pool.getConnection();
      connection.release();
      this.connected = true;
    } catch (error) {
      const authFailed = driverErrorCode(error) === 'ER_ACCESS_DENIED_ERROR';
      throw new ConnectorError({
        code: authFailed ? 'AUTHENTICATION_FAILED' : 'CONNECTION_FAILED',
        message: `MySQL connection failed: ${errorMessage(error)}`,
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

  async query(sql: string, params: unknown[] = []): Promise<Row[]> {
    try {
      const [rows] = await this.pool.execute<mysql.RowDataPacket[]>({ sql, timeout: this.queryTimeoutMs }, params);
      return rows;
    } catch (error) {
      const code = driverErrorCode(error);
      throw new ConnectorError({
        code: (code && ERROR_CODES[code]) || 'READ_FAILED',
        message: `Query failed: ${errorMessage(error)}`,
        cause: error instanceof Error ? error : undefined,
        context: code ? { driverCode: code } : undefined,
      });
    }
  }

  /**
   * Get columns for a table, in ordinal order.
   * Without a schema the connection's current database is used.
   */
  async getColumns(table: string, schema?: string): Promise<SqlColumn[]> {
    validateIdentifier(table, 'table');
    if (schema) {
      validateIdentifier(schema, 'schema');
    }

    const sql = `
      SELECT
        COLUMN_NAME AS name,
        COLUMN_TYPE AS data_type,
        IS_NULLABLE AS is_nullable,
        CHARACTER_MAXIMUM_LENGTH AS max_length,
        ORDINAL_POSITION AS ordinal_position
      FROM INFORMATION_SCHEMA.COLUMNS
      WHERE TABLE_SCHEMA = COALESCE(?, DATABASE()) AND TABLE_NAME = ?
      ORDER BY ORDINAL_POSITION
    `;

    const rows = await this.query(sql, [schema ?? null, table]);
    if (rows.length === 0) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Table "${schema ? `${schema}.` : ''}${table}" not found or has no visible columns`,
        suggestion: 'Check the table name, database and the privileges of the configured user.',
      });
    }

    return rows.map((row, index) => ({
      name: String(row.name),
      dataType: String(row.data_type),
      isNullable: isTruthyFlag(row.is_nullable),
      maxLength: toNumber(row.max_length),
      ordinalPosition: toNumber(row.ordinal_position) ?? index + 1,
    }));
  }
}
