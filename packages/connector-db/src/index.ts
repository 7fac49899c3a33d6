/**
 * @driftcheck/connector-db
 *
 * Read-only PostgreSQL and MySQL datasets with aggregate and anti-join pushdown
 */

export * from './postgresql/index.js';
export * from './mysql/index.js';

export { SqlClient } from './sql/client.js';
export type { SqlColumn } from './sql/client.js';
export { BaseSqlDataset } from './sql/sql-dataset.js';
export type { SqlDatasetConfig } from './sql/sql-dataset.js';
export { postgresDialect, mysqlDialect } from './sql/dialect.js';
export type { SqlDialect } from './sql/dialect.js';
