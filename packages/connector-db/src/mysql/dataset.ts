/**
 * MySQL Dataset
 *
 * A table or view in a MySQL 8 database.
 */

import { BaseSqlDataset, type SqlDatasetConfig } from '../sql/sql-dataset.js';
import { MySQLClient, type MySQLClientConfig } from './client.js';

export interface MySQLDatasetConfig extends SqlDatasetConfig {
  type: 'mysql';
  /** Connection parameters, used when no shared client is passed */
  connection?: MySQLClientConfig;
}

export class MySQLDataset extends BaseSqlDataset<MySQLDatasetConfig> {
  constructor(config: Omit<MySQLDatasetConfig, 'type'> & { type?: 'mysql' }, client?: MySQLClient) {
    const full: MySQLDatasetConfig = { ...config, type: 'mysql' };
    super(full, client ?? new MySQLClient(full.connection ?? {}), client === undefined);
  }
}

/**
 * Factory function to create a MySQL dataset
 */
export function createMySQLDataset(
  config: Omit<MySQLDatasetConfig, 'type'>,
  client?: MySQLClient
): MySQLDataset {
  return new MySQLDataset(config, client);
}
