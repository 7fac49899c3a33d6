/**
 * PostgreSQL Dataset
 *
 * A table or view in a PostgreSQL database.
 */

import { BaseSqlDataset, type SqlDatasetConfig } from '../sql/sql-dataset.js';
import { PostgresClient, type PostgresClientConfig } from './client.js';

export interface PostgresDatasetConfig extends SqlDatasetConfig {
  type: 'postgresql';
  /** Connection parameters, used when no shared client is passed */
  connection?: PostgresClientConfig;
}

export class PostgresDataset extends BaseSqlDataset<PostgresDatasetConfig> {
  /**
   * @param client - Shared client of a named connection; when omitted the
   *   dataset opens (and closes) its own pool from config.connection
   */
  constructor(config: Omit<PostgresDatasetConfig, 'type'> & { type?: 'postgresql' }, client?: PostgresClient) {
    const full: PostgresDatasetConfig = { ...config, type: 'postgresql' };
    super(full, client ?? new PostgresClient(full.connection ?? {}), client === undefined);
  }
}

/**
 * Factory function to create a PostgreSQL dataset
 */
export function createPostgresDataset(
  config: Omit<PostgresDatasetConfig, 'type'>,
  client?: PostgresClient
): PostgresDataset {
  return new PostgresDataset(config, client);
}
