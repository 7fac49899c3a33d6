/**
 * PostgreSQL datasets
 */

export { PostgresClient } from './client.js';
export type { PostgresClientConfig } from './client.js';

export { PostgresDataset, createPostgresDataset } from './dataset.js';
export type { PostgresDatasetConfig } from './dataset.js';
