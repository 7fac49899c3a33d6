/**
 * MySQL datasets
 */

export { MySQLClient } from './client.js';
export type { MySQLClientConfig } from './client.js';

export { MySQLDataset, createMySQLDataset } from './dataset.js';
export type { MySQLDatasetConfig } from './dataset.js';
