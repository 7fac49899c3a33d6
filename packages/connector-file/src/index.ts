/**
 * @driftcheck/connector-file
 *
 * Read-only datasets over CSV, Excel, and JSON files
 */

export { BaseFileDataset, inferColumnsFromRows } from './base-file-dataset.js';
export type { FileDatasetConfig, InferredType } from './base-file-dataset.js';

export { CsvDataset, createCsvDataset } from './csv-dataset.js';
export type { CsvDatasetConfig } from './csv-dataset.js';

export { JsonDataset, createJsonDataset } from './json-dataset.js';
export type { JsonDatasetConfig } from './json-dataset.js';

export { ExcelDataset, createExcelDataset } from './excel-dataset.js';
export type { ExcelDatasetConfig } from './excel-dataset.js';
