/**
 * CSV Dataset
 * Reads CSV files with automatic type casting and schema inference
 */

import { parse } from 'csv-parse/sync';
import type { Row } from '@driftcheck/core';
import { ConnectorError } from '@driftcheck/core';
import { BaseFileDataset, type FileDatasetConfig } from './base-file-dataset.js';

export interface CsvDatasetConfig extends FileDatasetConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Whether first row contains headers (default: true) */
  headers?: boolean;
  /** Quote character (default: '"') */
  quote?: string;
  /** Skip empty lines (default: true) */
  skipEmptyLines?: boolean;
  /** Cell values read as NULL (default: [''] ) */
  nullValues?: string[];
}

const FORBIDDEN_ROW_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

export class CsvDataset extends BaseFileDataset<CsvDatasetConfig> {
  constructor(config: Omit<CsvDatasetConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async parseContent(content: string): Promise<Row[]> {
    const nullValues = new Set(this.config.nullValues ?? ['']);

    const parsed: unknown = parse(content, {
      columns: false, // Parse rows first so we can safely map headers ourselves
      delimiter: this.config.delimiter ?? ',',
      quote: this.config.quote ?? '"',
      skip_empty_lines: this.config.skipEmptyLines !== false,
      trim: true,
      cast: (value) => {
        if (nullValues.has(value)) {
          return null;
        }
        // leading zeros mark codes, not numbers
        if (/^-?\d+(\.\d+)?$/.test(value) && !/^-?0\d/.test(value)) {
          const numeric = Number(value);
          return Number.isSafeInteger(numeric) || !Number.isInteger(numeric) ? numeric : value;
        }
        if (value === 'true' || value === 'false') {
          return value === 'true';
        }
        return value;
      },
    });

    const rows = Array.isArray(parsed) ? parsed.filter((row): row is unknown[] => Array.isArray(row)) : [];
    const firstRow = rows[0];
    if (firstRow === undefined) {
      this._columns = [];
      return [];
    }

    const hasHeaders = this.config.headers !== false;
    const headers = hasHeaders
      ? firstRow.map((h) => String(h ?? ''))
      : Array.from({ length: rows.reduce((widest, r) => Math.max(widest, r.length), 0) }, (_, i) => `Column${i + 1}`);

    for (const header of headers) {
      if (FORBIDDEN_ROW_KEYS.has(header)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Unsafe CSV header name: ${header}`,
          connectorId: this.config.id,
          suggestion: 'Rename the column to a safe field name and try again.',
        });
      }
    }

    this._columns = headers;
    const dataRows = hasHeaders ? rows.slice(1) : rows;
    return dataRows.map((values) => {
      const row: Row = Object.create(null);
      headers.forEach((header, i) => {
        row[header] = values[i] ?? null;
      });
      return row;
    });
  }
}

/**
 * Factory function to create a CSV dataset
 */
export function createCsvDataset(config: Omit<CsvDatasetConfig, 'type'>): CsvDataset {
  return new CsvDataset(config);
}
