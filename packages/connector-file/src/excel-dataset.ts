/**
 * Excel Dataset
 * Reads a worksheet of an .xlsx workbook with automatic schema inference
 */

import ExcelJS from 'exceljs';
import type { Row } from '@driftcheck/core';
import { ConnectorError } from '@driftcheck/core';
import { BaseFileDataset, type FileDatasetConfig } from './base-file-dataset.js';

export interface ExcelDatasetConfig extends FileDatasetConfig {
  type: 'excel';
  /** Sheet name or 1-based index (default: first sheet) */
  sheet?: string | number;
  /** Whether first row contains headers (default: true) */
  headers?: boolean;
  /** Starting row (1-indexed, default: 1) */
  startRow?: number;
  /** Starting column (1-indexed, default: 1) */
  startColumn?: number;
}

const FORBIDDEN_ROW_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Spreadsheet column letters (1 → A, 27 → AA)
 */
export function columnLetters(colNumber: number): string {
  let name = '';
  let n = colNumber;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    name = String.fromCharCode(65 + remainder) + name;
    n = Math.floor((n - 1) / 26);
  }
  return name;
}

function cellValue(cell: ExcelJS.Cell): unknown {
  const value = cell.value;
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    return value;
  }

  if (typeof value === 'object') {
    // formula results
    if ('result' in value) {
      return value.result ?? null;
    }
    if ('richText' in value) {
      return value.richText.map((rt) => rt.text).join('');
    }
    if ('hyperlink' in value) {
      return value.text;
    }
    if ('error' in value) {
      return null;
    }
  }

  return value;
}

export class ExcelDataset extends BaseFileDataset<ExcelDatasetConfig> {
  constructor(config: Omit<ExcelDatasetConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async parseContent(_content: string): Promise<Row[]> {
    // ExcelJS reads the binary file itself
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.filePath);

    const sheet =
      this.config.sheet === undefined ? workbook.worksheets[0] : workbook.getWorksheet(this.config.sheet);
    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        connectorId: this.config.id,
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    const startRow = this.config.startRow ?? 1;
    const startColumn = this.config.startColumn ?? 1;
    const hasHeaders = this.config.headers !== false;

    const headers: string[] = [];
    if (hasHeaders) {
      sheet.getRow(startRow).eachCell({ includeEmpty: false }, (cell, colNumber) => {
        if (colNumber >= startColumn) {
          headers[colNumber - startColumn] = String(cellValue(cell) ?? `Column${colNumber}`);
        }
      });

      for (const header of headers) {
        if (FORBIDDEN_ROW_KEYS.has(header)) {
          throw new ConnectorError({
            code: 'SCHEMA_MISMATCH',
            message: `Unsafe Excel header name: ${header}`,
            connectorId: this.config.id,
            suggestion: 'Rename the column to a safe field name and try again.',
          });
        }
      }
    } else {
      for (let i = 0; i < sheet.columnCount - startColumn + 1; i++) {
        headers[i] = columnLetters(i + startColumn);
      }
    }

    const rows: Row[] = [];
    const dataStartRow = hasHeaders ? startRow + 1 : startRow;

    sheet.eachRow({ includeEmpty: false }, (sheetRow, rowNumber) => {
      if (rowNumber < dataStartRow) return;

      const row: Row = Object.create(null);
      for (const header of headers) {
        if (header) row[header] = null;
      }
      let hasData = false;

      sheetRow.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        if (colNumber < startColumn) return;
        const header = headers[colNumber - startColumn];
        if (!header) return;

        const value = cellValue(cell);
        if (value !== null && value !== '') {
          hasData = true;
        }
        row[header] = value === '' ? null : value;
      });

      if (hasData) {
        rows.push(row);
      }
    });

    this._columns = Array.from(new Set(headers.filter((header) => header.length > 0)));
    return rows;
  }
}

/**
 * Factory function to create an Excel dataset
 */
export function createExcelDataset(config: Omit<ExcelDatasetConfig, 'type'>): ExcelDataset {
  return new ExcelDataset(config);
}
