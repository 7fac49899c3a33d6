/**
 * JSON Dataset
 * Reads JSON files holding an array of objects, optionally nested
 */

import type { Row } from '@driftcheck/core';
import { ConnectorError, errorMessage } from '@driftcheck/core';
import { BaseFileDataset, type FileDatasetConfig } from './base-file-dataset.js';

export interface JsonDatasetConfig extends FileDatasetConfig {
  type: 'json';
  /** Dot path to the rows array (e.g., 'data.items') */
  recordsPath?: string;
}

const FORBIDDEN_PATH_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor']);

function parseSafePath(path: string, datasetId: string): string[] {
  const parts = path.split('.');
  if (parts.some((p) => p.length === 0)) {
    throw new ConnectorError({
      code: 'CONFIGURATION_ERROR',
      message: `Invalid recordsPath: "${path}"`,
      connectorId: datasetId,
      suggestion: 'Use dot notation with non-empty segments (e.g., "data.items").',
    });
  }

  for (const part of parts) {
    if (FORBIDDEN_PATH_SEGMENTS.has(part)) {
      throw new ConnectorError({
        code: 'CONFIGURATION_ERROR',
        message: `Unsafe recordsPath segment: "${part}"`,
        connectorId: datasetId,
        suggestion: 'Avoid __proto__/prototype/constructor in recordsPath to prevent prototype pollution.',
      });
    }
  }

  return parts;
}

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get nested value from object using dot notation path
 */
function getNestedValue(obj: unknown, path: string, datasetId: string): unknown {
  let current = obj;
  for (const part of parseSafePath(path, datasetId)) {
    if (!isPlainObject(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

export class JsonDataset extends BaseFileDataset<JsonDatasetConfig> {
  constructor(config: Omit<JsonDatasetConfig, 'type'> & { type?: 'json' }) {
    super({ ...config, type: 'json' });
  }

  protected async parseContent(content: string): Promise<Row[]> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid JSON: ${errorMessage(error)}`,
        connectorId: this.config.id,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const records = this.config.recordsPath
      ? getNestedValue(parsed, this.config.recordsPath, this.config.id)
      : parsed;

    if (!Array.isArray(records)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: this.config.recordsPath
          ? `Path '${this.config.recordsPath}' does not contain an array`
          : 'JSON file does not contain an array at root level',
        connectorId: this.config.id,
        suggestion: 'Provide an array of objects at the root, or point recordsPath at one.',
      });
    }

    return records.map((record, index) => {
      if (!isPlainObject(record)) {
        throw new ConnectorError({
          code: 'SCHEMA_MISMATCH',
          message: `Element ${index} is not an object`,
          connectorId: this.config.id,
          suggestion: 'Every element of the rows array must be a JSON object.',
        });
      }
      const row: Row = Object.create(null);
      for (const [key, value] of Object.entries(record)) {
        if (!FORBIDDEN_PATH_SEGMENTS.has(key)) {
          row[key] = value;
        }
      }
      return row;
    });
  }
}

/**
 * Factory function to create a JSON dataset
 */
export function createJsonDataset(config: Omit<JsonDatasetConfig, 'type'>): JsonDataset {
  return new JsonDataset(config);
}
