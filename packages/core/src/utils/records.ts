/**
 * Utility functions for working with rows
 */

import type { Row } from '../types/index.js';

/**
 * Extract all unique column names from an array of rows, in first-seen order
 */
export function extractFieldNames(rows: Row[]): string[] {
  const fields = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      fields.add(key);
    }
  }
  return Array.from(fields);
}
