/**
 * Key Inference Engine
 *
 * Derives join keys from the columns all datasets share.
 */

import type { SchemaSnapshot } from '@driftcheck/core';
import { ReconError } from '../errors/index.js';
import type { KeyInferenceOptions, KeySet } from '../types/index.js';

/** Substrings marking a likely key column, matched case-insensitively */
export const KEY_PATTERNS = ['id', 'key', 'pk', 'primary_key'] as const;

/**
 * Columns present in every snapshot (case-insensitive), in the first
 * snapshot's ordinal order and spelling
 */
export function commonColumns(schemas: SchemaSnapshot[]): string[] {
  const [first, ...rest] = schemas;
  if (!first) {
    return [];
  }

  const others = rest.map((schema) => new Set(schema.columns.map((column) => column.name.toLowerCase())));
  const seen = new Set<string>();

  return [...first.columns]
    .sort((a, b) => a.ordinalPosition - b.ordinalPosition)
    .map((column) => column.name)
    .filter((name) => {
      const lower = name.toLowerCase();
      if (seen.has(lower)) return false;
      seen.add(lower);
      return others.every((names) => names.has(lower));
    });
}

export function looksLikeKey(column: string): boolean {
  const lower = column.toLowerCase();
  return KEY_PATTERNS.some((pattern) => lower.includes(pattern));
}

/**
 * Infer key columns shared by all schemas.
 * @throws ReconError NO_COMMON_KEY when the schemas share no column
 */
export function inferKeys(schemas: SchemaSnapshot[], options: KeyInferenceOptions = {}): KeySet {
  const common = commonColumns(schemas);
  const [firstCommon, ...restCommon] = common;

  if (firstCommon === undefined) {
    throw new ReconError({
      code: 'NO_COMMON_KEY',
      message: `No common columns across ${schemas.map((schema) => schema.dataset).join(', ') || 'no datasets'}`,
      suggestion: 'Pass explicit key columns',
    });
  }

  const [firstMatch, ...restMatches] = common.filter(looksLikeKey);
  if (firstMatch !== undefined) {
    return { columns: [firstMatch, ...restMatches], origin: 'inferred', strategy: 'pattern' };
  }

  if (options.fallback === 'all_common') {
    return { columns: [firstCommon, ...restCommon], origin: 'inferred', strategy: 'all_common' };
  }

  return { columns: [firstCommon], origin: 'inferred', strategy: 'first_common' };
}

/**
 * Wrap caller-supplied keys.
 * @throws ReconError EMPTY_KEY_SET
 */
export function explicitKeys(columns: string[]): KeySet {
  const [first, ...rest] = columns;
  if (first === undefined) {
    throw new ReconError({
      code: 'EMPTY_KEY_SET',
      message: 'The explicit key set is empty',
      suggestion: 'Pass at least one key column or omit keys to infer them',
    });
  }
  return { columns: [first, ...rest], origin: 'explicit' };
}
