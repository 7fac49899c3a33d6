/**
 * Schema Introspector
 *
 * Captures a dataset's column list through its describe() capability.
 */

import { fallbackSnapshot, findColumn } from '@driftcheck/core';
import type { IDataset, SchemaSnapshot } from '@driftcheck/core';
import { ReconError, toReconError } from '../errors/index.js';
import type { ReconFailure } from '../errors/index.js';

export interface IntrospectionResult {
  snapshot: SchemaSnapshot;
  /** Present when the catalog could not be read and a fallback was used */
  failure?: ReconFailure;
}

/**
 * Describe a dataset.
 * @throws ReconError METADATA_UNAVAILABLE when the catalog cannot be queried
 */
export async function describe(dataset: IDataset): Promise<SchemaSnapshot> {
  try {
    return await dataset.describe();
  } catch (error) {
    throw toReconError(error, 'METADATA_UNAVAILABLE', { dataset: dataset.config.name });
  }
}

/**
 * Describe a dataset, falling back to a minimal column list
 * (at least the key columns) when the catalog is unavailable
 */
export async function describeWithFallback(
  dataset: IDataset,
  fallbackColumns: string[]
): Promise<IntrospectionResult> {
  try {
    return { snapshot: await describe(dataset) };
  } catch (error) {
    const reconError =
      error instanceof ReconError
        ? error
        : toReconError(error, 'METADATA_UNAVAILABLE', { dataset: dataset.config.name });
    return {
      snapshot: fallbackSnapshot(dataset.config.name, [...new Set(fallbackColumns)]),
      failure: {
        ...reconError.toFailure('introspection'),
        code: 'METADATA_UNAVAILABLE',
      },
    };
  }
}

/**
 * Map requested key names onto a snapshot's own spelling.
 * @throws ReconError KEY_COLUMN_NOT_FOUND, EMPTY_KEY_SET
 */
export function resolveColumns(snapshot: SchemaSnapshot, columns: string[]): string[] {
  if (columns.length === 0) {
    throw new ReconError({
      code: 'EMPTY_KEY_SET',
      message: 'No key columns were given',
      dataset: snapshot.dataset,
      suggestion: 'Pass at least one key column or let the engine infer keys',
    });
  }

  return columns.map((name) => {
    const column = findColumn(snapshot, name);
    if (!column) {
      throw new ReconError({
        code: 'KEY_COLUMN_NOT_FOUND',
        message: `Key column "${name}" not found in ${snapshot.dataset}`,
        dataset: snapshot.dataset,
        column: name,
        keys: columns,
        suggestion: `Available columns: ${snapshot.columns.map((c) => c.name).join(', ') || 'none'}`,
      });
    }
    return column.name;
  });
}
