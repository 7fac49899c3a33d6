/**
 * Duplicate key detection, used to check that (inferred) keys are unique
 */

import { compareByKeys, toNumber } from '@driftcheck/core';
import type { AggregateRow, IDataset, Row } from '@driftcheck/core';
import { toReconError } from '../errors/index.js';
import { describeWithFallback, resolveColumns } from '../schema/schema-introspector.js';
import type { DuplicateKeyExample, DuplicateKeyReport } from '../types/index.js';

export const DUPLICATE_EXAMPLE_LIMIT = 10;

const OCCURRENCES = 'occurrences';

/**
 * Key tuples occurring more than once. NULL key values group together.
 *
 * @throws ReconError KEY_COLUMN_NOT_FOUND, EMPTY_KEY_SET, QUERY_EXECUTION_FAILURE
 */
export async function findDuplicateKeys(dataset: IDataset, keys: string[]): Promise<DuplicateKeyReport> {
  const { snapshot } = await describeWithFallback(dataset, keys);
  const columns = resolveColumns(snapshot, keys);

  let rows: AggregateRow[];
  try {
    rows = await dataset.aggregate({
      measures: [{ fn: 'count', alias: OCCURRENCES }],
      groupBy: columns,
      having: [{ alias: OCCURRENCES, op: 'gt', value: 1 }],
    });
  } catch (error) {
    throw toReconError(error, 'QUERY_EXECUTION_FAILURE', { dataset: dataset.config.name, keys });
  }

  const duplicates: DuplicateKeyExample[] = rows.map((row) => {
    const key: Row = {};
    for (const column of columns) key[column] = row.group[column] ?? null;
    return { key, occurrences: toNumber(row.values[OCCURRENCES]) ?? 0 };
  });

  duplicates.sort((a, b) => b.occurrences - a.occurrences || compareByKeys(a.key, b.key, columns));

  return {
    dataset: dataset.config.name,
    keys: columns,
    duplicateKeyCount: duplicates.length,
    totalDuplicateRows: duplicates.reduce((sum, duplicate) => sum + duplicate.occurrences, 0),
    maxOccurrences: duplicates[0]?.occurrences ?? 0,
    examples: duplicates.slice(0, DUPLICATE_EXAMPLE_LIMIT),
  };
}
