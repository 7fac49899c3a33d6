/**
 * Column-by-column comparison of rows matched by key
 */

import { findColumn, isNullish, keyTuple, valuesEqual } from '@driftcheck/core';
import type { IDataset, OrderBy, Row, SchemaSnapshot } from '@driftcheck/core';
import { ReconError, toReconError } from '../errors/index.js';
import { BatchProcessor } from '../scan/batch-processor.js';
import { describeWithFallback, resolveColumns } from '../schema/schema-introspector.js';
import type { ColumnValueComparison, EngineLogger, ValueComparison } from '../types/index.js';

export interface ValueComparisonOptions {
  /** Non-key columns to compare (default: every common non-key column) */
  columns?: string[];
  /** Row cap per dataset (default: 100,000) */
  maxRows?: number;
  batchSize?: number;
  logger?: EngineLogger;
}

type ValueOutcome = 'same' | 'different' | 'nullToValue' | 'valueToNull';

export function classifyValues(before: unknown, after: unknown): ValueOutcome {
  const beforeNull = isNullish(before);
  const afterNull = isNullish(after);
  if (beforeNull && afterNull) return 'same';
  if (beforeNull) return 'nullToValue';
  if (afterNull) return 'valueToNull';
  return valuesEqual(before, after) ? 'same' : 'different';
}

function indexByKey(rows: Row[], keys: string[]): { index: Map<string, Row>; unkeyed: number } {
  const index = new Map<string, Row>();
  let unkeyed = 0;
  for (const row of rows) {
    const tuple = keyTuple(row, keys);
    if (tuple === null) {
      unkeyed++;
    } else if (!index.has(tuple)) {
      index.set(tuple, row);
    }
  }
  return { index, unkeyed };
}

function comparedColumns(
  oldSchema: SchemaSnapshot,
  newSchema: SchemaSnapshot,
  keys: string[],
  requested: string[] | undefined
): { oldName: string; newName: string }[] {
  const keyNames = new Set(keys.map((key) => key.toLowerCase()));

  if (requested && requested.length > 0) {
    return requested.map((name) => {
      const oldColumn = findColumn(oldSchema, name);
      const newColumn = findColumn(newSchema, name);
      if (!oldColumn || !newColumn) {
        throw new ReconError({
          code: 'INVALID_OPTIONS',
          message: `Column "${name}" is not present in both ${oldSchema.dataset} and ${newSchema.dataset}`,
          column: name,
        });
      }
      return { oldName: oldColumn.name, newName: newColumn.name };
    });
  }

  return oldSchema.columns.flatMap((column) => {
    if (keyNames.has(column.name.toLowerCase())) return [];
    const newColumn = findColumn(newSchema, column.name);
    return newColumn ? [{ oldName: column.name, newName: newColumn.name }] : [];
  });
}

/**
 * Compare the common non-key columns of two datasets row by row.
 * Rows are matched by key tuple; rows with a NULL key never match.
 *
 * @throws ReconError KEY_COLUMN_NOT_FOUND, EMPTY_KEY_SET, INVALID_OPTIONS, QUERY_EXECUTION_FAILURE
 */
export async function compareValues(
  oldDataset: IDataset,
  newDataset: IDataset,
  keys: string[],
  options: ValueComparisonOptions = {}
): Promise<ValueComparison> {
  const [oldIntrospection, newIntrospection] = await Promise.all([
    describeWithFallback(oldDataset, [...keys, ...(options.columns ?? [])]),
    describeWithFallback(newDataset, [...keys, ...(options.columns ?? [])]),
  ]);
  const oldKeys = resolveColumns(oldIntrospection.snapshot, keys);
  const newKeys = resolveColumns(newIntrospection.snapshot, keys);
  const columns = comparedColumns(oldIntrospection.snapshot, newIntrospection.snapshot, keys, options.columns);

  const processor = new BatchProcessor(options.batchSize, undefined, options.logger);
  const load = async (dataset: IDataset, datasetKeys: string[]) => {
    const orderBy: OrderBy[] = datasetKeys.map((field) => ({ field, direction: 'asc' }));
    try {
      return await processor.loadRows(dataset, { orderBy }, options.maxRows);
    } catch (error) {
      throw toReconError(error, 'QUERY_EXECUTION_FAILURE', { dataset: dataset.config.name, keys });
    }
  };

  const [oldLoaded, newLoaded] = await Promise.all([load(oldDataset, oldKeys), load(newDataset, newKeys)]);
  const oldSide = indexByKey(oldLoaded.rows, oldKeys);
  const newSide = indexByKey(newLoaded.rows, newKeys);

  const counts: ColumnValueComparison[] = columns.map(({ oldName }) => ({
    column: oldName,
    same: 0,
    different: 0,
    nullToValue: 0,
    valueToNull: 0,
  }));

  let matchedRows = 0;
  for (const [tuple, oldRow] of oldSide.index) {
    const newRow = newSide.index.get(tuple);
    if (!newRow) continue;
    matchedRows++;
    columns.forEach(({ oldName, newName }, position) => {
      const count = counts[position];
      if (count) count[classifyValues(oldRow[oldName], newRow[newName])]++;
    });
  }

  return {
    oldName: oldDataset.config.name,
    newName: newDataset.config.name,
    keys: oldKeys,
    matchedRows,
    onlyInOld: oldSide.unkeyed + oldSide.index.size - matchedRows,
    onlyInNew: newSide.unkeyed + newSide.index.size - matchedRows,
    columns: counts,
    truncated: oldLoaded.truncated || newLoaded.truncated,
  };
}
