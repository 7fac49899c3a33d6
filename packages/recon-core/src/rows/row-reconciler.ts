/**
 * Row Reconciliation Engine
 *
 * Directional coverage of source rows in a target, matched by key tuple.
 * Relations on the same SQL connection are compared with a NOT EXISTS
 * anti-join inside the database; anything else is scanned in batches.
 */

import { groupTuple, isSqlRelation, keyTuple, pickColumns } from '@driftcheck/core';
import type { IDataset, OrderBy, Row, SchemaSnapshot } from '@driftcheck/core';
import { ReconError, toReconError } from '../errors/index.js';
import { BatchProcessor } from '../scan/batch-processor.js';
import { describeWithFallback, resolveColumns } from '../schema/schema-introspector.js';
import type { EngineLogger, RowDiffResult, UnionCoverageResult, VersionComparison } from '../types/index.js';
import { SampleCollector } from './samples.js';

export const DEFAULT_SAMPLE_LIMIT = 5;

export interface RowComparisonOptions {
  /** Default: 5 */
  sampleLimit?: number;
  /** Rows per page when scanning (default: 1000) */
  batchSize?: number;
  logger?: EngineLogger;
  /** Snapshots already captured by the caller, keyed by dataset id */
  schemas?: Map<string, SchemaSnapshot>;
}

async function schemaOf(
  dataset: IDataset,
  keys: string[],
  options: RowComparisonOptions
): Promise<SchemaSnapshot> {
  const known = options.schemas?.get(dataset.config.id);
  if (known) {
    return known;
  }
  const { snapshot } = await describeWithFallback(dataset, keys);
  return snapshot;
}

function pushdownGroupOf(dataset: IDataset): string | null {
  return isSqlRelation(dataset) ? dataset.pushdownGroup : null;
}

function ascending(columns: string[]): OrderBy[] {
  return columns.map((field) => ({ field, direction: 'asc' }));
}

/**
 * Collect the non-NULL key tuples of a dataset
 */
async function collectKeyTuples(
  dataset: IDataset,
  keys: string[],
  processor: BatchProcessor
): Promise<Set<string>> {
  const tuples = new Set<string>();
  for await (const batch of processor.streamBatches(dataset, { select: keys, orderBy: ascending(keys) })) {
    for (const row of batch) {
      const tuple = keyTuple(row, keys);
      if (tuple !== null) tuples.add(tuple);
    }
  }
  return tuples;
}

/**
 * Count source rows with no key match in the target.
 * A source row with a NULL in any key column is always missing.
 *
 * @throws ReconError KEY_COLUMN_NOT_FOUND, EMPTY_KEY_SET, QUERY_EXECUTION_FAILURE
 */
export async function reconcile(
  source: IDataset,
  target: IDataset,
  keys: string[],
  options: RowComparisonOptions = {}
): Promise<RowDiffResult> {
  const sampleLimit = options.sampleLimit ?? DEFAULT_SAMPLE_LIMIT;
  const scope = { dataset: source.config.name, keys };

  const [sourceSchema, targetSchema] = await Promise.all([
    schemaOf(source, keys, options),
    schemaOf(target, keys, options),
  ]);
  const sourceKeys = resolveColumns(sourceSchema, keys);
  const targetKeys = resolveColumns(targetSchema, keys);

  const base = {
    sourceName: source.config.name,
    targetName: target.config.name,
    keys: sourceKeys,
  };

  try {
    if (isSqlRelation(source) && isSqlRelation(target) && source.pushdownGroup === target.pushdownGroup) {
      const result = await source.antiJoin(
        source.relation(),
        target.relation(),
        sourceKeys,
        targetKeys,
        { sampleLimit }
      );
      return {
        ...base,
        missingCount: result.missingCount,
        ...(result.totalCount !== undefined ? { sourceRowCount: result.totalCount } : {}),
        sampleMissingRows: result.sample,
        method: 'pushdown',
      };
    }

    const processor = new BatchProcessor(options.batchSize, undefined, options.logger);
    const targetTuples = await collectKeyTuples(target, targetKeys, processor);

    const samples = new SampleCollector(sourceKeys, sampleLimit);
    let missingCount = 0;
    let sourceRowCount = 0;
    for await (const batch of processor.streamBatches(source, { orderBy: ascending(sourceKeys) })) {
      for (const row of batch) {
        sourceRowCount++;
        const tuple = keyTuple(row, sourceKeys);
        if (tuple === null || !targetTuples.has(tuple)) {
          missingCount++;
          samples.offer(row);
        }
      }
    }

    return { ...base, missingCount, sourceRowCount, sampleMissingRows: samples.samples, method: 'scan' };
  } catch (error) {
    throw toReconError(error, 'QUERY_EXECUTION_FAILURE', scope);
  }
}

/**
 * Count distinct key tuples of the union of all sources that the target lacks.
 * Sample keys are named after the target's key columns.
 *
 * @throws ReconError INVALID_OPTIONS, KEY_COLUMN_NOT_FOUND, EMPTY_KEY_SET, QUERY_EXECUTION_FAILURE
 */
export async function reconcileUnion(
  sources: IDataset[],
  target: IDataset,
  keys: string[],
  options: RowComparisonOptions = {}
): Promise<UnionCoverageResult> {
  if (sources.length === 0) {
    throw new ReconError({
      code: 'INVALID_OPTIONS',
      message: 'Union coverage needs at least one source',
      dataset: target.config.name,
    });
  }

  const sampleLimit = options.sampleLimit ?? DEFAULT_SAMPLE_LIMIT;
  const sourceNames = sources.map((source) => source.config.name);

  const [targetKeys, sides] = await Promise.all([
    schemaOf(target, keys, options).then((schema) => resolveColumns(schema, keys)),
    Promise.all(
      sources.map(async (source) => ({
        source,
        keys: resolveColumns(await schemaOf(source, keys, options), keys),
      }))
    ),
  ]);

  const base = { sourceNames, targetName: target.config.name, keys: targetKeys };

  try {
    const group = pushdownGroupOf(target);
    if (isSqlRelation(target) && sides.every(({ source }) => pushdownGroupOf(source) === group)) {
      const branches = sides.flatMap(({ source, keys: columns }) =>
        isSqlRelation(source) ? [{ relation: source.relation(), keys: columns }] : []
      );
      const result = await target.unionAntiJoin(
        branches,
        target.relation(),
        targetKeys,
        { sampleLimit }
      );
      return {
        ...base,
        ...(result.totalCount !== undefined ? { unionKeyCount: result.totalCount } : {}),
        missingKeyCount: result.missingCount,
        sampleMissingKeys: result.sample,
        method: 'pushdown',
      };
    }

    const processor = new BatchProcessor(options.batchSize, undefined, options.logger);
    const targetTuples = await collectKeyTuples(target, targetKeys, processor);

    // NULL keys form distinct tuples of their own and are always missing
    const union = new Map<string, { tuple: string | null; key: Row }>();
    for (const { source, keys: columns } of sides) {
      for await (const batch of processor.streamBatches(source, { select: columns, orderBy: ascending(columns) })) {
        for (const row of batch) {
          const key = pickColumns(row, columns, targetKeys);
          const distinct = groupTuple(key, targetKeys);
          if (!union.has(distinct)) {
            union.set(distinct, { tuple: keyTuple(key, targetKeys), key });
          }
        }
      }
    }

    const samples = new SampleCollector(targetKeys, sampleLimit);
    let missingKeyCount = 0;
    for (const { tuple, key } of union.values()) {
      if (tuple === null || !targetTuples.has(tuple)) {
        missingKeyCount++;
        samples.offer(key);
      }
    }

    return {
      ...base,
      unionKeyCount: union.size,
      missingKeyCount,
      sampleMissingKeys: samples.samples,
      method: 'scan',
    };
  } catch (error) {
    throw toReconError(error, 'QUERY_EXECUTION_FAILURE', { dataset: target.config.name, keys });
  }
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Compare an old and a new version of a dataset in both directions
 *
 * @throws ReconError KEY_COLUMN_NOT_FOUND, EMPTY_KEY_SET, QUERY_EXECUTION_FAILURE
 */
export async function compareVersions(
  oldDataset: IDataset,
  newDataset: IDataset,
  keys: string[],
  options: RowComparisonOptions = {}
): Promise<VersionComparison> {
  const schemas = new Map(options.schemas);
  const [oldSchema, newSchema] = await Promise.all([
    schemaOf(oldDataset, keys, options),
    schemaOf(newDataset, keys, options),
  ]);
  schemas.set(oldDataset.config.id, oldSchema);
  schemas.set(newDataset.config.id, newSchema);
  const scoped = { ...options, schemas };

  const countOf = async (dataset: IDataset): Promise<number> => {
    try {
      return await dataset.countRows();
    } catch (error) {
      throw toReconError(error, 'QUERY_EXECUTION_FAILURE', { dataset: dataset.config.name });
    }
  };

  const [oldRecordCount, newRecordCount, oldNotInNew, newNotInOld] = await Promise.all([
    countOf(oldDataset),
    countOf(newDataset),
    reconcile(oldDataset, newDataset, keys, scoped),
    reconcile(newDataset, oldDataset, keys, scoped),
  ]);

  const recordCountDifference = Math.abs(newRecordCount - oldRecordCount);

  return {
    oldName: oldDataset.config.name,
    newName: newDataset.config.name,
    keys: oldNotInNew.keys,
    oldRecordCount,
    newRecordCount,
    rowsInOldNotInNew: oldNotInNew.missingCount,
    rowsInNewNotInOld: newNotInOld.missingCount,
    recordCountDifference,
    percentageChange: oldRecordCount === 0 ? null : roundTo((recordCountDifference * 100) / oldRecordCount, 2),
    sampleOldNotInNew: oldNotInNew.sampleMissingRows,
    sampleNewNotInOld: newNotInOld.sampleMissingRows,
  };
}
