/**
 * BatchProcessor
 *
 * Pages through a dataset's rows for in-memory comparisons.
 */

import type { FilterOptions, IDataset, Row } from '@driftcheck/core';
import { ReconError } from '../errors/index.js';
import { consoleLogger } from '../types/index.js';
import type { EngineLogger } from '../types/index.js';

/** Default maximum rows loaded into memory at once */
const DEFAULT_MAX_ROWS = 100_000;

/** Absolute maximum rows (safety limit) */
const ABSOLUTE_MAX_ROWS = 1_000_000;

export interface LoadedRows {
  rows: Row[];
  /** The cap stopped loading before the end of the dataset */
  truncated: boolean;
}

export class BatchProcessor {
  private readonly batchSize: number;
  private readonly defaultMaxRows: number;
  private readonly logger: EngineLogger;

  constructor(
    batchSize: number = 1000,
    defaultMaxRows: number = DEFAULT_MAX_ROWS,
    logger: EngineLogger = consoleLogger
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ReconError({
        code: 'INVALID_OPTIONS',
        message: `batchSize must be a positive integer (got ${batchSize})`,
      });
    }
    this.batchSize = batchSize;
    this.defaultMaxRows = Math.min(defaultMaxRows, ABSOLUTE_MAX_ROWS);
    this.logger = logger;
  }

  /**
   * Load rows with a memory cap.
   * Full-table anti-joins use streamBatches() instead and hold only key tuples.
   *
   * @param maxRows - Default: 100,000, max: 1,000,000
   */
  async loadRows(dataset: IDataset, filter?: FilterOptions, maxRows?: number): Promise<LoadedRows> {
    const limit = Math.min(maxRows ?? this.defaultMaxRows, ABSOLUTE_MAX_ROWS);

    const rows: Row[] = [];
    // one extra row tells whether the cap cut the dataset short
    for await (const batch of this.streamBatches(dataset, filter, limit + 1)) {
      for (const row of batch) {
        rows.push(row);
      }
    }

    if (rows.length > limit) {
      this.logger.warn(`Loaded ${limit} rows of ${dataset.config.name} (limit reached). More rows exist.`, {
        dataset: dataset.config.id,
        limit,
      });
      return { rows: rows.slice(0, limit), truncated: true };
    }

    return { rows, truncated: false };
  }

  /**
   * Stream rows in batches using offset pagination.
   * Callers pass an orderBy so pages stay stable across queries.
   */
  async *streamBatches(
    dataset: IDataset,
    filter?: FilterOptions,
    maxRows?: number
  ): AsyncGenerator<Row[]> {
    let offset = 0;
    let hasMore = true;
    let total = 0;

    while (hasMore) {
      const remaining = maxRows !== undefined ? maxRows - total : undefined;
      const batchLimit = remaining !== undefined ? Math.min(this.batchSize, remaining) : this.batchSize;

      if (batchLimit <= 0) {
        break;
      }

      const result = await dataset.readRows({
        ...filter,
        offset,
        limit: batchLimit,
      });

      if (result.rows.length > 0) {
        yield result.rows;
        total += result.rows.length;
      }

      hasMore = result.hasMore ?? result.rows.length === batchLimit;
      offset += result.rows.length;

      // Safety check to prevent infinite loops
      if (result.rows.length === 0) {
        break;
      }
    }

    this.logger.debug(`Scanned ${total} rows of ${dataset.config.name}`, { dataset: dataset.config.id });
  }
}
