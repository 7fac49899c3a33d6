import { ConnectorError, isSqlRelation, wrapError } from '@driftcheck/core';
import type {
  AggregateQuery,
  AggregateRow,
  AntiJoinOptions,
  AntiJoinResult,
  ConnectionState,
  DatasetConfig,
  FilterCondition,
  FilterOptions,
  IDataset,
  ISqlRelation,
  ReadResult,
  RelationRef,
  SchemaSnapshot,
} from '@driftcheck/core';
import type { RuntimeConfig } from './config.js';
import type { Logger } from './logger.js';
import { withRetries } from './retry.js';
import { Semaphore } from './semaphore.js';
import { withTimeout } from './timeout.js';

export type InstrumentDatasetOptions = {
  runtime?: RuntimeConfig;
  defaults?: RuntimeConfig;
};

type DatasetOperation =
  | 'connect'
  | 'disconnect'
  | 'describe'
  | 'readRows'
  | 'countRows'
  | 'aggregate'
  | 'testConnection'
  | 'antiJoin'
  | 'unionAntiJoin';

const NETWORK_ERROR_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN']);

export function isRetryableError(err: unknown): boolean {
  if (err instanceof ConnectorError) {
    return err.code === 'TIMEOUT' || err.code === 'CONNECTION_FAILED';
  }
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string' &&
    NETWORK_ERROR_CODES.has(err.code)
  );
}

function summarizeRead(options: FilterOptions | undefined): Record<string, unknown> {
  return {
    whereCount: options?.where?.length ?? 0,
    selectCount: options?.select?.length ?? 0,
    limit: options?.limit,
    offset: options?.offset,
  };
}

/**
 * Wraps a dataset so every call runs under a per-dataset concurrency limit,
 * a timeout and (for read operations) retries with backoff.
 */
export class InstrumentedDataset<TDataset extends IDataset = IDataset> implements IDataset {
  protected readonly inner: TDataset;
  private readonly logger: Logger;
  private readonly semaphore: Semaphore;
  private readonly timeoutMs: number;
  private readonly runtime: RuntimeConfig;

  constructor(inner: TDataset, logger: Logger, options: InstrumentDatasetOptions = {}) {
    this.inner = inner;
    this.runtime = { ...options.defaults, ...options.runtime };
    this.logger = logger.child({ dataset: inner.config.id });
    this.semaphore = new Semaphore(this.runtime.maxConcurrency ?? 4);
    this.timeoutMs = this.runtime.timeoutMs ?? 300_000;
  }

  get config(): DatasetConfig {
    return this.inner.config;
  }

  get state(): ConnectionState {
    return this.inner.state;
  }

  connect(): Promise<void> {
    return this.call('connect', () => this.inner.connect());
  }

  disconnect(): Promise<void> {
    return this.call('disconnect', () => this.inner.disconnect(), {}, false);
  }

  describe(forceRefresh?: boolean): Promise<SchemaSnapshot> {
    return this.call('describe', () => this.inner.describe(forceRefresh), { forceRefresh });
  }

  readRows(options?: FilterOptions): Promise<ReadResult> {
    return this.call('readRows', () => this.inner.readRows(options), summarizeRead(options));
  }

  countRows(where?: FilterCondition[]): Promise<number> {
    return this.call('countRows', () => this.inner.countRows(where), { whereCount: where?.length ?? 0 });
  }

  aggregate(query: AggregateQuery): Promise<AggregateRow[]> {
    return this.call('aggregate', () => this.inner.aggregate(query), {
      measures: query.measures.length,
      groupBy: query.groupBy?.length ?? 0,
    });
  }

  testConnection(): Promise<boolean> {
    return this.call('testConnection', () => this.inner.testConnection());
  }

  protected async call<T>(
    operation: DatasetOperation,
    fn: () => Promise<T>,
    summary: Record<string, unknown> = {},
    retryable = true
  ): Promise<T> {
    const queuedAt = Date.now();
    return this.semaphore.run(async () => {
      const waitMs = Date.now() - queuedAt;
      const start = Date.now();
      try {
        const result = await withRetries(
          () =>
            withTimeout(
              fn(),
              this.timeoutMs,
              () =>
                new ConnectorError({
                  code: 'TIMEOUT',
                  message: `Dataset call '${operation}' timed out after ${this.timeoutMs}ms`,
                  connectorId: this.inner.config.id,
                  suggestion: 'Increase runtime.timeoutMs for this dataset or in runtime.datasetDefaults.',
                  context: { operation, timeoutMs: this.timeoutMs },
                })
            ),
          retryable ? this.runtime.retries : undefined,
          {
            isRetryable: isRetryableError,
            onRetry: (err, next) =>
              this.logger.warn('Retrying dataset call', {
                operation,
                attempt: next.attempt,
                attempts: next.attempts,
                error: err,
              }),
          }
        );
        this.logger.debug('Dataset call succeeded', {
          operation,
          durationMs: Date.now() - start,
          waitMs: waitMs > 0 ? waitMs : undefined,
          ...summary,
        });
        return result;
      } catch (err) {
        this.logger.warn('Dataset call failed', {
          operation,
          durationMs: Date.now() - start,
          ...summary,
          error: err,
        });
        throw wrapError(err, this.inner.config.id);
      }
    });
  }
}

/**
 * Instrumented SQL relation; anti-join pushdown stays available
 */
export class InstrumentedSqlDataset
  extends InstrumentedDataset<IDataset & ISqlRelation>
  implements ISqlRelation
{
  get pushdownGroup(): string {
    return this.inner.pushdownGroup;
  }

  relation(): RelationRef {
    return this.inner.relation();
  }

  antiJoin(
    source: RelationRef,
    target: RelationRef,
    sourceKeys: string[],
    targetKeys: string[],
    options: AntiJoinOptions
  ): Promise<AntiJoinResult> {
    return this.call('antiJoin', () => this.inner.antiJoin(source, target, sourceKeys, targetKeys, options), {
      source: source.table,
      target: target.table,
    });
  }

  unionAntiJoin(
    sources: { relation: RelationRef; keys: string[] }[],
    target: RelationRef,
    targetKeys: string[],
    options: AntiJoinOptions
  ): Promise<AntiJoinResult> {
    return this.call('unionAntiJoin', () => this.inner.unionAntiJoin(sources, target, targetKeys, options), {
      branches: sources.length,
      target: target.table,
    });
  }
}

export function instrumentDataset(
  dataset: IDataset,
  logger: Logger,
  options?: InstrumentDatasetOptions
): InstrumentedDataset {
  return isSqlRelation(dataset)
    ? new InstrumentedSqlDataset(dataset, logger, options)
    : new InstrumentedDataset(dataset, logger, options);
}
