import { describe, expect, it } from 'vitest';
import { ConnectorError, isSqlRelation } from '@driftcheck/core';
import type { ReadResult } from '@driftcheck/core';
import { InstrumentedSqlDataset, instrumentDataset, isRetryableError } from '../src/instrument-dataset.js';
import { Logger } from '../src/logger.js';
import { StubDataset, StubSqlDataset } from './stub-dataset.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function jsonLogger(): { logger: Logger; entries: () => Array<Record<string, unknown>> } {
  const lines: string[] = [];
  const logger = new Logger({ format: 'json', level: 'debug', write: (line) => lines.push(line) });
  const entries = (): Array<Record<string, unknown>> =>
    lines.map((line): unknown => JSON.parse(line)).filter(isRecord);
  return { logger, entries };
}

const timeout = (message: string): ConnectorError => new ConnectorError({ code: 'TIMEOUT', message });

describe('isRetryableError', () => {
  it('retries timeouts, lost connections and network resets', () => {
    expect(isRetryableError(timeout('slow'))).toBe(true);
    expect(isRetryableError(new ConnectorError({ code: 'CONNECTION_FAILED', message: 'down' }))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
  });

  it('does not retry other failures', () => {
    expect(isRetryableError(new ConnectorError({ code: 'NOT_FOUND', message: 'no table' }))).toBe(false);
    expect(isRetryableError(new ConnectorError({ code: 'AUTHENTICATION_FAILED', message: 'bad password' }))).toBe(false);
    expect(isRetryableError(new Error('syntax error'))).toBe(false);
    expect(isRetryableError('oops')).toBe(false);
  });
});

describe('instrumentDataset', () => {
  it('retries a timed out call and logs the retry', async () => {
    const inner = new StubDataset('orders');
    inner.countRows.mockRejectedValueOnce(timeout('statement timeout'));
    const { logger, entries } = jsonLogger();

    const dataset = instrumentDataset(inner, logger, { runtime: { retries: { attempts: 2, baseDelayMs: 0 } } });

    await expect(dataset.countRows()).resolves.toBe(1);
    expect(inner.countRows).toHaveBeenCalledTimes(2);
    expect(entries().find((entry) => entry.msg === 'Retrying dataset call')).toMatchObject({
      level: 'warn',
      dataset: 'orders',
      operation: 'countRows',
      attempt: 2,
      attempts: 2,
    });
  });

  it('does not retry non-retryable failures', async () => {
    const inner = new StubDataset('orders');
    inner.readRows.mockRejectedValue(new ConnectorError({ code: 'NOT_FOUND', message: 'no such table' }));
    const { logger } = jsonLogger();

    const dataset = instrumentDataset(inner, logger, { runtime: { retries: { attempts: 3, baseDelayMs: 0 } } });

    await expect(dataset.readRows({ limit: 10 })).rejects.toThrow('no such table');
    expect(inner.readRows).toHaveBeenCalledTimes(1);
  });

  it('fails calls that exceed the timeout', async () => {
    const inner = new StubDataset('orders');
    inner.readRows.mockReturnValue(new Promise<ReadResult>(() => undefined));
    const { logger } = jsonLogger();

    const dataset = instrumentDataset(inner, logger, { runtime: { timeoutMs: 20 } });

    const error = await dataset.readRows().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConnectorError);
    expect(error).toMatchObject({ code: 'TIMEOUT', message: "Dataset call 'readRows' timed out after 20ms" });
  });

  it('never retries disconnect', async () => {
    const inner = new StubDataset('orders');
    inner.disconnect.mockRejectedValue(timeout('close timed out'));
    const { logger } = jsonLogger();

    const dataset = instrumentDataset(inner, logger, { runtime: { retries: { attempts: 3, baseDelayMs: 0 } } });

    await expect(dataset.disconnect()).rejects.toThrow('close timed out');
    expect(inner.disconnect).toHaveBeenCalledTimes(1);
  });

  it('lets per-dataset runtime settings override defaults', async () => {
    const inner = new StubDataset('orders');
    inner.countRows.mockRejectedValueOnce(timeout('slow')).mockRejectedValueOnce(timeout('slow'));
    const { logger } = jsonLogger();

    const dataset = instrumentDataset(inner, logger, {
      defaults: { retries: { attempts: 2, baseDelayMs: 0 } },
      runtime: { retries: { attempts: 3, baseDelayMs: 0 } },
    });

    await expect(dataset.countRows()).resolves.toBe(1);
    expect(inner.countRows).toHaveBeenCalledTimes(3);
  });

  it('passes describe refreshes through', async () => {
    const inner = new StubDataset('orders');
    const { logger } = jsonLogger();

    await instrumentDataset(inner, logger).describe(true);

    expect(inner.describe).toHaveBeenCalledWith(true);
  });

  it('keeps pushdown available for SQL datasets', async () => {
    const inner = new StubSqlDataset('orders');
    const { logger } = jsonLogger();

    const dataset = instrumentDataset(inner, logger);

    expect(dataset).toBeInstanceOf(InstrumentedSqlDataset);
    expect(isSqlRelation(dataset)).toBe(true);
    if (!isSqlRelation(dataset)) return;

    expect(dataset.pushdownGroup).toBe('postgresql:warehouse');
    expect(dataset.relation()).toEqual({ schema: 'sales', table: 'orders' });

    const result = await dataset.antiJoin({ table: 'legacy' }, { table: 'orders' }, ['id'], ['order_id'], {
      sampleLimit: 5,
    });
    expect(result).toEqual({ missingCount: 3, totalCount: 10, sample: [{ id: 7 }] });
    expect(inner.antiJoin).toHaveBeenCalledWith({ table: 'legacy' }, { table: 'orders' }, ['id'], ['order_id'], {
      sampleLimit: 5,
    });
  });

  it('hides pushdown for file datasets', () => {
    const { logger } = jsonLogger();

    expect(isSqlRelation(instrumentDataset(new StubDataset('orders.csv'), logger))).toBe(false);
  });
});
