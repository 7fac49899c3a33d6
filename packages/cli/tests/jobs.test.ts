import { describe, expect, it, vi } from 'vitest';
import type { IDataset } from '@driftcheck/core';
import type { IReconciliationEngine, ReconciliationReport } from '@driftcheck/recon-core';
import { runJob, toProfileWindow } from '../src/jobs.js';
import { StubDataset } from './stub-dataset.js';

const report: ReconciliationReport = {
  id: 'r',
  generatedAt: new Date('2024-05-01T00:00:00.000Z'),
  processingTimeMs: 0,
  status: 'OK',
  reasons: [],
  sources: [],
  schemas: [],
  requiredColumns: [],
  rowDiffs: [],
  schemaDrift: [],
  profiles: [],
  profileShifts: [],
  aggregates: [],
  duplicates: [],
  failures: [],
};

function mockEngine() {
  return {
    run: vi.fn(async () => report),
    compareVersions: vi.fn(async () => report),
    profile: vi.fn(async () => report),
    aggregate: vi.fn(async () => report),
    findDuplicates: vi.fn(async () => report),
    compareValues: vi.fn(async () => report),
  } satisfies IReconciliationEngine;
}

const datasets = new Map<string, IDataset>(
  ['orders', 'legacy', 'webshop'].map((id): [string, IDataset] => [id, new StubDataset(id)])
);
const lookup = {
  getOrThrow(id: string): IDataset {
    const dataset = datasets.get(id);
    if (!dataset) throw new Error(`no dataset ${id}`);
    return dataset;
  },
};

describe('toProfileWindow', () => {
  it('keeps explicit bounds', () => {
    expect(toProfileWindow({ column: 'created_at', from: '2024-05-01' })).toEqual({
      column: 'created_at',
      from: '2024-05-01',
      to: undefined,
    });
  });

  it('treats a window without bounds as relative', () => {
    expect(toProfileWindow({ column: 'created_at' })).toEqual({
      column: 'created_at',
      lookbackDays: undefined,
      forwardDays: undefined,
    });
  });

  it('passes lookback and forward days', () => {
    expect(toProfileWindow({ column: 'created_at', lookbackDays: 7, forwardDays: 1 })).toEqual({
      column: 'created_at',
      lookbackDays: 7,
      forwardDays: 1,
    });
  });
});

describe('runJob', () => {
  it('runs reconcile jobs with their options', async () => {
    const engine = mockEngine();

    await runJob(engine, lookup, {
      name: 'nightly',
      type: 'reconcile',
      target: 'orders',
      sources: ['legacy', 'webshop'],
      scope: 'union',
      keys: ['order_id'],
      checkDuplicates: true,
      profile: { window: { column: 'created_at', lookbackDays: 30 } },
    });

    expect(engine.run).toHaveBeenCalledWith({
      title: 'nightly',
      target: datasets.get('orders'),
      sources: [datasets.get('legacy'), datasets.get('webshop')],
      scope: 'union',
      requiredColumns: undefined,
      fallbackColumns: undefined,
      profile: { columns: undefined, window: { column: 'created_at', lookbackDays: 30, forwardDays: undefined } },
      checkDuplicates: true,
      keys: ['order_id'],
      keyFallback: undefined,
    });
  });

  it('runs schema drift jobs as schema-scoped reconciliations', async () => {
    const engine = mockEngine();

    await runJob(engine, lookup, {
      name: 'drift',
      title: 'Schema drift',
      type: 'schema_drift',
      target: 'orders',
      sources: ['legacy'],
      requiredColumns: ['total'],
    });

    expect(engine.run).toHaveBeenCalledWith({
      title: 'Schema drift',
      target: datasets.get('orders'),
      sources: [datasets.get('legacy')],
      scope: 'schema',
      requiredColumns: ['total'],
      keys: undefined,
      keyFallback: undefined,
    });
  });

  it('maps old and new datasets of version comparisons', async () => {
    const engine = mockEngine();

    await runJob(engine, lookup, { name: 'versions', type: 'compare_versions', old: 'legacy', new: 'orders' });

    expect(engine.compareVersions).toHaveBeenCalledWith({
      title: 'versions',
      oldDataset: datasets.get('legacy'),
      newDataset: datasets.get('orders'),
      keys: undefined,
      keyFallback: undefined,
    });
  });

  it('passes aggregate filters through', async () => {
    const engine = mockEngine();

    await runJob(engine, lookup, {
      name: 'revenue',
      type: 'aggregate',
      datasets: ['orders'],
      groupColumn: 'region',
      measureColumn: 'total',
      stats: ['sum'],
      where: [{ field: 'status', op: 'neq', value: 'cancelled' }],
    });

    expect(engine.aggregate).toHaveBeenCalledWith({
      title: 'revenue',
      datasets: [datasets.get('orders')],
      groupColumn: 'region',
      measureColumn: 'total',
      stats: ['sum'],
      where: [{ field: 'status', op: 'neq', value: 'cancelled' }],
    });
  });

  it('fails for datasets the lookup does not know', async () => {
    await expect(
      runJob(mockEngine(), lookup, { name: 'dups', type: 'duplicates', datasets: ['missing'] })
    ).rejects.toThrow('no dataset missing');
  });
});
