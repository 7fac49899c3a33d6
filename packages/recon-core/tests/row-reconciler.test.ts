import { describe, expect, it, vi } from 'vitest';
import type { AntiJoinResult, ISqlRelation, RelationRef, Row } from '@driftcheck/core';
import { compareVersions, reconcile, reconcileUnion } from '../src/rows/row-reconciler.js';
import { MemoryDataset, idRows } from './memory-dataset.js';

class FakeSqlDataset extends MemoryDataset implements ISqlRelation {
  readonly pushdownGroup: string;
  readonly antiJoin = vi.fn(
    async (): Promise<AntiJoinResult> => ({ missingCount: 7, totalCount: 10, sample: [{ id: 4 }] })
  );
  readonly unionAntiJoin = vi.fn(
    async (): Promise<AntiJoinResult> => ({ missingCount: 2, totalCount: 12, sample: [{ id: 8 }, { id: 9 }] })
  );

  constructor(name: string, group: string, rows: Row[]) {
    super(name, rows);
    this.pushdownGroup = group;
  }

  relation(): RelationRef {
    return { table: this.config.name };
  }
}

describe('reconcile', () => {
  it('finds nothing missing between identical datasets', async () => {
    const a = new MemoryDataset('a', idRows([1, 2, 3]));
    const b = new MemoryDataset('b', idRows([1, 2, 3]));

    const forward = await reconcile(a, b, ['id']);
    const backward = await reconcile(b, a, ['id']);

    expect(forward.missingCount).toBe(0);
    expect(backward.missingCount).toBe(0);
    expect(forward.method).toBe('scan');
    expect(forward.sourceRowCount).toBe(3);
  });

  it('samples the row removed from the target', async () => {
    const a = new MemoryDataset('a', idRows([1, 2, 3]));
    const b = new MemoryDataset('b', idRows([1, 2]));

    const result = await reconcile(a, b, ['id']);

    expect(result.missingCount).toBe(1);
    expect(result.sampleMissingRows).toEqual([{ id: 3, label: 'row-3' }]);
  });

  it('never matches a NULL key', async () => {
    const source = new MemoryDataset('src', idRows([1, null]));
    const target = new MemoryDataset('tgt', idRows([1, null]));

    const result = await reconcile(source, target, ['id']);

    expect(result.missingCount).toBe(1);
    expect(result.sampleMissingRows).toEqual([{ id: null, label: 'none' }]);
  });

  it('keeps the five smallest missing rows across pages', async () => {
    const source = new MemoryDataset('src', idRows([10, 9, 8, 7, 6, 5, 4, 3, 2, 1]));
    const target = new MemoryDataset('tgt', []);

    const result = await reconcile(source, target, ['id'], { batchSize: 3 });

    expect(result.missingCount).toBe(10);
    expect(result.sampleMissingRows.map((row) => row.id)).toEqual([1, 2, 3, 4, 5]);
    expect(source.readCalls).toBe(4);
  });

  it('resolves key names per dataset and keeps 1 and "1" apart', async () => {
    const source = new MemoryDataset('src', [{ ID: 1 }, { ID: 2 }]);
    const target = new MemoryDataset('tgt', [{ id: 1 }, { id: '2' }]);

    const result = await reconcile(source, target, ['id']);

    expect(result.keys).toEqual(['ID']);
    expect(result.missingCount).toBe(1);
    expect(result.sampleMissingRows).toEqual([{ ID: 2 }]);
  });

  it('fails with KEY_COLUMN_NOT_FOUND for an unknown key', async () => {
    const a = new MemoryDataset('a', idRows([1]));
    const b = new MemoryDataset('b', idRows([1]));

    await expect(reconcile(a, b, ['code'])).rejects.toMatchObject({
      code: 'KEY_COLUMN_NOT_FOUND',
      dataset: 'a',
      column: 'code',
    });
  });

  it('fails with EMPTY_KEY_SET for no keys', async () => {
    const a = new MemoryDataset('a', idRows([1]));

    await expect(reconcile(a, a, [])).rejects.toMatchObject({ code: 'EMPTY_KEY_SET' });
  });

  it('reports a failing scan as QUERY_EXECUTION_FAILURE of the source', async () => {
    const source = new MemoryDataset('src', idRows([1]));
    const target = new MemoryDataset('tgt', idRows([1]), { failing: ['readRows'] });

    await expect(reconcile(source, target, ['id'])).rejects.toMatchObject({
      code: 'QUERY_EXECUTION_FAILURE',
      dataset: 'src',
      message: 'readRows failed',
    });
  });

  it('pushes the anti-join down when both relations share a connection', async () => {
    const source = new FakeSqlDataset('orders', 'postgresql:db', idRows([1]));
    const target = new FakeSqlDataset('orders_v2', 'postgresql:db', idRows([1]));

    const result = await reconcile(source, target, ['id']);

    expect(source.antiJoin).toHaveBeenCalledWith({ table: 'orders' }, { table: 'orders_v2' }, ['id'], ['id'], {
      sampleLimit: 5,
    });
    expect(result).toMatchObject({ method: 'pushdown', missingCount: 7, sourceRowCount: 10 });
    expect(result.sampleMissingRows).toEqual([{ id: 4 }]);
  });

  it('scans when the relations live on different connections', async () => {
    const source = new FakeSqlDataset('orders', 'postgresql:one', idRows([1, 2]));
    const target = new FakeSqlDataset('orders', 'mysql:two', idRows([1]));

    const result = await reconcile(source, target, ['id']);

    expect(source.antiJoin).not.toHaveBeenCalled();
    expect(result).toMatchObject({ method: 'scan', missingCount: 1 });
  });
});

describe('reconcileUnion', () => {
  it('finds full coverage of the union', async () => {
    const s1 = new MemoryDataset('s1', idRows([1, 2]));
    const s2 = new MemoryDataset('s2', idRows([2, 3]));
    const target = new MemoryDataset('tgt', idRows([1, 2, 3]));

    const result = await reconcileUnion([s1, s2], target, ['id']);

    expect(result.missingKeyCount).toBe(0);
    expect(result.unionKeyCount).toBe(3);
    expect(result.sourceNames).toEqual(['s1', 's2']);
  });

  it('counts distinct missing keys once', async () => {
    const s1 = new MemoryDataset('s1', idRows([1, 2, 3]));
    const s2 = new MemoryDataset('s2', idRows([2, 3]));
    const target = new MemoryDataset('tgt', idRows([1, 2]));

    const result = await reconcileUnion([s1, s2], target, ['id']);

    expect(result.missingKeyCount).toBe(1);
    expect(result.sampleMissingKeys).toEqual([{ id: 3 }]);
  });

  it('names sample keys after the target key columns', async () => {
    const s1 = new MemoryDataset('s1', [{ ID: 5 }]);
    const target = new MemoryDataset('tgt', [{ id: 1 }]);

    const result = await reconcileUnion([s1], target, ['id']);

    expect(result.sampleMissingKeys).toEqual([{ id: 5 }]);
  });

  it('runs as one query when every relation shares a connection', async () => {
    const s1 = new FakeSqlDataset('s1', 'postgresql:db', idRows([1]));
    const s2 = new FakeSqlDataset('s2', 'postgresql:db', idRows([2]));
    const target = new FakeSqlDataset('tgt', 'postgresql:db', idRows([1]));

    const result = await reconcileUnion([s1, s2], target, ['id']);

    expect(target.unionAntiJoin).toHaveBeenCalledWith(
      [
        { relation: { table: 's1' }, keys: ['id'] },
        { relation: { table: 's2' }, keys: ['id'] },
      ],
      { table: 'tgt' },
      ['id'],
      { sampleLimit: 5 }
    );
    expect(result).toMatchObject({ method: 'pushdown', missingKeyCount: 2, unionKeyCount: 12 });
  });

  it('rejects an empty source list', async () => {
    const target = new MemoryDataset('tgt', idRows([1]));

    await expect(reconcileUnion([], target, ['id'])).rejects.toMatchObject({ code: 'INVALID_OPTIONS' });
  });
});

describe('compareVersions', () => {
  it('compares record counts and coverage in both directions', async () => {
    const oldVersion = new MemoryDataset('old', idRows([1, 2, 3]));
    const newVersion = new MemoryDataset('new', idRows([1, 2]));

    const result = await compareVersions(oldVersion, newVersion, ['id']);

    expect(result).toMatchObject({
      oldRecordCount: 3,
      newRecordCount: 2,
      rowsInOldNotInNew: 1,
      rowsInNewNotInOld: 0,
      recordCountDifference: 1,
      percentageChange: 33.33,
    });
    expect(result.sampleOldNotInNew).toEqual([{ id: 3, label: 'row-3' }]);
  });

  it('has no percentage change when the old version is empty', async () => {
    const oldVersion = new MemoryDataset('old', [], { columns: [{ name: 'id', declaredType: 'integer' }] });
    const newVersion = new MemoryDataset('new', idRows([1]));

    const result = await compareVersions(oldVersion, newVersion, ['id']);

    expect(result.recordCountDifference).toBe(1);
    expect(result.percentageChange).toBeNull();
    expect(result.rowsInNewNotInOld).toBe(1);
  });
});
