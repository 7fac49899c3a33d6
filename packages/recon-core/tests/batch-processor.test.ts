import { describe, expect, it, vi } from 'vitest';
import { BatchProcessor } from '../src/scan/batch-processor.js';
import type { EngineLogger } from '../src/types/index.js';
import { MemoryDataset, idRows } from './memory-dataset.js';

function logger(): EngineLogger & { warn: ReturnType<typeof vi.fn> } {
  return { debug: vi.fn(), warn: vi.fn() };
}

describe('BatchProcessor', () => {
  it('streams pages until the dataset is exhausted', async () => {
    const dataset = new MemoryDataset('orders', idRows([1, 2, 3, 4, 5]));
    const processor = new BatchProcessor(2, undefined, logger());

    const pages: number[][] = [];
    for await (const batch of processor.streamBatches(dataset, { orderBy: [{ field: 'id', direction: 'asc' }] })) {
      pages.push(batch.map((row) => Number(row.id)));
    }

    expect(pages).toEqual([[1, 2], [3, 4], [5]]);
    expect(dataset.readCalls).toBe(3);
  });

  it('marks a load cut short by the row cap', async () => {
    const log = logger();
    const dataset = new MemoryDataset('orders', idRows([1, 2, 3, 4, 5]));
    const processor = new BatchProcessor(2, undefined, log);

    const loaded = await processor.loadRows(dataset, undefined, 3);

    expect(loaded.rows.map((row) => row.id)).toEqual([1, 2, 3]);
    expect(loaded.truncated).toBe(true);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it('loads a dataset that fits the cap exactly', async () => {
    const log = logger();
    const dataset = new MemoryDataset('orders', idRows([1, 2, 3, 4, 5]));
    const processor = new BatchProcessor(2, undefined, log);

    const loaded = await processor.loadRows(dataset, undefined, 5);

    expect(loaded.rows).toHaveLength(5);
    expect(loaded.truncated).toBe(false);
    expect(log.warn).not.toHaveBeenCalled();
  });

  it('rejects a batch size below one', () => {
    expect(() => new BatchProcessor(0)).toThrow(/positive integer/);
  });
});
