import { describe, expect, it } from 'vitest';
import type { SchemaSnapshot } from '@driftcheck/core';
import { checkColumnCoverage, diffSchemas } from '../src/schema/schema-drift.js';

type ColumnTuple = [name: string, declaredType: string, nullable?: boolean, maxLength?: number];

function snapshot(
  dataset: string,
  columns: ColumnTuple[],
  source: Pick<SchemaSnapshot, 'origin' | 'dialect'> = { origin: 'catalog' }
): SchemaSnapshot {
  return {
    dataset,
    columns: columns.map(([name, declaredType, nullable = true, maxLength], index) => ({
      name,
      declaredType,
      nullable,
      ordinalPosition: index + 1,
      ...(maxLength !== undefined ? { maxLength } : {}),
    })),
    capturedAt: new Date('2024-01-01T00:00:00Z'),
    ...source,
  };
}

describe('diffSchemas', () => {
  it('classifies added and removed columns', () => {
    const diff = diffSchemas(
      snapshot('before', [['col1', 'int'], ['col2', 'varchar']]),
      snapshot('after', [['col1', 'int'], ['col3', 'varchar']])
    );

    expect(diff.added.map((column) => column.name)).toEqual(['col3']);
    expect(diff.removed.map((column) => column.name)).toEqual(['col2']);
    expect(diff.changed).toEqual([]);
  });

  it('records a nullability change', () => {
    const diff = diffSchemas(snapshot('before', [['col1', 'int', true]]), snapshot('after', [['col1', 'int', false]]));

    expect(diff.changed).toHaveLength(1);
    expect(diff.changed[0]?.name).toBe('col1');
    expect(diff.changed[0]?.deltas).toEqual([{ field: 'nullable', before: true, after: false }]);
  });

  it('records every differing field', () => {
    const diff = diffSchemas(
      snapshot('before', [['code', 'varchar', true, 50]]),
      snapshot('after', [['code', 'text', false, 100]])
    );

    expect(diff.changed[0]?.deltas).toEqual([
      { field: 'declaredType', before: 'varchar', after: 'text' },
      { field: 'maxLength', before: 50, after: 100 },
      { field: 'nullable', before: true, after: false },
    ]);
  });

  it('matches names and types case-insensitively', () => {
    const diff = diffSchemas(snapshot('before', [['Amount', 'INTEGER']]), snapshot('after', [['amount', 'integer']]));

    expect(diff).toEqual({ added: [], removed: [], changed: [] });
  });

  it('compares an inferred file schema with a catalog by type family', () => {
    const file = snapshot(
      'orders.csv',
      [
        ['order_id', 'integer', false],
        ['customer_id', 'string', false],
        ['total', 'number', true],
      ],
      { origin: 'inferred' }
    );
    const table = snapshot(
      'orders',
      [
        ['order_id', 'bigint', false],
        ['customer_id', 'character varying', true, 20],
        ['total', 'text', true],
      ],
      { origin: 'catalog', dialect: 'postgresql' }
    );

    expect(diffSchemas(file, table).changed).toEqual([
      {
        name: 'total',
        before: file.columns[2],
        after: table.columns[2],
        deltas: [{ field: 'declaredType', before: 'number', after: 'text' }],
      },
    ]);
  });

  it('compares catalogs of different dialects by type family and known lengths', () => {
    const mysql = snapshot('legacy', [['id', 'int', false], ['region', 'varchar(40)', true, 40]], {
      origin: 'catalog',
      dialect: 'mysql',
    });
    const postgres = snapshot('current', [['id', 'integer', true], ['region', 'character varying', true, 20]], {
      origin: 'catalog',
      dialect: 'postgresql',
    });

    expect(diffSchemas(mysql, postgres).changed.map((change) => [change.name, change.deltas])).toEqual([
      ['id', [{ field: 'nullable', before: false, after: true }]],
      ['region', [{ field: 'maxLength', before: 40, after: 20 }]],
    ]);
  });

  it('reports a rename as one removal plus one addition', () => {
    const diff = diffSchemas(snapshot('before', [['cust_name', 'text']]), snapshot('after', [['customer_name', 'text']]));

    expect(diff.removed.map((column) => column.name)).toEqual(['cust_name']);
    expect(diff.added.map((column) => column.name)).toEqual(['customer_name']);
  });
});

describe('checkColumnCoverage', () => {
  const first = snapshot('crm', [
    ['id', 'integer'],
    ['name', 'varchar', true, 50],
    ['region', 'varchar'],
    ['source_key', 'varchar'],
  ]);
  const second = snapshot('erp', [
    ['id', 'bigint'],
    ['name', 'varchar', true, 50],
    ['legacy_flag', 'boolean'],
  ]);
  const target = snapshot('customers', [
    ['id', 'integer'],
    ['name', 'varchar', true, 50],
  ]);

  it('lists common and missing columns per source', () => {
    const coverage = checkColumnCoverage([first, second], target, ['id', 'source_key']);

    expect(coverage.sources).toEqual([
      { dataset: 'crm', columnCount: 4, commonColumns: ['id', 'name'], missingColumns: ['region', 'source_key'] },
      { dataset: 'erp', columnCount: 3, commonColumns: ['id', 'name'], missingColumns: ['legacy_flag'] },
    ]);
  });

  it('keeps the first-seen descriptor and flags conflicts', () => {
    const coverage = checkColumnCoverage([first, second], target);

    expect(coverage.mergedColumns.map((column) => `${column.name}:${column.declaredType}`)).toEqual([
      'id:integer',
      'name:varchar',
      'region:varchar',
      'source_key:varchar',
      'legacy_flag:boolean',
    ]);
    expect(coverage.conflicts).toEqual([
      {
        name: 'id',
        keptFrom: 'crm',
        conflictingDataset: 'erp',
        deltas: [{ field: 'declaredType', before: 'integer', after: 'bigint' }],
      },
    ]);
  });

  it('excludes key columns from the columns missing in the target', () => {
    const coverage = checkColumnCoverage([first, second], target, ['id', 'SOURCE_KEY']);

    expect(coverage.missingFromTarget).toEqual(['region', 'legacy_flag']);
  });
});
