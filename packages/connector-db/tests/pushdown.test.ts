import { describe, expect, it, vi, beforeEach } from 'vitest';
import { isSqlRelation } from '@driftcheck/core';
import type { Row } from '@driftcheck/core';

const pgQueries: { sql: string; params?: unknown[] }[] = [];
const pgResults: Row[][] = [];
const pgFailures: { code: string; message: string }[] = [];
const pgConnectFailures: { code: string; message: string }[] = [];
const mysqlQueries: { sql: string; params?: unknown[] }[] = [];
const mysqlResults: Row[][] = [];

vi.mock('pg', () => {
  class MockClient {
    release = vi.fn();
  }
  class MockPool {
    connect = vi.fn(async () => {
      const failure = pgConnectFailures.shift();
      if (failure) {
        throw Object.assign(new Error(failure.message), { code: failure.code });
      }
      return new MockClient();
    });
    query = vi.fn(async (sql: string, params?: unknown[]) => {
      if (sql.includes('information_schema.columns')) {
        return {
          rows: [
            { name: 'id', data_type: 'integer', is_nullable: false, max_length: null, ordinal_position: 1 },
            { name: 'amount', data_type: 'numeric', is_nullable: true, max_length: null, ordinal_position: 2 },
            { name: 'region', data_type: 'character varying', is_nullable: true, max_length: 40, ordinal_position: 3 },
          ],
        };
      }
      const failure = pgFailures.shift();
      if (failure) {
        throw Object.assign(new Error(failure.message), { code: failure.code });
      }
      pgQueries.push({ sql, params });
      return { rows: pgResults.shift() ?? [] };
    });
    end = vi.fn(async () => {});
  }
  return { default: { Pool: MockPool }, Pool: MockPool };
});

vi.mock('mysql2/promise', () => {
  class MockPool {
    execute = vi.fn(async (options: string | { sql: string }, params?: unknown[]) => {
      const sql = typeof options === 'string' ? options : options.sql;
      if (sql.includes('INFORMATION_SCHEMA.COLUMNS')) {
        return [[
          { name: 'id', data_type: 'int', is_nullable: 'NO', max_length: null, ordinal_position: 1 },
          { name: 'region', data_type: 'varchar(40)', is_nullable: 'YES', max_length: 40, ordinal_position: 2 },
          { name: 'amount', data_type: 'decimal(10,2)', is_nullable: 'YES', max_length: null, ordinal_position: 3 },
        ], []];
      }
      mysqlQueries.push({ sql, params });
      return [mysqlResults.shift() ?? [], []];
    });
    getConnection = vi.fn(async () => ({ release: vi.fn() }));
    end = vi.fn(async () => {});
  }
  return { default: { createPool: () => new MockPool() } };
});

// Imports after mocks
import { PostgresClient, PostgresDataset } from '../src/postgresql/index.js';
import { MySQLClient } from '../src/mysql/index.js';
import { normalizeNumericValue } from '../src/sql/results.js';

describe('PostgreSQL pushdown', () => {
  beforeEach(() => {
    pgQueries.length = 0;
    pgResults.length = 0;
    pgFailures.length = 0;
    pgConnectFailures.length = 0;
  });

  it('counts and samples missing rows with NOT EXISTS', async () => {
    const client = new PostgresClient({});
    pgResults.push([{ missing_count: '1' }], [{ id: 3, amount: '9.00', region: 'south' }]);

    const result = await client.antiJoin(client.ref('invoices'), client.ref('invoices_v2'), ['id'], ['id'], {
      sampleLimit: 5,
    });

    expect(result).toEqual({ missingCount: 1, sample: [{ id: 3, amount: 9, region: 'south' }] });
    const notExists = 'NOT EXISTS (SELECT 1 FROM "public"."invoices_v2" t WHERE s."id" = t."id")';
    expect(pgQueries.map((q) => q.sql)).toEqual([
      `SELECT COUNT(*) AS missing_count FROM "public"."invoices" s WHERE ${notExists}`,
      `SELECT s.* FROM "public"."invoices" s WHERE ${notExists} ORDER BY s."id" ASC NULLS LAST LIMIT 5`,
    ]);
  });

  it('counts distinct union keys missing from the target', async () => {
    const client = new PostgresClient({});
    pgResults.push([{ total_count: '3', missing_count: '1' }], [{ id: 3 }]);

    const result = await client.unionAntiJoin(
      [
        { relation: client.ref('legacy_a'), keys: ['id'] },
        { relation: client.ref('legacy_b'), keys: ['id'] },
      ],
      client.ref('invoices'),
      ['id'],
      { sampleLimit: 5 }
    );

    expect(result).toEqual({ missingCount: 1, totalCount: 3, sample: [{ id: 3 }] });
    expect(pgQueries[0]?.sql).toBe(
      'WITH source_keys AS (SELECT "id" AS "id" FROM "public"."legacy_a" UNION SELECT "id" AS "id" FROM "public"."legacy_b") ' +
        'SELECT (SELECT COUNT(*) FROM source_keys) AS total_count, ' +
        '(SELECT COUNT(*) FROM source_keys u WHERE NOT EXISTS (SELECT 1 FROM "public"."invoices" t WHERE u."id" = t."id")) AS missing_count'
    );
  });

  it('builds aggregates with PERCENTILE_CONT and normalizes numeric strings', async () => {
    const client = new PostgresClient({});
    pgResults.push([{ row_count: '3', median_amount: 12.5 }]);

    const result = await client.aggregate(client.ref('invoices'), {
      measures: [
        { fn: 'count', alias: 'row_count' },
        { fn: 'median', column: 'amount', alias: 'median_amount' },
      ],
      where: [{ field: 'amount', op: 'not_null' }],
    });

    expect(result).toEqual([{ group: {}, values: { row_count: 3, median_amount: 12.5 } }]);
    expect(pgQueries[0]?.sql).toBe(
      'SELECT COUNT(*) AS "row_count", PERCENTILE_CONT(0.5) WITHIN GROUP (ORDER BY "amount") AS "median_amount" ' +
        'FROM "public"."invoices" WHERE "amount" IS NOT NULL'
    );
  });

  it('reads bigint and numeric columns as numbers', async () => {
    const dataset = new PostgresDataset({ id: 'inv', name: 'invoices', table: 'invoices' }, new PostgresClient({}));
    await dataset.connect();
    pgResults.push([{ row_count: '2' }], [
      { id: '1001', amount: '9.50', region: '042' },
      { id: '1002', amount: null, region: 'north' },
    ]);

    const result = await dataset.readRows({ orderBy: [{ field: 'id', direction: 'asc' }] });

    expect(result.rows).toEqual([
      { id: 1001, amount: 9.5, region: '042' },
      { id: 1002, amount: null, region: 'north' },
    ]);
    expect(result.totalCount).toBe(2);
  });

  it('maps rejected credentials to AUTHENTICATION_FAILED', async () => {
    const dataset = new PostgresDataset({ id: 'inv', name: 'invoices', table: 'invoices' }, new PostgresClient({}));
    pgConnectFailures.push({ code: '28P01', message: 'password authentication failed for user "reader"' });

    await expect(dataset.connect()).rejects.toMatchObject({ code: 'AUTHENTICATION_FAILED', connectorId: 'inv' });
    expect(dataset.state).toBe('error');
  });

  it('maps statement timeouts to TIMEOUT', async () => {
    const client = new PostgresClient({ statementTimeoutMs: 10 });
    pgFailures.push({ code: '57014', message: 'canceling statement due to statement timeout' });

    await expect(client.count(client.ref('invoices'))).rejects.toMatchObject({ code: 'TIMEOUT' });
  });

  it('describes tables from the catalog and shares a pushdown group per connection', async () => {
    const client = new PostgresClient({ id: 'warehouse' });
    const legacy = new PostgresDataset({ id: 'legacy', name: 'legacy_invoices', table: 'legacy_invoices' }, client);
    const current = new PostgresDataset({ id: 'current', name: 'invoices', table: 'invoices' }, client);
    await legacy.connect();
    await current.connect();

    const snapshot = await legacy.describe();

    expect(snapshot.origin).toBe('catalog');
    expect(snapshot.dataset).toBe('legacy_invoices');
    expect(snapshot.columns[2]).toEqual({
      name: 'region',
      declaredType: 'character varying',
      nullable: true,
      ordinalPosition: 3,
      maxLength: 40,
    });
    expect(isSqlRelation(legacy)).toBe(true);
    expect(legacy.pushdownGroup).toBe('postgresql:warehouse');
    expect(current.pushdownGroup).toBe(legacy.pushdownGroup);
    expect(current.relation()).toEqual({ schema: 'public', table: 'invoices' });
  });

  it('rejects aggregate aliases that are not plain identifiers', async () => {
    const dataset = new PostgresDataset({ id: 'inv', name: 'invoices', table: 'invoices' }, new PostgresClient({}));
    await dataset.connect();

    await expect(
      dataset.aggregate({ measures: [{ fn: 'count', alias: 'n"; DROP TABLE x; --' }] })
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR' });
    expect(pgQueries).toHaveLength(0);
  });
});

describe('MySQL median fallback', () => {
  beforeEach(() => {
    mysqlQueries.length = 0;
    mysqlResults.length = 0;
  });

  it('computes medians with window functions and merges them by group', async () => {
    const client = new MySQLClient({});
    mysqlResults.push(
      [
        { region: 'north', n: 2, med: null },
        { region: 'south', n: 1, med: null },
      ],
      [
        { region: 'north', med: '15.0000' },
        { region: 'south', med: '5.0000' },
      ]
    );

    const result = await client.aggregate(client.ref('orders'), {
      measures: [
        { fn: 'count', alias: 'n' },
        { fn: 'median', column: 'amount', alias: 'med' },
      ],
      groupBy: ['region'],
    });

    expect(result).toEqual([
      { group: { region: 'north' }, values: { n: 2, med: 15 } },
      { group: { region: 'south' }, values: { n: 1, med: 5 } },
    ]);
    expect(mysqlQueries.map((q) => q.sql)).toEqual([
      'SELECT `region`, COUNT(*) AS `n`, NULL AS `med` FROM `orders` GROUP BY `region`',
      'SELECT `region`, AVG(ranked.`__median_value`) AS `med` FROM (SELECT `region`, `amount` AS `__median_value`, ' +
        'ROW_NUMBER() OVER (PARTITION BY `region` ORDER BY `amount`) AS `__median_rn`, ' +
        'COUNT(*) OVER (PARTITION BY `region`) AS `__median_cnt` FROM `orders` WHERE `amount` IS NOT NULL) ranked ' +
        'WHERE `__median_rn` IN (FLOOR((`__median_cnt` + 1) / 2), FLOOR((`__median_cnt` + 2) / 2)) GROUP BY `region`',
    ]);
  });
});

describe('normalizeNumericValue', () => {
  it('converts numeric strings and keeps integers beyond the safe range as text', () => {
    expect(normalizeNumericValue('1001')).toBe(1001);
    expect(normalizeNumericValue('-12.75')).toBe(-12.75);
    expect(normalizeNumericValue('9007199254740993')).toBe('9007199254740993');
    expect(normalizeNumericValue('n/a')).toBe('n/a');
    expect(normalizeNumericValue(null)).toBeNull();
  });
});
