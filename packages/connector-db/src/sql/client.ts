/**
 * Base SQL client
 *
 * Holds what PostgreSQL and MySQL share: the column whitelist cache and
 * scan, count, aggregate and anti-join execution. Subclasses provide the
 * pool, the catalog query and the dialect.
 */

import { ConnectorError } from '@driftcheck/core';
import type {
  AggregateQuery,
  AggregateRow,
  AntiJoinOptions,
  AntiJoinResult,
  FilterCondition,
  FilterOptions,
  RelationRef,
  Row,
} from '@driftcheck/core';
import { categorizeType, groupTuple } from '@driftcheck/core';
import type { SqlDialect } from './dialect.js';
import {
  buildAggregate,
  buildAntiJoin,
  buildCount,
  buildMedian,
  buildSelect,
  buildUnionAntiJoin,
} from './builder.js';
import { validateColumns } from './identifiers.js';
import { normalizeAggregateValue, normalizeNumericColumns, readCount } from './results.js';

export interface SqlColumn {
  name: string;
  dataType: string;
  isNullable: boolean;
  maxLength: number | null;
  ordinalPosition: number;
}

export abstract class SqlClient {
  abstract readonly dialect: SqlDialect;
  /** Identifies the physical connection; equal keys allow join pushdown */
  abstract readonly connectionKey: string;
  protected abstract readonly defaultSchema: string | undefined;

  private columnCache = new Map<string, SqlColumn[]>();

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract get isConnected(): boolean;
  abstract query(sql: string, params?: unknown[]): Promise<Row[]>;
  abstract getColumns(table: string, schema?: string): Promise<SqlColumn[]>;

  ref(table: string, schema?: string): RelationRef {
    const resolved = schema ?? this.defaultSchema;
    return resolved ? { schema: resolved, table } : { table };
  }

  /**
   * Catalog columns of a table (cached)
   */
  async cachedColumns(ref: RelationRef): Promise<SqlColumn[]> {
    const cacheKey = `${ref.schema ?? ''}.${ref.table}`;
    const cached = this.columnCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const columns = await this.getColumns(ref.table, ref.schema);
    this.columnCache.set(cacheKey, columns);
    return columns;
  }

  /**
   * Get allowed columns for a table
   */
  async allowedColumns(ref: RelationRef): Promise<Set<string>> {
    return new Set((await this.cachedColumns(ref)).map((c) => c.name));
  }

  /**
   * Columns whose driver values arrive as numeric strings
   */
  async numericColumns(ref: RelationRef): Promise<Set<string>> {
    const columns = await this.cachedColumns(ref);
    return new Set(columns.filter((c) => categorizeType(c.dataType) === 'numeric').map((c) => c.name));
  }

  /**
   * Clear the column cache (call after schema changes)
   */
  clearColumnCache(): void {
    this.columnCache.clear();
  }

  async select(ref: RelationRef, options: FilterOptions = {}): Promise<Row[]> {
    const allowed = await this.allowedColumns(ref);
    if (options.select?.length) {
      validateColumns(options.select, allowed, 'SELECT');
    }
    if (options.where?.length) {
      validateColumns(options.where.map((w) => w.field), allowed, 'WHERE');
    }
    if (options.orderBy?.length) {
      validateColumns(options.orderBy.map((o) => o.field), allowed, 'ORDER BY');
    }

    const { sql, params } = buildSelect(this.dialect, ref, options);
    return normalizeNumericColumns(await this.query(sql, params), await this.numericColumns(ref));
  }

  async count(ref: RelationRef, where?: FilterCondition[]): Promise<number> {
    if (where?.length) {
      validateColumns(where.map((w) => w.field), await this.allowedColumns(ref), 'WHERE');
    }

    const { sql, params } = buildCount(this.dialect, ref, where);
    const rows = await this.query(sql, params);
    return readCount(rows[0]?.row_count);
  }

  async aggregate(ref: RelationRef, query: AggregateQuery): Promise<AggregateRow[]> {
    const allowed = await this.allowedColumns(ref);
    const groupBy = query.groupBy ?? [];
    validateColumns(groupBy, allowed, 'GROUP BY');
    validateColumns(
      query.measures.flatMap((m) => (m.column ? [m.column] : [])),
      allowed,
      'aggregate'
    );
    if (query.where?.length) {
      validateColumns(query.where.map((w) => w.field), allowed, 'WHERE');
    }

    const { sql, params } = buildAggregate(this.dialect, ref, query);
    const numeric = await this.numericColumns(ref);
    const rows = normalizeNumericColumns(await this.query(sql, params), numeric);
    const result = rows.map((row) => this.toAggregateRow(row, query));

    // measures without an inline expression (MySQL median) run separately
    const deferred = query.measures.filter(
      (m) => m.column !== undefined && this.dialect.aggregate(m.fn, m.column) === null
    );
    if (deferred.length === 0) {
      return result;
    }

    const byGroup = new Map(result.map((row) => [groupTuple(row.group, groupBy), row]));
    for (const measure of deferred) {
      const statement = buildMedian(this.dialect, ref, measure.column ?? '', measure.alias, groupBy, query.where);
      for (const medianRow of normalizeNumericColumns(await this.query(statement.sql, statement.params), numeric)) {
        const target = byGroup.get(groupTuple(medianRow, groupBy));
        if (target) {
          target.values[measure.alias] = normalizeAggregateValue(measure.fn, medianRow[measure.alias]);
        }
      }
    }
    return result;
  }

  async antiJoin(
    source: RelationRef,
    target: RelationRef,
    sourceKeys: string[],
    targetKeys: string[],
    options: AntiJoinOptions
  ): Promise<AntiJoinResult> {
    validateColumns(sourceKeys, await this.allowedColumns(source), 'source key');
    validateColumns(targetKeys, await this.allowedColumns(target), 'target key');

    const statements = buildAntiJoin(this.dialect, source, target, sourceKeys, targetKeys, options.sampleLimit);
    const [countRows, sample] = await Promise.all([
      this.query(statements.count.sql, statements.count.params),
      options.sampleLimit > 0 ? this.query(statements.sample.sql, statements.sample.params) : Promise.resolve([]),
    ]);

    return {
      missingCount: readCount(countRows[0]?.missing_count),
      sample: normalizeNumericColumns(sample, await this.numericColumns(source)),
    };
  }

  async unionAntiJoin(
    sources: { relation: RelationRef; keys: string[] }[],
    target: RelationRef,
    targetKeys: string[],
    options: AntiJoinOptions
  ): Promise<AntiJoinResult> {
    if (sources.length === 0) {
      throw new ConnectorError({
        code: 'VALIDATION_ERROR',
        message: 'Union coverage needs at least one source',
      });
    }
    for (const source of sources) {
      validateColumns(source.keys, await this.allowedColumns(source.relation), 'source key');
    }
    validateColumns(targetKeys, await this.allowedColumns(target), 'target key');

    const statements = buildUnionAntiJoin(this.dialect, sources, target, targetKeys, options.sampleLimit);
    const [countRows, sample] = await Promise.all([
      this.query(statements.count.sql, statements.count.params),
      options.sampleLimit > 0 ? this.query(statements.sample.sql, statements.sample.params) : Promise.resolve([]),
    ]);

    return {
      missingCount: readCount(countRows[0]?.missing_count),
      totalCount: readCount(countRows[0]?.total_count),
      sample: normalizeNumericColumns(sample, await this.numericColumns(target)),
    };
  }

  private toAggregateRow(row: Row, query: AggregateQuery): AggregateRow {
    const group: Row = {};
    for (const column of query.groupBy ?? []) {
      group[column] = row[column] ?? null;
    }
    const values: AggregateRow['values'] = {};
    for (const measure of query.measures) {
      values[measure.alias] = normalizeAggregateValue(measure.fn, row[measure.alias]);
    }
    return { group, values };
  }
}
