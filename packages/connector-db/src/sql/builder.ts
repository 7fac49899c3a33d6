/**
 * SQL generation for scans, counts, aggregates and anti-joins.
 * Identifiers are validated and quoted; values always travel as parameters.
 */

import { ConnectorError } from '@driftcheck/core';
import type {
  AggregateQuery,
  FilterCondition,
  FilterOptions,
  RelationRef,
} from '@driftcheck/core';
import type { SqlDialect } from './dialect.js';
import { validateIdentifier } from './identifiers.js';

export interface SqlStatement {
  sql: string;
  params: unknown[];
}

const COMPARISON_OPERATORS: { [op: string]: string } = {
  eq: '=',
  neq: '<>',
  gt: '>',
  lt: '<',
  gte: '>=',
  lte: '<=',
};

export function relationSql(dialect: SqlDialect, ref: RelationRef): string {
  validateIdentifier(ref.table, 'table');
  if (ref.schema) {
    validateIdentifier(ref.schema, 'schema');
    return `${dialect.quote(ref.schema)}.${dialect.quote(ref.table)}`;
  }
  return dialect.quote(ref.table);
}

function columnSql(dialect: SqlDialect, column: string, alias?: string): string {
  validateIdentifier(column, 'column');
  return alias ? `${alias}.${dialect.quote(column)}` : dialect.quote(column);
}

function positiveInteger(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConnectorError({
      code: 'VALIDATION_ERROR',
      message: `${name} must be a non-negative integer, got ${value}`,
    });
  }
  return value;
}

/**
 * Render AND-ed conditions, appending their values to params
 */
export function whereSql(dialect: SqlDialect, conditions: FilterCondition[], params: unknown[]): string {
  const clauses = conditions.map((condition) => {
    const column = columnSql(dialect, condition.field);
    switch (condition.op) {
      case 'is_null':
        return `${column} IS NULL`;
      case 'not_null':
        return `${column} IS NOT NULL`;
      case 'in': {
        const values = Array.isArray(condition.value) ? condition.value : [condition.value];
        if (values.length === 0) {
          return '1 = 0';
        }
        const placeholders = values.map((value) => {
          params.push(value);
          return dialect.placeholder(params.length);
        });
        return `${column} IN (${placeholders.join(', ')})`;
      }
      case 'contains':
        params.push(`%${String(condition.value)}%`);
        return `${column} ${dialect.containsOperator} ${dialect.placeholder(params.length)}`;
      default: {
        const operator = COMPARISON_OPERATORS[condition.op] ?? '=';
        params.push(condition.value);
        return `${column} ${operator} ${dialect.placeholder(params.length)}`;
      }
    }
  });
  return clauses.join(' AND ');
}

export function buildSelect(dialect: SqlDialect, ref: RelationRef, options: FilterOptions = {}): SqlStatement {
  const params: unknown[] = [];
  const columns = options.select?.length
    ? options.select.map((column) => columnSql(dialect, column)).join(', ')
    : '*';

  let sql = `SELECT ${columns} FROM ${relationSql(dialect, ref)}`;

  if (options.where?.length) {
    sql += ` WHERE ${whereSql(dialect, options.where, params)}`;
  }

  if (options.orderBy?.length) {
    const orderClauses = options.orderBy.map(
      (o) => `${columnSql(dialect, o.field)} ${o.direction === 'desc' ? 'DESC' : 'ASC'}`
    );
    sql += ` ORDER BY ${orderClauses.join(', ')}`;
  }

  if (options.limit !== undefined) {
    sql += ` LIMIT ${positiveInteger(options.limit, 'limit')}`;
  }

  if (options.offset !== undefined) {
    sql += ` OFFSET ${positiveInteger(options.offset, 'offset')}`;
  }

  return { sql, params };
}

export function buildCount(dialect: SqlDialect, ref: RelationRef, where?: FilterCondition[]): SqlStatement {
  const params: unknown[] = [];
  let sql = `SELECT COUNT(*) AS row_count FROM ${relationSql(dialect, ref)}`;
  if (where?.length) {
    sql += ` WHERE ${whereSql(dialect, where, params)}`;
  }
  return { sql, params };
}

/**
 * Aggregate query. Measures the dialect cannot express inline are
 * selected as NULL; the caller fills them in with buildMedian.
 */
export function buildAggregate(dialect: SqlDialect, ref: RelationRef, query: AggregateQuery): SqlStatement {
  const params: unknown[] = [];
  const groupBy = query.groupBy ?? [];
  const expressions = new Map<string, string | null>();

  const selectList = groupBy.map((column) => columnSql(dialect, column));
  for (const measure of query.measures) {
    validateIdentifier(measure.alias, 'alias');
    const column = measure.column ? columnSql(dialect, measure.column) : '*';
    const expression = dialect.aggregate(measure.fn, column);
    expressions.set(measure.alias, expression);
    selectList.push(`${expression ?? 'NULL'} AS ${dialect.quote(measure.alias)}`);
  }

  let sql = `SELECT ${selectList.join(', ')} FROM ${relationSql(dialect, ref)}`;

  if (query.where?.length) {
    sql += ` WHERE ${whereSql(dialect, query.where, params)}`;
  }

  if (groupBy.length > 0) {
    sql += ` GROUP BY ${groupBy.map((column) => columnSql(dialect, column)).join(', ')}`;
  }

  if (query.having?.length) {
    const clauses = query.having.map((condition) => {
      const expression = expressions.get(condition.alias);
      if (!expression) {
        throw new ConnectorError({
          code: 'UNSUPPORTED_OPERATION',
          message: `HAVING on "${condition.alias}" is not supported by ${dialect.name}`,
        });
      }
      params.push(condition.value);
      return `${expression} ${COMPARISON_OPERATORS[condition.op] ?? '='} ${dialect.placeholder(params.length)}`;
    });
    sql += ` HAVING ${clauses.join(' AND ')}`;
  }

  return { sql, params };
}

/**
 * Median through window functions, for dialects without PERCENTILE_CONT.
 * Averages the one or two middle values of each group.
 */
export function buildMedian(
  dialect: SqlDialect,
  ref: RelationRef,
  column: string,
  alias: string,
  groupBy: string[],
  where: FilterCondition[] = []
): SqlStatement {
  validateIdentifier(alias, 'alias');
  const params: unknown[] = [];
  const value = columnSql(dialect, column);
  const groups = groupBy.map((group) => columnSql(dialect, group));
  const partition = groups.length > 0 ? `PARTITION BY ${groups.join(', ')} ` : '';

  const conditions = [`${value} IS NOT NULL`];
  if (where.length > 0) {
    conditions.push(whereSql(dialect, where, params));
  }

  const inner = [
    ...groups,
    `${value} AS ${dialect.quote('__median_value')}`,
    `ROW_NUMBER() OVER (${partition}ORDER BY ${value}) AS ${dialect.quote('__median_rn')}`,
    `COUNT(*) OVER (${partition.trim()}) AS ${dialect.quote('__median_cnt')}`,
  ].join(', ');

  const rn = dialect.quote('__median_rn');
  const cnt = dialect.quote('__median_cnt');
  let sql =
    `SELECT ${[...groups, `AVG(ranked.${dialect.quote('__median_value')}) AS ${dialect.quote(alias)}`].join(', ')} ` +
    `FROM (SELECT ${inner} FROM ${relationSql(dialect, ref)} WHERE ${conditions.join(' AND ')}) ranked ` +
    `WHERE ${rn} IN (FLOOR((${cnt} + 1) / 2), FLOOR((${cnt} + 2) / 2))`;

  if (groups.length > 0) {
    sql += ` GROUP BY ${groups.join(', ')}`;
  }

  return { sql, params };
}

function keyMatch(dialect: SqlDialect, left: string, leftKeys: string[], right: string, rightKeys: string[]): string {
  return leftKeys
    .map((key, index) => {
      const rightKey = rightKeys[index];
      if (rightKey === undefined) {
        throw new ConnectorError({
          code: 'VALIDATION_ERROR',
          message: 'Source and target key lists must have the same length',
        });
      }
      return `${columnSql(dialect, key, left)} = ${columnSql(dialect, rightKey, right)}`;
    })
    .join(' AND ');
}

export interface AntiJoinStatements {
  count: SqlStatement;
  sample: SqlStatement;
}

/**
 * Source rows with no key match in target. A NULL key never satisfies
 * the equality, so such rows always count as missing.
 */
export function buildAntiJoin(
  dialect: SqlDialect,
  source: RelationRef,
  target: RelationRef,
  sourceKeys: string[],
  targetKeys: string[],
  sampleLimit: number
): AntiJoinStatements {
  const notExists =
    `NOT EXISTS (SELECT 1 FROM ${relationSql(dialect, target)} t ` +
    `WHERE ${keyMatch(dialect, 's', sourceKeys, 't', targetKeys)})`;
  const from = `FROM ${relationSql(dialect, source)} s WHERE ${notExists}`;
  const orderBy = sourceKeys.map((key) => dialect.ascNullsLast(columnSql(dialect, key, 's'))).join(', ');

  return {
    count: { sql: `SELECT COUNT(*) AS missing_count ${from}`, params: [] },
    sample: {
      sql: `SELECT s.* ${from} ORDER BY ${orderBy} LIMIT ${positiveInteger(sampleLimit, 'sampleLimit')}`,
      params: [],
    },
  };
}

/**
 * Distinct key tuples across all sources that are absent from target.
 * Key columns of every source are aliased to the target key names.
 */
export function buildUnionAntiJoin(
  dialect: SqlDialect,
  sources: { relation: RelationRef; keys: string[] }[],
  target: RelationRef,
  targetKeys: string[],
  sampleLimit: number
): AntiJoinStatements {
  const branches = sources.map(({ relation, keys }) => {
    if (keys.length !== targetKeys.length) {
      throw new ConnectorError({
        code: 'VALIDATION_ERROR',
        message: 'Every source must provide one key column per target key',
      });
    }
    const columns = keys.map(
      (key, index) => `${columnSql(dialect, key)} AS ${columnSql(dialect, targetKeys[index] ?? key)}`
    );
    return `SELECT ${columns.join(', ')} FROM ${relationSql(dialect, relation)}`;
  });

  const cte = `WITH source_keys AS (${branches.join(' UNION ')})`;
  const notExists =
    `NOT EXISTS (SELECT 1 FROM ${relationSql(dialect, target)} t ` +
    `WHERE ${keyMatch(dialect, 'u', targetKeys, 't', targetKeys)})`;
  const orderBy = targetKeys.map((key) => dialect.ascNullsLast(columnSql(dialect, key, 'u'))).join(', ');

  return {
    count: {
      sql:
        `${cte} SELECT (SELECT COUNT(*) FROM source_keys) AS total_count, ` +
        `(SELECT COUNT(*) FROM source_keys u WHERE ${notExists}) AS missing_count`,
      params: [],
    },
    sample: {
      sql:
        `${cte} SELECT u.* FROM source_keys u WHERE ${notExists} ` +
        `ORDER BY ${orderBy} LIMIT ${positiveInteger(sampleLimit, 'sampleLimit')}`,
      params: [],
    },
  };
}
