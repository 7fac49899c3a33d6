/**
 * Grouped aggregate comparison
 */

import { compareValues, isNullish, toNumber } from '@driftcheck/core';
import type { AggregateMeasure, AggregateRow, AggregateValue, FilterCondition, IDataset } from '@driftcheck/core';
import { ReconError, toReconError } from '../errors/index.js';
import type { GroupAggregate, GroupStat, GroupedAggregateResult } from '../types/index.js';
import { nullPercentage } from './profiler.js';

export const GROUP_STATS: readonly GroupStat[] = [
  'count',
  'sum',
  'avg',
  'min',
  'max',
  'stddev',
  'median',
  'count_distinct',
];

const ROW_COUNT = 'row_count';
const NON_NULL = 'non_null';

export function isGroupStat(value: unknown): value is GroupStat {
  return typeof value === 'string' && GROUP_STATS.some((stat) => stat === value);
}

export interface AggregateByOptions {
  where?: FilterCondition[];
}

/** Descending, NULLs last */
function compareDescending(a: AggregateValue | undefined, b: AggregateValue | undefined): number {
  const aNull = isNullish(a);
  const bNull = isNullish(b);
  if (aNull || bNull) {
    return aNull === bNull ? 0 : aNull ? 1 : -1;
  }
  const aNumber = toNumber(a);
  const bNumber = toNumber(b);
  if (aNumber !== null && bNumber !== null) {
    return bNumber - aNumber;
  }
  return compareValues(b, a);
}

function statValue(group: GroupAggregate, stat: GroupStat): AggregateValue | undefined {
  return stat === 'count' ? group.rowCount : group.stats[stat];
}

/**
 * Aggregate a measure column per value of a group column.
 * Groups are ordered by the first requested statistic descending,
 * then row count descending, then group value ascending; NULL
 * statistics sort last.
 *
 * @throws ReconError INVALID_OPTIONS, QUERY_EXECUTION_FAILURE
 */
export async function aggregateBy(
  dataset: IDataset,
  groupColumn: string,
  measureColumn: string,
  stats: GroupStat[],
  options: AggregateByOptions = {}
): Promise<GroupedAggregateResult> {
  const unknown = stats.filter((stat) => !isGroupStat(stat));
  if (unknown.length > 0) {
    throw new ReconError({
      code: 'INVALID_OPTIONS',
      message: `Unsupported statistics: ${unknown.join(', ')}`,
      dataset: dataset.config.name,
      suggestion: `Use any of: ${GROUP_STATS.join(', ')}`,
    });
  }

  const requested = [...new Set(stats)];
  const measures: AggregateMeasure[] = [
    { fn: 'count', alias: ROW_COUNT },
    { fn: 'count_non_null', column: measureColumn, alias: NON_NULL },
    ...requested
      .filter((stat) => stat !== 'count')
      .map((stat): AggregateMeasure => ({ fn: stat, column: measureColumn, alias: stat })),
  ];

  let rows: AggregateRow[];
  try {
    rows = await dataset.aggregate({
      measures,
      groupBy: [groupColumn],
      ...(options.where && options.where.length > 0 ? { where: options.where } : {}),
    });
  } catch (error) {
    throw toReconError(error, 'QUERY_EXECUTION_FAILURE', { dataset: dataset.config.name, column: measureColumn });
  }

  const groups: GroupAggregate[] = rows.map((row) => {
    const rowCount = toNumber(row.values[ROW_COUNT]) ?? 0;
    const nullCount = rowCount - (toNumber(row.values[NON_NULL]) ?? 0);
    const values: GroupAggregate['stats'] = {};
    for (const stat of requested) {
      values[stat] = stat === 'count' ? rowCount : row.values[stat] ?? null;
    }
    return {
      group: row.group[groupColumn] ?? null,
      rowCount,
      nullCount,
      nullPercentage: nullPercentage(nullCount, rowCount),
      stats: values,
    };
  });

  const [primary] = requested;
  groups.sort(
    (a, b) =>
      (primary ? compareDescending(statValue(a, primary), statValue(b, primary)) : 0) ||
      b.rowCount - a.rowCount ||
      compareValues(a.group, b.group)
  );

  return {
    dataset: dataset.config.name,
    groupColumn,
    measureColumn,
    stats: requested,
    groups,
  };
}
