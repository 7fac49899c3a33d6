/**
 * Profiling types
 */

import type { AggregateValue, ColumnCategory } from '@driftcheck/core';
import type { ReconFailure } from '../errors/index.js';

export interface ProfiledColumn {
  name: string;
  category: ColumnCategory;
}

/** Explicit bounds on a temporal column (inclusive) */
export interface AbsoluteWindow {
  column: string;
  from?: Date | string;
  to?: Date | string;
  lookbackDays?: never;
  forwardDays?: never;
  now?: never;
}

/**
 * Bounds relative to now: [now - lookbackDays, now + forwardDays].
 * A window with neither from nor to is relative.
 */
export interface RelativeWindow {
  column: string;
  /** Default: 60 */
  lookbackDays?: number;
  /** Default: 30 */
  forwardDays?: number;
  now?: Date;
  from?: never;
  to?: never;
}

export type ProfileWindow = AbsoluteWindow | RelativeWindow;

interface ColumnProfileBase {
  column: string;
  nonNullCount: number | null;
  nullCount: number | null;
  /** null when the dataset (or window) holds no rows */
  nullPercentage: number | null;
  /** Set when a statistic query failed; other columns are unaffected */
  failure?: ReconFailure;
}

export interface NumericColumnProfile extends ColumnProfileBase {
  category: 'numeric';
  min: number | null;
  max: number | null;
  mean: number | null;
  median: number | null;
}

export interface StringColumnProfile extends ColumnProfileBase {
  category: 'string';
  minLength: number | null;
  maxLength: number | null;
  avgLength: number | null;
  distinctCount: number | null;
}

export interface TemporalColumnProfile extends ColumnProfileBase {
  category: 'temporal';
  min: AggregateValue;
  max: AggregateValue;
  /** Whole days between min and max */
  spanDays: number | null;
}

export interface OtherColumnProfile extends ColumnProfileBase {
  category: 'other';
}

export type ColumnProfile =
  | NumericColumnProfile
  | StringColumnProfile
  | TemporalColumnProfile
  | OtherColumnProfile;

export interface DatasetProfile {
  dataset: string;
  totalRows: number;
  columns: ColumnProfile[];
  window?: { column: string; from?: Date; to?: Date };
}

export interface ProfileOptions {
  window?: ProfileWindow;
}

export interface ColumnShift {
  column: string;
  nullPercentageBefore: number | null;
  nullPercentageAfter: number | null;
  /** after - before; null when either side is unknown */
  nullPercentageDelta: number | null;
  distinctCountDelta: number | null;
  meanDelta: number | null;
}

export interface ProfileShift {
  beforeName: string;
  afterName: string;
  rowCountBefore: number;
  rowCountAfter: number;
  rowCountDelta: number;
  columns: ColumnShift[];
}

export type GroupStat = 'count' | 'sum' | 'avg' | 'min' | 'max' | 'stddev' | 'median' | 'count_distinct';

export interface GroupAggregate {
  group: unknown;
  rowCount: number;
  /** NULLs of the measure column within the group */
  nullCount: number;
  nullPercentage: number | null;
  stats: Partial<Record<GroupStat, AggregateValue>>;
}

export interface GroupedAggregateResult {
  dataset: string;
  groupColumn: string;
  measureColumn: string;
  stats: GroupStat[];
  groups: GroupAggregate[];
}
