/**
 * Time window resolution for profiling
 */

import type { FilterCondition } from '@driftcheck/core';
import { ReconError } from '../errors/index.js';
import type { ProfileWindow } from '../types/index.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const DEFAULT_LOOKBACK_DAYS = 60;
export const DEFAULT_FORWARD_DAYS = 30;

export interface ResolvedWindow {
  column: string;
  from?: Date;
  to?: Date;
}

function toDate(value: Date | string, label: string): Date {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ReconError({
      code: 'INVALID_OPTIONS',
      message: `Window bound "${label}" is not a valid date: ${String(value)}`,
    });
  }
  return date;
}

function nonNegative(value: number, label: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ReconError({
      code: 'INVALID_OPTIONS',
      message: `${label} must be a non-negative number (got ${value})`,
    });
  }
  return value;
}

export function resolveWindow(window: ProfileWindow): ResolvedWindow {
  if (window.from === undefined && window.to === undefined) {
    const now = window.now ?? new Date();
    const lookback = nonNegative(window.lookbackDays ?? DEFAULT_LOOKBACK_DAYS, 'lookbackDays');
    const forward = nonNegative(window.forwardDays ?? DEFAULT_FORWARD_DAYS, 'forwardDays');
    return {
      column: window.column,
      from: new Date(now.getTime() - lookback * MS_PER_DAY),
      to: new Date(now.getTime() + forward * MS_PER_DAY),
    };
  }

  const resolved: ResolvedWindow = { column: window.column };
  if (window.from !== undefined) resolved.from = toDate(window.from, 'from');
  if (window.to !== undefined) resolved.to = toDate(window.to, 'to');
  return resolved;
}

/** Inclusive bounds as filter conditions */
export function windowConditions(window: ResolvedWindow): FilterCondition[] {
  const conditions: FilterCondition[] = [];
  if (window.from) conditions.push({ field: window.column, op: 'gte', value: window.from });
  if (window.to) conditions.push({ field: window.column, op: 'lte', value: window.to });
  return conditions;
}
