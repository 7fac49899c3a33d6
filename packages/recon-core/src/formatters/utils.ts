/**
 * Formatter Utilities
 *
 * Shared helpers for report formatting.
 */

import { canonicalValue } from '@driftcheck/core';
import type { Row } from '@driftcheck/core';

/**
 * Format a row or key tuple for display: `id=3, region=EU`
 */
export function formatRow(row: Row): string {
  return Object.entries(row)
    .map(([column, value]) => `${column}=${String(canonicalValue(value))}`)
    .join(', ');
}

export function formatNumber(value: number | null | undefined, decimals = 2): string {
  if (value === null || value === undefined) return 'n/a';
  return Number.isInteger(value) ? String(value) : value.toFixed(decimals);
}

export function formatPercent(value: number | null | undefined): string {
  return value === null || value === undefined ? 'n/a' : `${value.toFixed(2)}%`;
}

export function formatValue(value: unknown): string {
  const canonical = canonicalValue(value);
  if (canonical === null) return 'n/a';
  return typeof canonical === 'number' ? formatNumber(canonical) : String(canonical);
}
