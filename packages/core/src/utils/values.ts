/**
 * Scalar helpers shared by in-memory filtering, sorting and aggregation
 */

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Numeric view of a value: numbers, bigints and numeric strings.
 * Returns null for anything else (including empty strings).
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Epoch milliseconds of a Date or an ISO-8601 date string, null otherwise
 */
export function toTimestamp(value: unknown): number | null {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof value === 'string' && ISO_DATE_PREFIX.test(value)) {
    const time = Date.parse(value);
    return Number.isNaN(time) ? null : time;
  }
  return null;
}

/**
 * Total order over scalar values: nulls last, numbers numerically,
 * dates chronologically, everything else by string code units.
 */
export function compareValues(a: unknown, b: unknown): number {
  const aNull = isNullish(a);
  const bNull = isNullish(b);
  if (aNull || bNull) {
    return aNull === bNull ? 0 : aNull ? 1 : -1;
  }

  if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if (a instanceof Date || b instanceof Date) {
    const aTime = toTimestamp(a);
    const bTime = toTimestamp(b);
    if (aTime !== null && bTime !== null) {
      return aTime - bTime;
    }
  }

  const aStr = String(a);
  const bStr = String(b);
  return aStr < bStr ? -1 : aStr > bStr ? 1 : 0;
}

/**
 * Canonical scalar for equality checks: Dates become ISO strings,
 * bigints become strings. Numbers and strings are never coerced into
 * each other, so 1 and "1" stay distinct.
 */
export function canonicalValue(value: unknown): string | number | boolean | null {
  if (isNullish(value)) {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  return JSON.stringify(value);
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  return canonicalValue(a) === canonicalValue(b);
}
