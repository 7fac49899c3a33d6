import { describe, it, expect } from 'vitest';
import { applyFilter, countMatching } from '../src/utils/filter.js';
import { keyTuple, groupTuple, compareByKeys, pickColumns } from '../src/utils/keys.js';
import { compareValues, canonicalValue } from '../src/utils/values.js';
import { categorizeType, findColumn, fallbackSnapshot } from '../src/types/schema.js';

const rows = [
  { id: 3, name: 'Gamma', created: '2024-03-01' },
  { id: 1, name: 'alpha', created: '2024-01-15' },
  { id: 2, name: null, created: '2024-02-10' },
];

describe('applyFilter', () => {
  it('compares ISO strings against Date bounds chronologically', () => {
    const result = applyFilter(rows, {
      where: [
        { field: 'created', op: 'gte', value: new Date('2024-02-01T00:00:00Z') },
        { field: 'created', op: 'lt', value: new Date('2024-03-01T00:00:00Z') },
      ],
    });
    expect(result.map((row) => row.id)).toEqual([2]);
  });

  it('sorts with NULLs last and paginates', () => {
    const result = applyFilter(rows, { orderBy: [{ field: 'name', direction: 'asc' }], limit: 2 });
    expect(result.map((row) => row.id)).toEqual([3, 1]);
  });

  it('handles null operators', () => {
    expect(countMatching(rows, [{ field: 'name', op: 'is_null' }])).toBe(1);
    expect(countMatching(rows, [{ field: 'name', op: 'not_null' }])).toBe(2);
    expect(countMatching(rows, [{ field: 'name', op: 'neq', value: 'alpha' }])).toBe(1);
  });

  it('selects columns', () => {
    expect(applyFilter(rows, { select: ['id'], limit: 1 })).toEqual([{ id: 3 }]);
  });
});

describe('key tuples', () => {
  it('returns null when any key column is NULL', () => {
    expect(keyTuple({ a: 1, b: null }, ['a', 'b'])).toBeNull();
    expect(keyTuple({ a: 1 }, ['a', 'b'])).toBeNull();
  });

  it('keeps numbers and numeric strings distinct', () => {
    expect(keyTuple({ id: 1 }, ['id'])).toBe('[1]');
    expect(keyTuple({ id: '1' }, ['id'])).toBe('["1"]');
  });

  it('serializes dates as ISO strings', () => {
    expect(keyTuple({ d: new Date('2024-01-01T00:00:00Z') }, ['d'])).toBe('["2024-01-01T00:00:00.000Z"]');
    expect(canonicalValue(10n)).toBe('10');
  });

  it('groups NULLs together', () => {
    expect(groupTuple({ region: null }, ['region'])).toBe(groupTuple({}, ['region']));
  });

  it('orders rows column by column', () => {
    expect(compareByKeys({ a: 1, b: 2 }, { a: 1, b: 3 }, ['a', 'b'])).toBeLessThan(0);
    expect(compareValues(null, 1)).toBe(1);
    expect(compareValues('b', 'a')).toBe(1);
  });

  it('projects and renames columns', () => {
    expect(pickColumns({ ID: 7, other: 1 }, ['ID'], ['id'])).toEqual({ id: 7 });
  });
});

describe('schema helpers', () => {
  it('categorizes declared types', () => {
    expect(categorizeType('integer')).toBe('numeric');
    expect(categorizeType('int8')).toBe('numeric');
    expect(categorizeType('double precision')).toBe('numeric');
    expect(categorizeType('character varying(255)')).toBe('string');
    expect(categorizeType('VARCHAR')).toBe('string');
    expect(categorizeType('timestamp without time zone')).toBe('temporal');
    expect(categorizeType('date')).toBe('temporal');
    expect(categorizeType('boolean')).toBe('other');
    expect(categorizeType('interval')).toBe('other');
  });

  it('finds columns case-insensitively', () => {
    const snapshot = fallbackSnapshot('orders', ['ID', 'name']);
    expect(findColumn(snapshot, 'id')?.name).toBe('ID');
    expect(snapshot.origin).toBe('fallback');
    expect(snapshot.columns[1]).toEqual({ name: 'name', declaredType: 'unknown', nullable: true, ordinalPosition: 2 });
  });
});
