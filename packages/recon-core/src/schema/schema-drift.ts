/**
 * Schema Drift Detector
 *
 * Columns are matched by name only, case-insensitively. A rename shows
 * up as one removal plus one addition.
 */

import { categorizeType } from '@driftcheck/core';
import type { ColumnDescriptor, SchemaSnapshot } from '@driftcheck/core';
import type {
  ColumnChange,
  ColumnCoverage,
  ColumnDelta,
  ColumnMergeConflict,
  SchemaDiff,
  SourceColumnCoverage,
} from '../types/index.js';

function byName(snapshot: SchemaSnapshot): Map<string, ColumnDescriptor> {
  const columns = new Map<string, ColumnDescriptor>();
  for (const column of snapshot.columns) {
    const lower = column.name.toLowerCase();
    if (!columns.has(lower)) columns.set(lower, column);
  }
  return columns;
}

export interface DeltaRules {
  /** Compare declared type names; otherwise only their type family */
  exactTypes: boolean;
  /** Compare nullability */
  nullability: boolean;
}

const EXACT_RULES: DeltaRules = { exactTypes: true, nullability: true };

/**
 * Type names are comparable only within one origin and dialect. Inferred
 * nullability reflects the rows read, not a constraint.
 */
export function deltaRules(before: SchemaSnapshot, after: SchemaSnapshot): DeltaRules {
  return {
    exactTypes: before.origin === after.origin && before.dialect === after.dialect,
    nullability: before.origin !== 'inferred' && after.origin !== 'inferred',
  };
}

/**
 * Fields that differ between two descriptors of the same column.
 * Across type systems a missing length on either side is not a change.
 */
export function columnDeltas(
  before: ColumnDescriptor,
  after: ColumnDescriptor,
  rules: DeltaRules = EXACT_RULES
): ColumnDelta[] {
  const deltas: ColumnDelta[] = [];

  const sameType = rules.exactTypes
    ? before.declaredType.trim().toLowerCase() === after.declaredType.trim().toLowerCase()
    : categorizeType(before.declaredType) === categorizeType(after.declaredType);
  if (!sameType) {
    deltas.push({ field: 'declaredType', before: before.declaredType, after: after.declaredType });
  }

  const beforeLength = before.maxLength ?? null;
  const afterLength = after.maxLength ?? null;
  const lengthKnown = rules.exactTypes || (beforeLength !== null && afterLength !== null);
  if (lengthKnown && beforeLength !== afterLength) {
    deltas.push({ field: 'maxLength', before: beforeLength, after: afterLength });
  }

  if (rules.nullability && before.nullable !== after.nullable) {
    deltas.push({ field: 'nullable', before: before.nullable, after: after.nullable });
  }

  return deltas;
}

export function diffSchemas(before: SchemaSnapshot, after: SchemaSnapshot): SchemaDiff {
  const beforeColumns = byName(before);
  const afterColumns = byName(after);
  const rules = deltaRules(before, after);

  const added = [...afterColumns.entries()]
    .filter(([name]) => !beforeColumns.has(name))
    .map(([, column]) => column);

  const removed: ColumnDescriptor[] = [];
  const changed: ColumnChange[] = [];

  for (const [name, beforeColumn] of beforeColumns) {
    const afterColumn = afterColumns.get(name);
    if (!afterColumn) {
      removed.push(beforeColumn);
      continue;
    }
    const deltas = columnDeltas(beforeColumn, afterColumn, rules);
    if (deltas.length > 0) {
      changed.push({ name: beforeColumn.name, before: beforeColumn, after: afterColumn, deltas });
    }
  }

  return { added, removed, changed };
}

/**
 * Check that a consolidated target keeps the columns its sources provided.
 * The first source to define a column wins; later sources that define it
 * differently are reported as merge conflicts.
 */
export function checkColumnCoverage(
  sources: SchemaSnapshot[],
  target: SchemaSnapshot,
  keys: string[] = []
): ColumnCoverage {
  const targetColumns = byName(target);
  const keyNames = new Set(keys.map((key) => key.toLowerCase()));

  const merged = new Map<string, { column: ColumnDescriptor; from: SchemaSnapshot }>();
  const conflicts: ColumnMergeConflict[] = [];
  const perSource: SourceColumnCoverage[] = [];

  for (const source of sources) {
    const commonColumns: string[] = [];
    const missingColumns: string[] = [];

    for (const [name, column] of byName(source)) {
      if (targetColumns.has(name)) commonColumns.push(column.name);
      else missingColumns.push(column.name);

      const kept = merged.get(name);
      if (!kept) {
        merged.set(name, { column, from: source });
        continue;
      }
      const deltas = columnDeltas(kept.column, column, deltaRules(kept.from, source));
      if (deltas.length > 0) {
        conflicts.push({ name: kept.column.name, keptFrom: kept.from.dataset, conflictingDataset: source.dataset, deltas });
      }
    }

    perSource.push({
      dataset: source.dataset,
      columnCount: source.columns.length,
      commonColumns,
      missingColumns,
    });
  }

  const mergedColumns = [...merged.values()].map(({ column }) => column);
  const missingFromTarget = [...merged.entries()]
    .filter(([name]) => !targetColumns.has(name) && !keyNames.has(name))
    .map(([, { column }]) => column.name);

  return {
    targetName: target.dataset,
    sources: perSource,
    mergedColumns,
    conflicts,
    missingFromTarget,
  };
}
