/**
 * Report Builder
 *
 * Assembles findings into a ReconciliationReport and derives its status.
 * Pure: no I/O, no formatting.
 */

import type { ColumnDescriptor } from '@driftcheck/core';
import type {
  ReconciliationReport,
  ReportFindings,
  ReportStatus,
  SchemaDriftResult,
  StatusReason,
} from '../types/index.js';

function describeDeltas(deltas: { field: string; before: unknown; after: unknown }[]): string {
  return deltas.map((delta) => `${delta.field} ${String(delta.before)} -> ${String(delta.after)}`).join(', ');
}

/**
 * Why a column matters: key, explicitly required, or non-nullable before the change
 */
function protectedRole(
  column: ColumnDescriptor,
  keys: Set<string>,
  required: Set<string>,
  declaredNullability: boolean
): string | null {
  const name = column.name.toLowerCase();
  if (keys.has(name)) return 'key';
  if (required.has(name)) return 'required';
  if (declaredNullability && !column.nullable) return 'non-nullable';
  return null;
}

function driftReasons(drift: SchemaDriftResult, keys: Set<string>, required: Set<string>): StatusReason[] {
  const reasons: StatusReason[] = [];
  const declaredNullability = drift.beforeOrigin !== 'inferred';

  for (const column of drift.diff.removed) {
    const role = protectedRole(column, keys, required, declaredNullability);
    if (role) {
      reasons.push({
        severity: 'warning',
        message: `${role} column ${column.name} of ${drift.beforeName} is missing from ${drift.afterName}`,
      });
    }
  }

  for (const change of drift.diff.changed) {
    const role = protectedRole(change.before, keys, required, declaredNullability);
    if (role) {
      reasons.push({
        severity: 'warning',
        message: `${role} column ${change.name} changed in ${drift.afterName}: ${describeDeltas(change.deltas)}`,
      });
    }
  }

  return reasons;
}

/**
 * Every reason that raises the status, errors first
 */
export function deriveReasons(findings: ReportFindings): StatusReason[] {
  const errors: StatusReason[] = [];
  const warnings: StatusReason[] = [];
  const failures = findings.failures ?? [];

  for (const failure of failures) {
    const where = [failure.dataset, failure.column].filter(Boolean).join('.');
    const message = `${failure.stage}${where ? ` (${where})` : ''} [${failure.code}]: ${failure.message}`;
    if (failure.code === 'METADATA_UNAVAILABLE') {
      warnings.push({ severity: 'warning', message: `metadata fallback for ${message}` });
    } else {
      errors.push({ severity: 'error', message });
    }
  }

  const reportedFallbacks = new Set(
    failures.filter((failure) => failure.code === 'METADATA_UNAVAILABLE').map((failure) => failure.dataset)
  );
  for (const schema of findings.schemas ?? []) {
    if (schema.origin === 'fallback' && !reportedFallbacks.has(schema.dataset)) {
      warnings.push({ severity: 'warning', message: `schema of ${schema.dataset} was built from fallback columns` });
    }
  }

  for (const diff of findings.rowDiffs ?? []) {
    if (diff.missingCount > 0) {
      warnings.push({
        severity: 'warning',
        message: `${diff.missingCount} row(s) of ${diff.sourceName} missing from ${diff.targetName}`,
      });
    }
  }

  const union = findings.unionCoverage;
  if (union && union.missingKeyCount > 0) {
    warnings.push({
      severity: 'warning',
      message: `${union.missingKeyCount} key(s) of ${union.sourceNames.join(' + ')} missing from ${union.targetName}`,
    });
  }

  const versions = findings.versionComparison;
  if (versions && versions.rowsInOldNotInNew > 0) {
    warnings.push({
      severity: 'warning',
      message: `${versions.rowsInOldNotInNew} row(s) of ${versions.oldName} missing from ${versions.newName}`,
    });
  }

  const keys = new Set((findings.keys?.columns ?? []).map((key) => key.toLowerCase()));
  const required = new Set((findings.requiredColumns ?? []).map((column) => column.toLowerCase()));
  for (const drift of findings.schemaDrift ?? []) {
    warnings.push(...driftReasons(drift, keys, required));
  }

  for (const duplicates of findings.duplicates ?? []) {
    if (duplicates.duplicateKeyCount > 0) {
      warnings.push({
        severity: 'warning',
        message: `${duplicates.duplicateKeyCount} duplicated key(s) on (${duplicates.keys.join(', ')}) in ${duplicates.dataset}`,
      });
    }
  }

  const values = findings.valueComparison;
  if (values) {
    if (values.truncated) {
      warnings.push({
        severity: 'warning',
        message: `value comparison of ${values.oldName} and ${values.newName} hit the row cap; counts cover the loaded rows only`,
      });
    }
    for (const column of values.columns) {
      const changed = column.different + column.nullToValue + column.valueToNull;
      if (changed > 0) {
        warnings.push({
          severity: 'warning',
          message: `${changed} value(s) of ${column.column} differ between ${values.oldName} and ${values.newName}`,
        });
      }
    }
  }

  return [...errors, ...warnings];
}

export function statusOf(reasons: StatusReason[]): ReportStatus {
  if (reasons.some((reason) => reason.severity === 'error')) return 'ERROR';
  if (reasons.length > 0) return 'WARNING';
  return 'OK';
}

export function buildReport(findings: ReportFindings): ReconciliationReport {
  const reasons = deriveReasons(findings);

  return {
    id: findings.id,
    generatedAt: findings.generatedAt,
    processingTimeMs: findings.processingTimeMs,
    ...(findings.title !== undefined ? { title: findings.title } : {}),
    status: statusOf(reasons),
    reasons,
    ...(findings.target ? { target: findings.target } : {}),
    sources: findings.sources ?? [],
    schemas: findings.schemas ?? [],
    ...(findings.keys ? { keys: findings.keys } : {}),
    requiredColumns: findings.requiredColumns ?? [],
    rowDiffs: findings.rowDiffs ?? [],
    ...(findings.unionCoverage ? { unionCoverage: findings.unionCoverage } : {}),
    ...(findings.versionComparison ? { versionComparison: findings.versionComparison } : {}),
    schemaDrift: findings.schemaDrift ?? [],
    ...(findings.columnCoverage ? { columnCoverage: findings.columnCoverage } : {}),
    profiles: findings.profiles ?? [],
    profileShifts: findings.profileShifts ?? [],
    aggregates: findings.aggregates ?? [],
    duplicates: findings.duplicates ?? [],
    ...(findings.valueComparison ? { valueComparison: findings.valueComparison } : {}),
    failures: findings.failures ?? [],
  };
}
