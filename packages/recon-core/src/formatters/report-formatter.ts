/**
 * Report Formatter
 *
 * Turns a finished report into ordered log lines for build and CI logs.
 * Reads the report only; nothing is recomputed here.
 */

import type { ColumnProfile, ReconciliationReport } from '../types/index.js';
import { formatNumber, formatPercent, formatRow, formatValue } from './utils.js';

function profileDetails(column: ColumnProfile): string {
  switch (column.category) {
    case 'numeric':
      return `min ${formatNumber(column.min)}, max ${formatNumber(column.max)}, mean ${formatNumber(column.mean)}, median ${formatNumber(column.median)}`;
    case 'string':
      return `length ${formatNumber(column.minLength)}..${formatNumber(column.maxLength)} (avg ${formatNumber(column.avgLength)}), distinct ${formatNumber(column.distinctCount)}`;
    case 'temporal':
      return `${formatValue(column.min)} .. ${formatValue(column.max)} (${formatNumber(column.spanDays)} days)`;
    case 'other':
      return '';
  }
}

export function formatReportLines(report: ReconciliationReport): string[] {
  const lines: string[] = [];

  // Header
  lines.push(`=== ${report.title ?? 'Reconciliation Report'} ===`);
  lines.push(`Status: ${report.status}`);
  lines.push(`Generated: ${report.generatedAt.toISOString()} (${report.processingTimeMs} ms)`);
  if (report.target) {
    const rows = report.target.rowCount !== undefined ? `, ${report.target.rowCount} rows` : '';
    lines.push(`Target: ${report.target.name} (${report.target.type}${rows})`);
  }
  for (const source of report.sources) {
    const rows = source.rowCount !== undefined ? `, ${source.rowCount} rows` : '';
    lines.push(`Source: ${source.name} (${source.type}${rows})`);
  }
  if (report.keys) {
    const how = report.keys.origin === 'explicit' ? 'explicit' : `inferred, ${report.keys.strategy ?? 'pattern'}`;
    lines.push(`Keys: ${report.keys.columns.join(', ')} (${how})`);
  }
  lines.push('');

  // Row coverage
  if (report.rowDiffs.length > 0 || report.unionCoverage) {
    lines.push('--- Row coverage ---');
    for (const diff of report.rowDiffs) {
      const examined = diff.sourceRowCount !== undefined ? ` of ${diff.sourceRowCount}` : '';
      lines.push(`${diff.sourceName} -> ${diff.targetName}: ${diff.missingCount}${examined} rows missing [${diff.method}]`);
      for (const row of diff.sampleMissingRows) {
        lines.push(`  - ${formatRow(row)}`);
      }
    }
    const union = report.unionCoverage;
    if (union) {
      const total = union.unionKeyCount !== undefined ? ` of ${union.unionKeyCount}` : '';
      lines.push(
        `union(${union.sourceNames.join(', ')}) -> ${union.targetName}: ${union.missingKeyCount}${total} keys missing [${union.method}]`
      );
      for (const key of union.sampleMissingKeys) {
        lines.push(`  - ${formatRow(key)}`);
      }
    }
    lines.push('');
  }

  // Version comparison
  const versions = report.versionComparison;
  if (versions) {
    lines.push('--- Version comparison ---');
    lines.push(`${versions.oldName}: ${versions.oldRecordCount} rows`);
    lines.push(`${versions.newName}: ${versions.newRecordCount} rows`);
    lines.push(`In old, not in new: ${versions.rowsInOldNotInNew}`);
    lines.push(`In new, not in old: ${versions.rowsInNewNotInOld}`);
    lines.push(
      `Record count difference: ${versions.recordCountDifference} (${formatPercent(versions.percentageChange)})`
    );
    lines.push('');
  }

  // Schema drift
  if (report.schemaDrift.length > 0 || report.columnCoverage) {
    lines.push('--- Schema drift ---');
    for (const drift of report.schemaDrift) {
      const { added, removed, changed } = drift.diff;
      lines.push(
        `${drift.beforeName} -> ${drift.afterName}: ${added.length} added, ${removed.length} removed, ${changed.length} changed`
      );
      for (const column of added) lines.push(`  + ${column.name} ${column.declaredType}`);
      for (const column of removed) lines.push(`  - ${column.name} ${column.declaredType}`);
      for (const change of changed) {
        const deltas = change.deltas.map((delta) => `${delta.field} ${String(delta.before)} -> ${String(delta.after)}`);
        lines.push(`  ~ ${change.name}: ${deltas.join(', ')}`);
      }
    }
    const coverage = report.columnCoverage;
    if (coverage) {
      for (const source of coverage.sources) {
        lines.push(
          `${source.dataset}: ${source.columnCount} columns, ${source.commonColumns.length} common with ${coverage.targetName}`
        );
        if (source.missingColumns.length > 0) {
          lines.push(`  missing from target: ${source.missingColumns.join(', ')}`);
        }
      }
      for (const conflict of coverage.conflicts) {
        lines.push(`  conflict on ${conflict.name}: ${conflict.keptFrom} kept, ${conflict.conflictingDataset} differs`);
      }
      if (coverage.missingFromTarget.length > 0) {
        lines.push(`Source columns not in target: ${coverage.missingFromTarget.join(', ')}`);
      }
    }
    lines.push('');
  }

  // Profiles
  for (const profile of report.profiles) {
    lines.push(`--- Profile: ${profile.dataset} (${profile.totalRows} rows) ---`);
    for (const column of profile.columns) {
      if (column.failure) {
        lines.push(`${column.column} [${column.category}]: failed (${column.failure.code})`);
        continue;
      }
      const details = profileDetails(column);
      lines.push(
        `${column.column} [${column.category}]: nulls ${formatNumber(column.nullCount)} (${formatPercent(column.nullPercentage)})${details ? `, ${details}` : ''}`
      );
    }
    lines.push('');
  }

  for (const shift of report.profileShifts) {
    lines.push(`--- Shift: ${shift.beforeName} -> ${shift.afterName} ---`);
    lines.push(`Rows: ${shift.rowCountBefore} -> ${shift.rowCountAfter} (${shift.rowCountDelta >= 0 ? '+' : ''}${shift.rowCountDelta})`);
    for (const column of shift.columns) {
      lines.push(
        `${column.column}: null% ${formatPercent(column.nullPercentageBefore)} -> ${formatPercent(column.nullPercentageAfter)}`
      );
    }
    lines.push('');
  }

  for (const aggregate of report.aggregates) {
    lines.push(`--- ${aggregate.measureColumn} by ${aggregate.groupColumn} (${aggregate.dataset}) ---`);
    for (const group of aggregate.groups) {
      const stats = aggregate.stats.map((stat) => `${stat} ${formatValue(group.stats[stat])}`);
      lines.push(
        `${formatValue(group.group)}: rows ${group.rowCount}, nulls ${formatPercent(group.nullPercentage)}${stats.length > 0 ? `, ${stats.join(', ')}` : ''}`
      );
    }
    lines.push('');
  }

  for (const duplicates of report.duplicates) {
    lines.push(`--- Duplicate keys: ${duplicates.dataset} (${duplicates.keys.join(', ')}) ---`);
    lines.push(
      `${duplicates.duplicateKeyCount} duplicated keys, ${duplicates.totalDuplicateRows} rows, max ${duplicates.maxOccurrences} occurrences`
    );
    for (const example of duplicates.examples) {
      lines.push(`  - ${formatRow(example.key)} x${example.occurrences}`);
    }
    lines.push('');
  }

  const values = report.valueComparison;
  if (values) {
    lines.push(`--- Values: ${values.oldName} -> ${values.newName} ---`);
    lines.push(`Matched rows: ${values.matchedRows}, only in old: ${values.onlyInOld}, only in new: ${values.onlyInNew}`);
    if (values.truncated) {
      lines.push('Row cap reached; counts cover the loaded rows only');
    }
    for (const column of values.columns) {
      lines.push(
        `${column.column}: same ${column.same}, different ${column.different}, null->value ${column.nullToValue}, value->null ${column.valueToNull}`
      );
    }
    lines.push('');
  }

  // Status reasons
  if (report.reasons.length > 0) {
    lines.push('--- Findings ---');
    for (const reason of report.reasons) {
      lines.push(`${reason.severity.toUpperCase()}: ${reason.message}`);
    }
  }

  return lines;
}
