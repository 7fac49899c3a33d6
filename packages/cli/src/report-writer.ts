/**
 * Report output: text or JSON on stdout, plus an optional directory of
 * report files per job run.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { stringify } from 'csv-stringify/sync';
import { formatReportLines } from '@driftcheck/recon-core';
import type { ReconciliationReport } from '@driftcheck/recon-core';

export type ReportFormat = 'text' | 'json';

export type SummaryValue = string | number | null;

export interface SummaryRow {
  section: string;
  subject: string;
  metric: string;
  value: SummaryValue;
}

const SUMMARY_COLUMNS = ['section', 'subject', 'metric', 'value'];

const FORMULA_PATTERN = /^[\t\r\n ]*[=+\-@]/;

/**
 * Prefix strings a spreadsheet would evaluate as a formula
 */
export function sanitizeFormula(value: SummaryValue, prefix = "'"): SummaryValue {
  if (typeof value !== 'string' || value.startsWith(prefix)) return value;
  return FORMULA_PATTERN.test(value) ? `${prefix}${value}` : value;
}

export function renderReport(report: ReconciliationReport, format: ReportFormat): string {
  if (format === 'json') {
    return JSON.stringify(report, null, 2);
  }
  return formatReportLines(report).join('\n');
}

/**
 * Flatten the headline numbers of a report into one row per metric
 */
export function summaryRows(report: ReconciliationReport): SummaryRow[] {
  const rows: SummaryRow[] = [];
  const push = (section: string, subject: string, metric: string, value: SummaryValue | undefined): void => {
    rows.push({ section, subject, metric, value: value ?? null });
  };

  push('report', report.title ?? report.id, 'status', report.status);
  for (const reason of report.reasons) {
    push('report', report.title ?? report.id, reason.severity, reason.message);
  }

  if (report.target) {
    push('dataset', report.target.name, 'row_count', report.target.rowCount);
  }
  for (const source of report.sources) {
    push('dataset', source.name, 'row_count', source.rowCount);
  }

  for (const diff of report.rowDiffs) {
    const subject = `${diff.sourceName} -> ${diff.targetName}`;
    push('rows', subject, 'missing_in_target', diff.missingCount);
    push('rows', subject, 'method', diff.method);
  }

  if (report.unionCoverage) {
    const union = report.unionCoverage;
    const subject = `${union.sourceNames.join(' + ')} -> ${union.targetName}`;
    push('union', subject, 'union_keys', union.unionKeyCount);
    push('union', subject, 'missing_in_target', union.missingKeyCount);
  }

  if (report.versionComparison) {
    const version = report.versionComparison;
    const subject = `${version.oldName} -> ${version.newName}`;
    push('versions', subject, 'old_records', version.oldRecordCount);
    push('versions', subject, 'new_records', version.newRecordCount);
    push('versions', subject, 'old_not_in_new', version.rowsInOldNotInNew);
    push('versions', subject, 'new_not_in_old', version.rowsInNewNotInOld);
    push('versions', subject, 'percentage_change', version.percentageChange);
  }

  for (const drift of report.schemaDrift) {
    const subject = `${drift.beforeName} -> ${drift.afterName}`;
    push('schema', subject, 'added', drift.diff.added.length);
    push('schema', subject, 'removed', drift.diff.removed.length);
    push('schema', subject, 'changed', drift.diff.changed.length);
  }

  if (report.columnCoverage) {
    push('columns', report.columnCoverage.targetName, 'missing_from_target', report.columnCoverage.missingFromTarget.length);
  }

  for (const shift of report.profileShifts) {
    const subject = `${shift.beforeName} -> ${shift.afterName}`;
    push('profile', subject, 'row_count_delta', shift.rowCountDelta);
    for (const column of shift.columns) {
      push('profile', `${subject}.${column.column}`, 'null_percentage_delta', column.nullPercentageDelta);
    }
  }

  for (const duplicates of report.duplicates) {
    push('duplicates', duplicates.dataset, 'duplicate_keys', duplicates.duplicateKeyCount);
    push('duplicates', duplicates.dataset, 'duplicate_rows', duplicates.totalDuplicateRows);
  }

  if (report.valueComparison) {
    const values = report.valueComparison;
    const subject = `${values.oldName} -> ${values.newName}`;
    push('values', subject, 'matched_rows', values.matchedRows);
    for (const column of values.columns) {
      push('values', `${subject}.${column.column}`, 'different', column.different);
    }
  }

  for (const failure of report.failures) {
    push('failures', failure.dataset ?? failure.stage, failure.code, failure.message);
  }

  return rows;
}

export function renderSummaryCsv(report: ReconciliationReport): string {
  const records = summaryRows(report).map((row) => ({
    section: sanitizeFormula(row.section),
    subject: sanitizeFormula(row.subject),
    metric: sanitizeFormula(row.metric),
    value: sanitizeFormula(row.value),
  }));
  return stringify(records, { header: true, columns: SUMMARY_COLUMNS });
}

/** Directory-safe ISO timestamp */
export function timestampSlug(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-');
}

/**
 * Write report.json, report.txt and summary.csv under
 * `<outputDir>/<jobName>_<timestamp>/`
 * @returns The directory written to
 */
export async function writeReportFiles(
  outputDir: string,
  jobName: string,
  report: ReconciliationReport
): Promise<string> {
  const dir = join(resolve(process.cwd(), outputDir), `${jobName}_${timestampSlug(report.generatedAt)}`);
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, 'report.json'), renderReport(report, 'json'), 'utf-8');
  await writeFile(join(dir, 'report.txt'), `${renderReport(report, 'text')}\n`, 'utf-8');
  await writeFile(join(dir, 'summary.csv'), renderSummaryCsv(report), 'utf-8');
  return dir;
}
