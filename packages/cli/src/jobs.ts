/**
 * Maps config jobs onto reconciliation engine calls
 */

import type { IDataset } from '@driftcheck/core';
import type { IReconciliationEngine, ProfileWindow, ReconciliationReport } from '@driftcheck/recon-core';
import type { AbsoluteWindowEntry, JobEntry, WindowEntry } from './config.js';

export interface DatasetLookup {
  getOrThrow(id: string): IDataset;
}

function isAbsoluteWindow(window: WindowEntry): window is AbsoluteWindowEntry {
  return 'from' in window || 'to' in window;
}

/** A window without from or to is relative to now */
export function toProfileWindow(window: WindowEntry): ProfileWindow {
  if (isAbsoluteWindow(window)) {
    return { column: window.column, from: window.from, to: window.to };
  }
  return { column: window.column, lookbackDays: window.lookbackDays, forwardDays: window.forwardDays };
}

export async function runJob(
  engine: IReconciliationEngine,
  datasets: DatasetLookup,
  job: JobEntry
): Promise<ReconciliationReport> {
  const title = job.title ?? job.name;
  const all = (ids: string[]): IDataset[] => ids.map((id) => datasets.getOrThrow(id));

  switch (job.type) {
    case 'reconcile':
      return engine.run({
        title,
        target: datasets.getOrThrow(job.target),
        sources: all(job.sources),
        scope: job.scope,
        requiredColumns: job.requiredColumns,
        fallbackColumns: job.fallbackColumns,
        profile: job.profile && {
          columns: job.profile.columns,
          window: job.profile.window && toProfileWindow(job.profile.window),
        },
        checkDuplicates: job.checkDuplicates,
        keys: job.keys,
        keyFallback: job.keyFallback,
      });

    case 'schema_drift':
      return engine.run({
        title,
        target: datasets.getOrThrow(job.target),
        sources: all(job.sources),
        scope: 'schema',
        requiredColumns: job.requiredColumns,
        keys: job.keys,
        keyFallback: job.keyFallback,
      });

    case 'compare_versions':
      return engine.compareVersions({
        title,
        oldDataset: datasets.getOrThrow(job.old),
        newDataset: datasets.getOrThrow(job.new),
        keys: job.keys,
        keyFallback: job.keyFallback,
      });

    case 'profile':
      return engine.profile({
        title,
        datasets: all(job.datasets),
        columns: job.columns,
        window: job.window && toProfileWindow(job.window),
      });

    case 'aggregate':
      return engine.aggregate({
        title,
        datasets: all(job.datasets),
        groupColumn: job.groupColumn,
        measureColumn: job.measureColumn,
        stats: job.stats,
        where: job.where,
      });

    case 'duplicates':
      return engine.findDuplicates({
        title,
        datasets: all(job.datasets),
        keys: job.keys,
        keyFallback: job.keyFallback,
      });

    case 'compare_values':
      return engine.compareValues({
        title,
        oldDataset: datasets.getOrThrow(job.old),
        newDataset: datasets.getOrThrow(job.new),
        columns: job.columns,
        maxRows: job.maxRows,
        keys: job.keys,
        keyFallback: job.keyFallback,
      });
  }
}
