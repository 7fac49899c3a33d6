/**
 * Reconciliation Engine
 *
 * Orchestrates introspection, key inference, row coverage, schema drift
 * and profiling over a set of datasets, and assembles the findings into
 * one report.
 */

import { randomUUID } from 'node:crypto';
import type { IDataset, SchemaSnapshot } from '@driftcheck/core';
import { ReconError, toReconError } from '../errors/index.js';
import type { FailureStage, ReconErrorCode, ReconFailure } from '../errors/index.js';
import type {
  AggregateRequest,
  ComparisonScope,
  DuplicateRequest,
  IReconciliationEngine,
  KeyOptions,
  ProfileRequest,
  ReconciliationRequest,
  ValueRequest,
  VersionRequest,
} from '../interfaces/index.js';
import { COMPARISON_SCOPES } from '../interfaces/index.js';
import { findDuplicateKeys } from '../keys/duplicate-keys.js';
import { explicitKeys, inferKeys } from '../keys/key-inference.js';
import { aggregateBy } from '../profile/aggregate-by.js';
import { compareProfiles } from '../profile/profile-comparison.js';
import { profile } from '../profile/profiler.js';
import { buildReport } from '../report/report-builder.js';
import { compareVersions, reconcile, reconcileUnion } from '../rows/row-reconciler.js';
import { compareValues } from '../rows/value-comparison.js';
import { checkColumnCoverage, diffSchemas } from '../schema/schema-drift.js';
import { describeWithFallback } from '../schema/schema-introspector.js';
import { consoleLogger } from '../types/index.js';
import type {
  DatasetProfile,
  DatasetSummary,
  EngineLogger,
  KeySet,
  ReconciliationReport,
  ReportFindings,
  RowDiffResult,
  SchemaDriftResult,
} from '../types/index.js';

export interface ReconciliationEngineOptions {
  /** Rows per page when scanning (default: 1000) */
  batchSize?: number;
  /** Missing rows kept as samples (default: 5) */
  sampleLimit?: number;
  logger?: EngineLogger;
}

/** Failures collected while one request runs */
class FailureLog {
  readonly failures: ReconFailure[] = [];

  add(error: unknown, stage: FailureStage, code: ReconErrorCode, dataset?: string): void {
    this.failures.push(toReconError(error, code, dataset !== undefined ? { dataset } : {}).toFailure(stage));
  }

  /**
   * Await a scoped operation, recording its failure instead of throwing
   */
  async capture<T>(stage: FailureStage, operation: () => Promise<T>, dataset?: string): Promise<T | undefined> {
    try {
      return await operation();
    } catch (error) {
      this.add(error, stage, 'QUERY_EXECUTION_FAILURE', dataset);
      return undefined;
    }
  }
}

function summarize(dataset: IDataset, rowCount?: number): DatasetSummary {
  return {
    id: dataset.config.id,
    name: dataset.config.name,
    type: dataset.config.type,
    ...(rowCount !== undefined ? { rowCount } : {}),
  };
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}

export class ReconciliationEngine implements IReconciliationEngine {
  private readonly batchSize?: number;
  private readonly sampleLimit?: number;
  private readonly logger: EngineLogger;

  constructor(options: ReconciliationEngineOptions = {}) {
    this.batchSize = options.batchSize;
    this.sampleLimit = options.sampleLimit;
    this.logger = options.logger ?? consoleLogger;
  }

  async run(request: ReconciliationRequest): Promise<ReconciliationReport> {
    const startTime = Date.now();
    const scope = this.validateRequest(request);
    const { target, sources } = request;
    const log = new FailureLog();

    const fallbackColumns = [...(request.keys ?? []), ...(request.fallbackColumns ?? [])];

    const [targetCount, sourceCounts, introspections] = await Promise.all([
      this.resolveTarget(target),
      Promise.all(sources.map((source) => log.capture('introspection', () => source.countRows(), source.config.name))),
      Promise.all([target, ...sources].map((dataset) => describeWithFallback(dataset, fallbackColumns))),
    ]);

    for (const { failure } of introspections) {
      if (failure) log.failures.push(failure);
    }
    const snapshots = introspections.map(({ snapshot }) => snapshot);
    const schemas = new Map<string, SchemaSnapshot>();
    [target, ...sources].forEach((dataset, index) => {
      const snapshot = snapshots[index];
      if (snapshot) schemas.set(dataset.config.id, snapshot);
    });

    const keys = this.resolveKeys(request, snapshots, log);
    this.logger.debug('Resolved keys', { keys: keys?.columns, origin: keys?.origin, scope });

    const comparison = { schemas, sampleLimit: this.sampleLimit, batchSize: this.batchSize, logger: this.logger };
    const keyColumns = keys ? [...keys.columns] : [];
    const checkRows = keys !== undefined && (scope === 'rows' || scope === 'full');
    const checkUnion = keys !== undefined && (scope === 'union' || (scope === 'full' && sources.length > 1));

    const [rowDiffs, unionCoverage, profiles, duplicates] = await Promise.all([
      checkRows
        ? Promise.all(
            sources.map((source) =>
              log.capture('row_reconciliation', () => reconcile(source, target, keyColumns, comparison), source.config.name)
            )
          )
        : Promise.resolve<(RowDiffResult | undefined)[]>([]),
      checkUnion
        ? log.capture('union_coverage', () => reconcileUnion(sources, target, keyColumns, comparison), target.config.name)
        : Promise.resolve(undefined),
      request.profile ? this.profileAll([target, ...sources], request.profile, log) : Promise.resolve<(DatasetProfile | undefined)[]>([]),
      request.checkDuplicates && keys
        ? log.capture('duplicates', () => findDuplicateKeys(target, keyColumns), target.config.name)
        : Promise.resolve(undefined),
    ]);

    const findings: ReportFindings = {
      id: randomUUID(),
      generatedAt: new Date(),
      processingTimeMs: 0,
      title: request.title ?? 'Reconciliation Report',
      target: summarize(target, targetCount),
      sources: sources.map((source, index) => summarize(source, sourceCounts[index])),
      schemas: snapshots,
      ...(keys ? { keys } : {}),
      requiredColumns: request.requiredColumns ?? [],
      rowDiffs: rowDiffs.filter(isDefined),
      ...(unionCoverage ? { unionCoverage } : {}),
      duplicates: duplicates ? [duplicates] : [],
    };

    if (scope === 'schema' || scope === 'full') {
      const [targetSnapshot, ...sourceSnapshots] = snapshots;
      if (targetSnapshot) {
        Object.assign(findings, this.detectDrift(sourceSnapshots, targetSnapshot, keyColumns));
      }
    }

    const [targetProfile, ...sourceProfiles] = profiles;
    findings.profiles = profiles.filter(isDefined);
    findings.profileShifts = targetProfile
      ? sourceProfiles.filter(isDefined).map((sourceProfile) => compareProfiles(sourceProfile, targetProfile))
      : [];

    findings.failures = log.failures;
    findings.processingTimeMs = Date.now() - startTime;
    return buildReport(findings);
  }

  async compareVersions(request: VersionRequest): Promise<ReconciliationReport> {
    const startTime = Date.now();
    const { oldDataset, newDataset } = request;
    const log = new FailureLog();

    const introspections = await Promise.all(
      [oldDataset, newDataset].map((dataset) => describeWithFallback(dataset, request.keys ?? []))
    );
    for (const { failure } of introspections) {
      if (failure) log.failures.push(failure);
    }
    const snapshots = introspections.map(({ snapshot }) => snapshot);
    const keys = this.resolveKeys(request, snapshots, log);
    const schemas = new Map<string, SchemaSnapshot>();
    const [oldSnapshot, newSnapshot] = snapshots;
    if (oldSnapshot) schemas.set(oldDataset.config.id, oldSnapshot);
    if (newSnapshot) schemas.set(newDataset.config.id, newSnapshot);

    const versionComparison = keys
      ? await log.capture(
          'version_comparison',
          () =>
            compareVersions(oldDataset, newDataset, [...keys.columns], {
              sampleLimit: this.sampleLimit,
              batchSize: this.batchSize,
              logger: this.logger,
              schemas,
            }),
          oldDataset.config.name
        )
      : undefined;

    return buildReport({
      id: randomUUID(),
      generatedAt: new Date(),
      processingTimeMs: Date.now() - startTime,
      title: request.title ?? 'Version Comparison',
      sources: [summarize(oldDataset, versionComparison?.oldRecordCount)],
      target: summarize(newDataset, versionComparison?.newRecordCount),
      schemas: snapshots,
      ...(keys ? { keys } : {}),
      ...(versionComparison ? { versionComparison } : {}),
      failures: log.failures,
    });
  }

  async profile(request: ProfileRequest): Promise<ReconciliationReport> {
    const startTime = Date.now();
    const log = new FailureLog();
    const profiles = await this.profileAll(request.datasets, request, log);
    const [baseline, ...others] = profiles;
    const shifts = baseline ? others.filter(isDefined).map((other) => compareProfiles(baseline, other)) : [];

    return buildReport({
      id: randomUUID(),
      generatedAt: new Date(),
      processingTimeMs: Date.now() - startTime,
      title: request.title ?? 'Profile',
      sources: request.datasets.map((dataset) => summarize(dataset)),
      profiles: profiles.filter(isDefined),
      profileShifts: shifts,
      failures: log.failures,
    });
  }

  async aggregate(request: AggregateRequest): Promise<ReconciliationReport> {
    const startTime = Date.now();
    const log = new FailureLog();

    const aggregates = await Promise.all(
      request.datasets.map((dataset) =>
        log.capture(
          'profiling',
          () =>
            aggregateBy(dataset, request.groupColumn, request.measureColumn, request.stats, {
              ...(request.where ? { where: request.where } : {}),
            }),
          dataset.config.name
        )
      )
    );

    return buildReport({
      id: randomUUID(),
      generatedAt: new Date(),
      processingTimeMs: Date.now() - startTime,
      title: request.title ?? 'Aggregate Comparison',
      sources: request.datasets.map((dataset) => summarize(dataset)),
      aggregates: aggregates.filter(isDefined),
      failures: log.failures,
    });
  }

  async findDuplicates(request: DuplicateRequest): Promise<ReconciliationReport> {
    const startTime = Date.now();
    const log = new FailureLog();

    const introspections = await Promise.all(
      request.datasets.map((dataset) => describeWithFallback(dataset, request.keys ?? []))
    );
    for (const { failure } of introspections) {
      if (failure) log.failures.push(failure);
    }
    const snapshots = introspections.map(({ snapshot }) => snapshot);
    const keys = this.resolveKeys(request, snapshots, log);

    const duplicates = keys
      ? await Promise.all(
          request.datasets.map((dataset) =>
            log.capture('duplicates', () => findDuplicateKeys(dataset, [...keys.columns]), dataset.config.name)
          )
        )
      : [];

    return buildReport({
      id: randomUUID(),
      generatedAt: new Date(),
      processingTimeMs: Date.now() - startTime,
      title: request.title ?? 'Duplicate Keys',
      sources: request.datasets.map((dataset) => summarize(dataset)),
      schemas: snapshots,
      ...(keys ? { keys } : {}),
      duplicates: duplicates.filter(isDefined),
      failures: log.failures,
    });
  }

  async compareValues(request: ValueRequest): Promise<ReconciliationReport> {
    const startTime = Date.now();
    const { oldDataset, newDataset } = request;
    const log = new FailureLog();

    const introspections = await Promise.all(
      [oldDataset, newDataset].map((dataset) => describeWithFallback(dataset, request.keys ?? []))
    );
    for (const { failure } of introspections) {
      if (failure) log.failures.push(failure);
    }
    const snapshots = introspections.map(({ snapshot }) => snapshot);
    const keys = this.resolveKeys(request, snapshots, log);

    const valueComparison = keys
      ? await log.capture(
          'value_comparison',
          () =>
            compareValues(oldDataset, newDataset, [...keys.columns], {
              ...(request.columns ? { columns: request.columns } : {}),
              ...(request.maxRows !== undefined ? { maxRows: request.maxRows } : {}),
              batchSize: this.batchSize,
              logger: this.logger,
            }),
          oldDataset.config.name
        )
      : undefined;

    return buildReport({
      id: randomUUID(),
      generatedAt: new Date(),
      processingTimeMs: Date.now() - startTime,
      title: request.title ?? 'Value Comparison',
      sources: [summarize(oldDataset)],
      target: summarize(newDataset),
      schemas: snapshots,
      ...(keys ? { keys } : {}),
      ...(valueComparison ? { valueComparison } : {}),
      failures: log.failures,
    });
  }

  /**
   * Row count of the target; the only failure that aborts a run
   */
  private async resolveTarget(target: IDataset): Promise<number> {
    try {
      return await target.countRows();
    } catch (error) {
      const cause = toReconError(error, 'QUERY_EXECUTION_FAILURE', { dataset: target.config.name });
      throw new ReconError({
        code: 'TARGET_UNRESOLVED',
        message: `Target ${target.config.name} could not be resolved: ${cause.message}`,
        dataset: target.config.name,
        suggestion: cause.suggestion ?? 'Check that the target exists and is readable',
        cause,
      });
    }
  }

  /**
   * Explicit keys, or keys inferred over every snapshot.
   * Inference failures are recorded and yield no keys.
   */
  private resolveKeys(options: KeyOptions, snapshots: SchemaSnapshot[], log: FailureLog): KeySet | undefined {
    try {
      if (options.keys) {
        return explicitKeys(options.keys);
      }
      return inferKeys(snapshots, options.keyFallback ? { fallback: options.keyFallback } : {});
    } catch (error) {
      log.add(error, 'key_inference', 'NO_COMMON_KEY');
      return undefined;
    }
  }

  private detectDrift(
    sources: SchemaSnapshot[],
    target: SchemaSnapshot,
    keys: string[]
  ): Pick<ReportFindings, 'schemaDrift' | 'columnCoverage'> {
    // fallback snapshots list assumed columns only; diffing them would report phantom removals
    if (target.origin === 'fallback') {
      return {};
    }
    const described = sources.filter((snapshot) => snapshot.origin !== 'fallback');
    const schemaDrift: SchemaDriftResult[] = described.map((before) => ({
      beforeName: before.dataset,
      afterName: target.dataset,
      beforeOrigin: before.origin,
      diff: diffSchemas(before, target),
    }));

    return {
      schemaDrift,
      ...(described.length > 0 ? { columnCoverage: checkColumnCoverage(described, target, keys) } : {}),
    };
  }

  private async profileAll(
    datasets: IDataset[],
    options: Pick<ProfileRequest, 'columns' | 'window'>,
    log: FailureLog
  ): Promise<(DatasetProfile | undefined)[]> {
    return Promise.all(
      datasets.map((dataset) =>
        log.capture(
          'profiling',
          () => profile(dataset, options.columns, options.window ? { window: options.window } : {}),
          dataset.config.name
        )
      )
    );
  }

  private validateRequest(request: ReconciliationRequest): ComparisonScope {
    if (request.sources.length === 0) {
      throw new ReconError({
        code: 'INVALID_OPTIONS',
        message: 'At least one source dataset is required',
        dataset: request.target.config.name,
      });
    }

    const scope = request.scope ?? 'full';
    if (!COMPARISON_SCOPES.includes(scope)) {
      throw new ReconError({
        code: 'INVALID_OPTIONS',
        message: `Unknown comparison scope "${String(scope)}"`,
        suggestion: `Use one of: ${COMPARISON_SCOPES.join(', ')}`,
      });
    }

    return scope;
  }
}
