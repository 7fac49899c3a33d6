/**
 * Runs the jobs of a config file and turns their statuses into an exit code
 */

import { ReconError, createReconciliationEngine } from '@driftcheck/recon-core';
import type { ReconciliationReport, ReportStatus } from '@driftcheck/recon-core';
import { ConnectorError, errorMessage } from '@driftcheck/core';
import { jobDatasetIds } from './config.js';
import type { ConfigFile, JobEntry } from './config.js';
import { DatasetRegistry } from './dataset-registry.js';
import { runJob } from './jobs.js';
import type { Logger } from './logger.js';
import { renderReport, writeReportFiles } from './report-writer.js';
import type { ReportFormat } from './report-writer.js';

export type FailOn = 'error' | 'warning';

export interface CliArgs {
  configPath?: string;
  /** Job names to run; empty means all */
  jobs: string[];
  format: ReportFormat;
  outputDir?: string;
  failOn: FailOn;
  help: boolean;
}

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = [
  'Usage: driftcheck --config <config.json> [options]',
  '',
  'Options:',
  '  --config <path>       Config file with datasets and jobs',
  '  --job <name>          Run only this job (repeatable)',
  '  --format <text|json>  Report format on stdout (default: text)',
  '  --output-dir <dir>    Also write report.json, report.txt and summary.csv per job',
  '  --fail-on <error|warning>  Lowest status that fails the run (default: error)',
  '  --help                Show this message',
].join('\n');

function optionValue(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${name} requires a value`);
  }
  return value;
}

const KNOWN_OPTIONS = new Set(['--config', '--job', '--format', '--output-dir', '--fail-on', '--help']);
const FLAG_OPTIONS = new Set(['--help']);

export function parseCliArgs(args: string[]): CliArgs {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (!KNOWN_OPTIONS.has(arg)) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
    if (!FLAG_OPTIONS.has(arg)) i++;
  }

  const jobs: string[] = [];
  args.forEach((arg, index) => {
    if (arg !== '--job') return;
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError('--job requires a value');
    }
    jobs.push(value);
  });

  const format = optionValue(args, '--format') ?? 'text';
  if (format !== 'text' && format !== 'json') {
    throw new UsageError(`Unsupported format: ${format}`);
  }

  const failOn = optionValue(args, '--fail-on') ?? 'error';
  if (failOn !== 'error' && failOn !== 'warning') {
    throw new UsageError(`Unsupported --fail-on value: ${failOn}`);
  }

  return {
    configPath: optionValue(args, '--config'),
    jobs,
    format,
    outputDir: optionValue(args, '--output-dir'),
    failOn,
    help: args.includes('--help'),
  };
}

export function exitCodeFor(statuses: ReportStatus[], failOn: FailOn): number {
  if (statuses.includes('ERROR')) return EXIT_FAILED;
  if (failOn === 'warning' && statuses.includes('WARNING')) return EXIT_FAILED;
  return EXIT_OK;
}

export interface JobOutcome {
  name: string;
  status: ReportStatus;
  report?: ReconciliationReport;
  /** Set when the job could not produce a report */
  error?: string;
  outputPath?: string;
}

export interface ExecuteOptions {
  args: Pick<CliArgs, 'jobs' | 'format' | 'outputDir' | 'failOn'>;
  logger: Logger;
  /** Receives the rendered reports (default: stdout) */
  write?: (text: string) => void;
  /** Relative dataset file paths resolve against this directory */
  baseDir?: string;
}

export interface ExecuteResult {
  exitCode: number;
  outcomes: JobOutcome[];
}

function describeFailure(error: unknown): string {
  if (error instanceof ReconError || error instanceof ConnectorError) {
    return error.toActionableMessage();
  }
  return errorMessage(error);
}

export function selectJobs(config: ConfigFile, names: string[]): JobEntry[] {
  if (names.length === 0) return config.jobs;

  const unknown = names.filter((name) => !config.jobs.some((job) => job.name === name));
  if (unknown.length > 0) {
    throw new UsageError(
      `Unknown job: ${unknown.join(', ')} (available: ${config.jobs.map((job) => job.name).join(', ')})`
    );
  }
  return config.jobs.filter((job) => names.includes(job.name));
}

/**
 * Run the selected jobs in order. A job that cannot produce a report is
 * logged and counted as ERROR; the remaining jobs still run.
 */
export async function executeConfig(config: ConfigFile, options: ExecuteOptions): Promise<ExecuteResult> {
  const { args, logger } = options;
  const write = options.write ?? ((text: string) => process.stdout.write(text));
  const jobs = selectJobs(config, args.jobs);

  const registry = new DatasetRegistry({
    logger,
    runtimeDefaults: config.runtime?.datasetDefaults,
    baseDir: options.baseDir,
  });
  for (const entry of config.connections) registry.addConnection(entry);
  for (const entry of config.datasets) registry.addDataset(entry);

  const engine = createReconciliationEngine({
    batchSize: config.engine?.batchSize,
    sampleLimit: config.engine?.sampleLimit,
    logger,
  });

  const outcomes: JobOutcome[] = [];
  try {
    await registry.connect(jobs.flatMap(jobDatasetIds));

    for (const job of jobs) {
      const jobLogger = logger.child({ job: job.name });
      jobLogger.info('Job started', { type: job.type });

      try {
        const report = await runJob(engine, registry, job);
        const outcome: JobOutcome = { name: job.name, status: report.status, report };
        if (args.outputDir) {
          outcome.outputPath = await writeReportFiles(args.outputDir, job.name, report);
        }
        jobLogger.info('Job finished', {
          status: report.status,
          processingTimeMs: report.processingTimeMs,
          failures: report.failures.length,
          outputPath: outcome.outputPath,
        });
        outcomes.push(outcome);
      } catch (error) {
        jobLogger.error('Job failed', { error });
        outcomes.push({ name: job.name, status: 'ERROR', error: describeFailure(error) });
      }
    }
  } finally {
    await registry.disconnectAll();
  }

  write(`${renderOutcomes(outcomes, args.format)}\n`);

  return {
    exitCode: exitCodeFor(
      outcomes.map((outcome) => outcome.status),
      args.failOn
    ),
    outcomes,
  };
}

/**
 * JSON output is one document: `{ jobs: [{ name, status, report | error }] }`
 */
export function renderOutcomes(outcomes: JobOutcome[], format: ReportFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      { jobs: outcomes.map(({ name, status, report, error }) => ({ name, status, report, error })) },
      null,
      2
    );
  }

  return outcomes
    .map((outcome) =>
      outcome.report
        ? renderReport(outcome.report, 'text')
        : `Job ${outcome.name}: ERROR\n${outcome.error ?? 'no report'}`
    )
    .join('\n\n');
}
