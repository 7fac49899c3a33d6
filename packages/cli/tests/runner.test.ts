import { afterEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseConfig } from '../src/config.js';
import type { ConfigFile } from '../src/config.js';
import { Logger } from '../src/logger.js';
import {
  EXIT_FAILED,
  EXIT_OK,
  UsageError,
  executeConfig,
  exitCodeFor,
  parseCliArgs,
  selectJobs,
} from '../src/runner.js';
import type { CliArgs } from '../src/runner.js';

let tmpDir = '';

afterEach(() => {
  if (tmpDir) {
    rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = '';
  }
});

function workspace(files: Record<string, string>): string {
  tmpDir = mkdtempSync(join(tmpdir(), 'driftcheck-run-'));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(tmpDir, name), content, 'utf-8');
  }
  return tmpDir;
}

function ordersConfig(jobs: unknown[]): ConfigFile {
  return parseConfig(
    JSON.stringify({
      datasets: [
        { id: 'orders', type: 'csv', filePath: 'orders.csv' },
        { id: 'legacy', type: 'csv', filePath: 'legacy.csv' },
        { id: 'gone', type: 'csv', filePath: 'gone.csv' },
      ],
      jobs,
    }),
    { env: {} }
  );
}

const reconcileJob = { name: 'nightly', type: 'reconcile', target: 'orders', sources: ['legacy'] };

const files = {
  'orders.csv': 'id,label\n1,one\n2,two\n',
  'legacy.csv': 'id,label\n1,one\n2,two\n3,three\n',
};

function run(config: ConfigFile, args: Partial<CliArgs> = {}) {
  const output: string[] = [];
  const logLines: string[] = [];
  const result = executeConfig(config, {
    args: { jobs: [], format: 'text', failOn: 'error', ...args },
    logger: new Logger({ write: (line) => logLines.push(line) }),
    write: (text) => output.push(text),
    baseDir: tmpDir,
  });
  return { result, output, logLines };
}

describe('parseCliArgs', () => {
  it('reads options and repeated jobs', () => {
    expect(
      parseCliArgs([
        '--config',
        'driftcheck.config.json',
        '--job',
        'nightly',
        '--job',
        'versions',
        '--format',
        'json',
        '--output-dir',
        'reports',
        '--fail-on',
        'warning',
      ])
    ).toEqual({
      configPath: 'driftcheck.config.json',
      jobs: ['nightly', 'versions'],
      format: 'json',
      outputDir: 'reports',
      failOn: 'warning',
      help: false,
    });
  });

  it('applies defaults', () => {
    expect(parseCliArgs(['--config', 'c.json'])).toEqual({
      configPath: 'c.json',
      jobs: [],
      format: 'text',
      outputDir: undefined,
      failOn: 'error',
      help: false,
    });
  });

  it('rejects unknown arguments and bad values', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(new UsageError('Unknown argument: --verbose'));
    expect(() => parseCliArgs(['--format', 'xml'])).toThrow(new UsageError('Unsupported format: xml'));
    expect(() => parseCliArgs(['--config'])).toThrow(new UsageError('--config requires a value'));
    expect(() => parseCliArgs(['--job', '--format', 'json'])).toThrow(new UsageError('--job requires a value'));
  });
});

describe('exitCodeFor', () => {
  it('fails on errors', () => {
    expect(exitCodeFor(['OK', 'ERROR'], 'error')).toBe(EXIT_FAILED);
  });

  it('fails on warnings only when asked to', () => {
    expect(exitCodeFor(['OK', 'WARNING'], 'error')).toBe(EXIT_OK);
    expect(exitCodeFor(['OK', 'WARNING'], 'warning')).toBe(EXIT_FAILED);
  });

  it('passes an all-OK run', () => {
    expect(exitCodeFor(['OK', 'OK'], 'warning')).toBe(EXIT_OK);
  });
});

describe('selectJobs', () => {
  const config = ordersConfig([reconcileJob, { name: 'dups', type: 'duplicates', datasets: ['orders'] }]);

  it('runs every job by default', () => {
    expect(selectJobs(config, []).map((job) => job.name)).toEqual(['nightly', 'dups']);
  });

  it('keeps config order for a selection', () => {
    expect(selectJobs(config, ['dups']).map((job) => job.name)).toEqual(['dups']);
  });

  it('rejects unknown job names', () => {
    expect(() => selectJobs(config, ['weekly'])).toThrow(
      new UsageError('Unknown job: weekly (available: nightly, dups)')
    );
  });
});

describe('executeConfig', () => {
  it('reconciles file datasets and prints the text report', async () => {
    workspace(files);
    const { result, output } = run(ordersConfig([reconcileJob]));

    const { exitCode, outcomes } = await result;

    expect(exitCode).toBe(EXIT_OK);
    expect(outcomes.map(({ name, status }) => ({ name, status }))).toEqual([{ name: 'nightly', status: 'WARNING' }]);
    expect(outcomes[0]?.report?.reasons).toEqual([
      { severity: 'warning', message: '1 row(s) of legacy missing from orders' },
    ]);
    const lines = output.join('').split('\n');
    expect(lines[0]).toBe('=== nightly ===');
    expect(lines[1]).toBe('Status: WARNING');
    expect(lines).toContain('legacy -> orders: 1 of 3 rows missing [scan]');
  });

  it('fails the run on warnings with failOn warning', async () => {
    workspace(files);
    const { result } = run(ordersConfig([reconcileJob]), { failOn: 'warning' });

    expect((await result).exitCode).toBe(EXIT_FAILED);
  });

  it('prints one JSON document for all jobs', async () => {
    workspace(files);
    const { result, output } = run(
      ordersConfig([reconcileJob, { name: 'dups', type: 'duplicates', datasets: ['legacy'] }]),
      { format: 'json' }
    );

    await result;

    const parsed: unknown = JSON.parse(output.join(''));
    expect(parsed).toMatchObject({
      jobs: [
        { name: 'nightly', status: 'WARNING', report: { title: 'nightly' } },
        { name: 'dups', status: 'OK', report: { title: 'dups' } },
      ],
    });
  });

  it('records a job whose target cannot be read and keeps going', async () => {
    workspace(files);
    const { result, logLines } = run(
      ordersConfig([
        { name: 'broken', type: 'reconcile', target: 'gone', sources: ['legacy'] },
        { name: 'dups', type: 'duplicates', datasets: ['orders'] },
      ])
    );

    const { exitCode, outcomes } = await result;

    expect(exitCode).toBe(EXIT_FAILED);
    expect(outcomes.map(({ name, status }) => ({ name, status }))).toEqual([
      { name: 'broken', status: 'ERROR' },
      { name: 'dups', status: 'OK' },
    ]);
    expect(outcomes[0]?.error).toMatch(/^Error \[TARGET_UNRESOLVED\]: Target gone could not be resolved: /);
    expect(logLines.some((line) => line.includes('ERROR Job failed job=broken'))).toBe(true);
  });

  it('writes report files per job when an output directory is set', async () => {
    const dir = workspace(files);
    const { result } = run(ordersConfig([reconcileJob]), { outputDir: join(dir, 'reports') });

    const { outcomes } = await result;

    const outputPath = outcomes[0]?.outputPath ?? '';
    expect(outputPath.startsWith(join(dir, 'reports', 'nightly_'))).toBe(true);
    expect(readdirSync(outputPath).sort()).toEqual(['report.json', 'report.txt', 'summary.csv']);
  });
});
