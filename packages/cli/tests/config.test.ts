import { describe, expect, it } from 'vitest';
import { ConfigError, expandEnvVars, jobDatasetIds, parseConfig } from '../src/config.js';

const minimal = {
  datasets: [{ id: 'orders', type: 'csv', filePath: './orders.csv' }],
  jobs: [{ name: 'orders_profile', type: 'profile', datasets: ['orders'] }],
};

function configText(value: unknown): string {
  return JSON.stringify(value);
}

function configErrorMessage(content: string): string {
  try {
    parseConfig(content, { env: {} });
  } catch (error) {
    if (error instanceof ConfigError) return error.message;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('expandEnvVars', () => {
  it('expands variables and defaults in nested values', () => {
    const expanded = expandEnvVars(
      { host: '${DB_HOST}', list: ['${DB_PORT:-5432}', 'plain'], retries: 3 },
      { env: { DB_HOST: 'db.internal' } }
    );

    expect(expanded).toEqual({ host: 'db.internal', list: ['5432', 'plain'], retries: 3 });
  });

  it('treats an empty variable as unset', () => {
    expect(expandEnvVars('${DB_USER:-reader}', { env: { DB_USER: '' } })).toBe('reader');
  });

  it('fails on a missing variable without a default', () => {
    expect(() => expandEnvVars('${DB_PASSWORD}', { env: {} })).toThrow(
      new ConfigError('Missing required environment variable: DB_PASSWORD')
    );
  });

  it('leaves placeholders when missing variables are allowed', () => {
    expect(expandEnvVars('${DB_PASSWORD}', { env: {}, allowMissing: true })).toBe('${DB_PASSWORD}');
  });
});

describe('parseConfig', () => {
  it('parses a minimal config and defaults connections', () => {
    const config = parseConfig(configText(minimal), { env: {} });

    expect(config.connections).toEqual([]);
    expect(config.datasets[0]).toEqual({ id: 'orders', type: 'csv', filePath: './orders.csv' });
    expect(config.jobs[0]?.type).toBe('profile');
  });

  it('accepts a UTF-8 byte order mark', () => {
    const config = parseConfig(`\uFEFF${configText(minimal)}`, { env: {} });

    expect(config.jobs.map((job) => job.name)).toEqual(['orders_profile']);
  });

  it('expands connection secrets from the environment', () => {
    const config = parseConfig(
      configText({
        ...minimal,
        connections: [{ id: 'wh', type: 'postgresql', host: 'localhost', password: '${PG_PASSWORD:-test-secret}' }],
      }),
      { env: {} }
    );

    expect(config.connections[0]).toEqual({
      id: 'wh',
      type: 'postgresql',
      host: 'localhost',
      password: 'test-secret',
    });
  });

  it('wraps JSON syntax errors', () => {
    expect(configErrorMessage('{ "datasets": [')).toMatch(/^Config file is not valid JSON: /);
  });

  it('reports jobs that name unknown datasets', () => {
    const message = configErrorMessage(
      configText({ ...minimal, jobs: [{ name: 'drift', type: 'schema_drift', target: 'orders', sources: ['legacy'] }] })
    );

    expect(message).toBe('Invalid config file:\n- jobs.0: Unknown dataset: legacy');
  });

  it('reports duplicate dataset ids', () => {
    const message = configErrorMessage(
      configText({ ...minimal, datasets: [...minimal.datasets, { id: 'orders', type: 'json', filePath: './o.json' }] })
    );

    expect(message).toBe('Invalid config file:\n- datasets.1.id: Duplicate dataset id: orders');
  });

  it('reports unknown and mismatched connections', () => {
    const message = configErrorMessage(
      configText({
        connections: [{ id: 'wh', type: 'postgresql', host: 'localhost' }],
        datasets: [
          { id: 'a', type: 'mysql', connection: 'wh', table: 'orders' },
          { id: 'b', type: 'postgresql', connection: 'crm', table: 'orders' },
        ],
        jobs: [{ name: 'versions', type: 'compare_versions', old: 'a', new: 'b' }],
      })
    );

    expect(message).toBe(
      [
        'Invalid config file:',
        '- datasets.0.connection: Connection wh is postgresql, not mysql',
        '- datasets.1.connection: Unknown connection: crm',
      ].join('\n')
    );
  });

  it('rejects unknown properties', () => {
    expect(() =>
      parseConfig(configText({ ...minimal, datasets: [{ ...minimal.datasets[0], primaryKey: 'id' }] }), { env: {} })
    ).toThrow(ConfigError);
  });

  it('accepts relative and absolute profile windows', () => {
    const config = parseConfig(
      configText({
        ...minimal,
        jobs: [
          { name: 'recent', type: 'profile', datasets: ['orders'], window: { column: 'created_at' } },
          { name: 'may', type: 'profile', datasets: ['orders'], window: { column: 'created_at', from: '2024-05-01' } },
        ],
      }),
      { env: {} }
    );

    expect(config.jobs).toHaveLength(2);
  });

  it('rejects windows with unparseable dates', () => {
    expect(() =>
      parseConfig(
        configText({
          ...minimal,
          jobs: [{ name: 'bad', type: 'profile', datasets: ['orders'], window: { column: 'd', from: 'someday' } }],
        }),
        { env: {} }
      )
    ).toThrow(ConfigError);
  });
});

describe('jobDatasetIds', () => {
  it('lists target and sources of reconcile jobs', () => {
    expect(jobDatasetIds({ name: 'r', type: 'reconcile', target: 't', sources: ['a', 'b'] })).toEqual(['t', 'a', 'b']);
  });

  it('lists both sides of a version comparison', () => {
    expect(jobDatasetIds({ name: 'v', type: 'compare_versions', old: 'before', new: 'after' })).toEqual([
      'before',
      'after',
    ]);
  });
});
