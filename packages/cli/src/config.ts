import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { filterConditionSchema } from '@driftcheck/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const sslSchema = z.union([z.boolean(), z.object({ rejectUnauthorized: z.boolean().optional() }).strict()]);

const postgresConnection = z
  .object({
    id: z.string().min(1),
    type: z.literal('postgresql'),
    connectionString: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    database: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    ssl: sslSchema.optional(),
    max: z.number().int().min(1).max(100).optional(),
    statementTimeoutMs: z.number().int().min(1).max(3_600_000).optional(),
    connectionTimeoutMs: z.number().int().min(1).max(300_000).optional(),
  })
  .strict();

const mysqlConnection = z
  .object({
    id: z.string().min(1),
    type: z.literal('mysql'),
    uri: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    database: z.string().min(1).optional(),
    user: z.string().min(1).optional(),
    password: z.string().min(1).optional(),
    ssl: sslSchema.optional(),
    connectionLimit: z.number().int().min(1).max(100).optional(),
    queryTimeoutMs: z.number().int().min(1).max(3_600_000).optional(),
    connectionTimeoutMs: z.number().int().min(1).max(300_000).optional(),
  })
  .strict();

export const connectionEntrySchema = z.discriminatedUnion('type', [postgresConnection, mysqlConnection]);

export type ConnectionEntry = z.infer<typeof connectionEntrySchema>;

const retrySchema = z
  .object({
    attempts: z.number().int().min(1).max(10).optional(),
    baseDelayMs: z.number().int().min(0).max(60_000).optional(),
    maxDelayMs: z.number().int().min(0).max(300_000).optional(),
    jitter: z.number().min(0).max(1).optional(),
  })
  .strict();

export const runtimeSchema = z
  .object({
    maxConcurrency: z.number().int().min(1).max(100).optional(),
    timeoutMs: z.number().int().min(1).max(3_600_000).optional(),
    retries: retrySchema.optional(),
  })
  .strict();

export type RuntimeConfig = z.infer<typeof runtimeSchema>;

const datasetBase = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  runtime: runtimeSchema.optional(),
});

const encodingSchema = z.enum(['utf8', 'utf-8', 'latin1', 'ascii', 'utf16le']);

const csvDataset = datasetBase
  .extend({
    type: z.literal('csv'),
    filePath: z.string().min(1),
    encoding: encodingSchema.optional(),
    delimiter: z.string().min(1).optional(),
    headers: z.boolean().optional(),
    quote: z.string().min(1).optional(),
    skipEmptyLines: z.boolean().optional(),
    nullValues: z.array(z.string()).optional(),
  })
  .strict();

const jsonDataset = datasetBase
  .extend({
    type: z.literal('json'),
    filePath: z.string().min(1),
    encoding: encodingSchema.optional(),
    recordsPath: z.string().min(1).optional(),
  })
  .strict();

const excelDataset = datasetBase
  .extend({
    type: z.literal('excel'),
    filePath: z.string().min(1),
    sheet: z.union([z.string().min(1), z.number().int().min(1)]).optional(),
    headers: z.boolean().optional(),
    startRow: z.number().int().min(1).optional(),
    startColumn: z.number().int().min(1).optional(),
  })
  .strict();

const sqlDatasetFields = {
  /** Id of an entry under connections */
  connection: z.string().min(1),
  table: z.string().min(1),
  schema: z.string().min(1).optional(),
};

const postgresDataset = datasetBase.extend({ type: z.literal('postgresql'), ...sqlDatasetFields }).strict();
const mysqlDataset = datasetBase.extend({ type: z.literal('mysql'), ...sqlDatasetFields }).strict();

export const datasetEntrySchema = z.discriminatedUnion('type', [
  csvDataset,
  jsonDataset,
  excelDataset,
  postgresDataset,
  mysqlDataset,
]);

export type DatasetEntry = z.infer<typeof datasetEntrySchema>;

const columnSpecSchema = z
  .object({
    name: z.string().min(1),
    category: z.enum(['numeric', 'string', 'temporal', 'other']),
  })
  .strict();

const dateSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'Expected an ISO-8601 date');

const absoluteWindowSchema = z
  .object({
    column: z.string().min(1),
    from: dateSchema.optional(),
    to: dateSchema.optional(),
  })
  .strict()
  .refine((value) => value.from !== undefined || value.to !== undefined, 'Set from, to, or both');

const relativeWindowSchema = z
  .object({
    column: z.string().min(1),
    lookbackDays: z.number().min(0).optional(),
    forwardDays: z.number().min(0).optional(),
  })
  .strict();

const windowSchema = z.union([absoluteWindowSchema, relativeWindowSchema]);

export type AbsoluteWindowEntry = z.infer<typeof absoluteWindowSchema>;
export type WindowEntry = z.infer<typeof windowSchema>;

const keyFields = {
  keys: z.array(z.string().min(1)).min(1).optional(),
  keyFallback: z.enum(['first_common', 'all_common']).optional(),
};

const jobBase = z.object({
  name: z.string().regex(/^[A-Za-z0-9_-]+$/, 'Job names may contain letters, digits, _ and -'),
  title: z.string().min(1).optional(),
});

const reconcileJob = jobBase
  .extend({
    type: z.literal('reconcile'),
    target: z.string().min(1),
    sources: z.array(z.string().min(1)).min(1),
    scope: z.enum(['rows', 'union', 'schema', 'full']).optional(),
    requiredColumns: z.array(z.string().min(1)).optional(),
    fallbackColumns: z.array(z.string().min(1)).optional(),
    profile: z
      .object({ columns: z.array(columnSpecSchema).optional(), window: windowSchema.optional() })
      .strict()
      .optional(),
    checkDuplicates: z.boolean().optional(),
    ...keyFields,
  })
  .strict();

const schemaDriftJob = jobBase
  .extend({
    type: z.literal('schema_drift'),
    target: z.string().min(1),
    sources: z.array(z.string().min(1)).min(1),
    requiredColumns: z.array(z.string().min(1)).optional(),
    ...keyFields,
  })
  .strict();

const compareVersionsJob = jobBase
  .extend({
    type: z.literal('compare_versions'),
    old: z.string().min(1),
    new: z.string().min(1),
    ...keyFields,
  })
  .strict();

const profileJob = jobBase
  .extend({
    type: z.literal('profile'),
    datasets: z.array(z.string().min(1)).min(1),
    columns: z.array(columnSpecSchema).optional(),
    window: windowSchema.optional(),
  })
  .strict();

const aggregateJob = jobBase
  .extend({
    type: z.literal('aggregate'),
    datasets: z.array(z.string().min(1)).min(1),
    groupColumn: z.string().min(1),
    measureColumn: z.string().min(1),
    stats: z
      .array(z.enum(['count', 'sum', 'avg', 'min', 'max', 'stddev', 'median', 'count_distinct']))
      .min(1),
    where: z.array(filterConditionSchema).optional(),
  })
  .strict();

const duplicatesJob = jobBase
  .extend({
    type: z.literal('duplicates'),
    datasets: z.array(z.string().min(1)).min(1),
    ...keyFields,
  })
  .strict();

const compareValuesJob = jobBase
  .extend({
    type: z.literal('compare_values'),
    old: z.string().min(1),
    new: z.string().min(1),
    columns: z.array(z.string().min(1)).optional(),
    maxRows: z.number().int().min(1).max(1_000_000).optional(),
    ...keyFields,
  })
  .strict();

export const jobEntrySchema = z.discriminatedUnion('type', [
  reconcileJob,
  schemaDriftJob,
  compareVersionsJob,
  profileJob,
  aggregateJob,
  duplicatesJob,
  compareValuesJob,
]);

export type JobEntry = z.infer<typeof jobEntrySchema>;

/** Dataset ids a job reads */
export function jobDatasetIds(job: JobEntry): string[] {
  switch (job.type) {
    case 'reconcile':
    case 'schema_drift':
      return [job.target, ...job.sources];
    case 'compare_versions':
    case 'compare_values':
      return [job.old, job.new];
    case 'profile':
    case 'aggregate':
    case 'duplicates':
      return job.datasets;
  }
}

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
    engine: z
      .object({
        batchSize: z.number().int().min(1).max(100_000).optional(),
        sampleLimit: z.number().int().min(0).max(1000).optional(),
      })
      .strict()
      .optional(),
    runtime: z.object({ datasetDefaults: runtimeSchema.optional() }).strict().optional(),
    connections: z.array(connectionEntrySchema).default([]),
    datasets: z.array(datasetEntrySchema).min(1),
    jobs: z.array(jobEntrySchema).min(1),
  })
  .strict()
  .superRefine((value, ctx) => {
    const connections = new Map<string, ConnectionEntry['type']>();
    value.connections.forEach((entry, i) => {
      if (connections.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate connection id: ${entry.id}`,
          path: ['connections', i, 'id'],
        });
      }
      connections.set(entry.id, entry.type);
    });

    const datasets = new Set<string>();
    value.datasets.forEach((entry, i) => {
      if (datasets.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate dataset id: ${entry.id}`,
          path: ['datasets', i, 'id'],
        });
      }
      datasets.add(entry.id);

      if (entry.type === 'postgresql' || entry.type === 'mysql') {
        const connectionType = connections.get(entry.connection);
        if (connectionType === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown connection: ${entry.connection}`,
            path: ['datasets', i, 'connection'],
          });
        } else if (connectionType !== entry.type) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Connection ${entry.connection} is ${connectionType}, not ${entry.type}`,
            path: ['datasets', i, 'connection'],
          });
        }
      }
    });

    const jobs = new Set<string>();
    value.jobs.forEach((job, i) => {
      if (jobs.has(job.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate job name: ${job.name}`,
          path: ['jobs', i, 'name'],
        });
      }
      jobs.add(job.name);

      for (const id of jobDatasetIds(job)) {
        if (!datasets.has(id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown dataset: ${id}`,
            path: ['jobs', i],
          });
        }
      }
    });
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError, label = 'Invalid config file'): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Parse, expand and validate configuration text
 * @throws ConfigError
 */
export function parseConfig(content: string, options?: EnvExpansionOptions): ConfigFile {
  // UTF-8 BOM (common on Windows) breaks JSON.parse
  const sanitized = content.replace(/^\uFEFF/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(content);
}
