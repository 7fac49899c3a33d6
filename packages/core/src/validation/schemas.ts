/**
 * Zod schemas for validating dataset inputs
 */

import { z } from 'zod';
import { FILTER_OPERATORS } from '../types/index.js';
import type { FilterOperator } from '../types/index.js';

/** Filter operator enum */
export const filterOperatorSchema = z.custom<FilterOperator>(
  (value) => typeof value === 'string' && FILTER_OPERATORS.some((op) => op === value),
  { message: `Expected one of: ${FILTER_OPERATORS.join(', ')}` }
);

/** Single filter condition */
export const filterConditionSchema = z.object({
  field: z.string().min(1),
  op: filterOperatorSchema,
  value: z.unknown().optional(),
});

/** Sort order */
export const orderBySchema = z.object({
  field: z.string().min(1),
  direction: z.enum(['asc', 'desc']),
});

/** Complete filter options */
export const filterOptionsSchema = z.object({
  where: z.array(filterConditionSchema).optional(),
  select: z.array(z.string()).optional(),
  orderBy: z.array(orderBySchema).optional(),
  offset: z.number().int().min(0).optional(),
  limit: z.number().int().min(1).max(100000).optional(),
});

export const aggregateFunctionSchema = z.enum([
  'count',
  'count_non_null',
  'count_distinct',
  'sum',
  'avg',
  'min',
  'max',
  'median',
  'stddev',
  'min_length',
  'max_length',
  'avg_length',
  'span_days',
]);

/** Aliases end up as SQL identifiers, so keep them simple */
export const aliasSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]{0,62}$/, 'Alias must be a plain identifier');

export const aggregateMeasureSchema = z
  .object({
    fn: aggregateFunctionSchema,
    column: z.string().min(1).optional(),
    alias: aliasSchema,
  })
  .refine((measure) => measure.fn === 'count' || measure.column !== undefined, {
    message: 'Every aggregate except count requires a column',
    path: ['column'],
  });

export const havingConditionSchema = z.object({
  alias: aliasSchema,
  op: z.enum(['gt', 'gte', 'lt', 'lte', 'eq']),
  value: z.number(),
});

export const aggregateQuerySchema = z
  .object({
    measures: z.array(aggregateMeasureSchema).min(1),
    groupBy: z.array(z.string().min(1)).optional(),
    where: z.array(filterConditionSchema).optional(),
    having: z.array(havingConditionSchema).optional(),
  })
  .superRefine((query, ctx) => {
    const aliases = new Set<string>();
    for (const measure of query.measures) {
      if (aliases.has(measure.alias)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate alias "${measure.alias}"`, path: ['measures'] });
      }
      aliases.add(measure.alias);
    }
    for (const condition of query.having ?? []) {
      if (!aliases.has(condition.alias)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Having references unknown alias "${condition.alias}"`,
          path: ['having'],
        });
      }
    }
  });

/** Column descriptor as captured in a schema snapshot */
export const columnDescriptorSchema = z.object({
  name: z.string().min(1),
  declaredType: z.string(),
  nullable: z.boolean(),
  ordinalPosition: z.number().int().min(1),
  maxLength: z.number().int().nullable().optional(),
});

/** Schema snapshot, e.g. a baseline stored on disk */
export const schemaSnapshotSchema = z.object({
  dataset: z.string().min(1),
  columns: z.array(columnDescriptorSchema),
  capturedAt: z.coerce.date(),
  origin: z.enum(['catalog', 'inferred', 'fallback']),
  dialect: z.string().optional(),
});

export type FilterConditionInput = z.infer<typeof filterConditionSchema>;
export type FilterOptionsInput = z.infer<typeof filterOptionsSchema>;
export type AggregateQueryInput = z.infer<typeof aggregateQuerySchema>;
export type SchemaSnapshotInput = z.infer<typeof schemaSnapshotSchema>;
