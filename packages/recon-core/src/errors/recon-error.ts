/**
 * Engine-level Error Types
 */

import { ConnectorError, errorMessage } from '@driftcheck/core';

export type ReconErrorCode =
  | 'METADATA_UNAVAILABLE'
  | 'NO_COMMON_KEY'
  | 'KEY_COLUMN_NOT_FOUND'
  | 'EMPTY_KEY_SET'
  | 'QUERY_EXECUTION_FAILURE'
  | 'TARGET_UNRESOLVED'
  | 'INVALID_OPTIONS';

/** Step of a run a failure belongs to */
export type FailureStage =
  | 'introspection'
  | 'key_inference'
  | 'row_reconciliation'
  | 'union_coverage'
  | 'version_comparison'
  | 'schema_drift'
  | 'profiling'
  | 'duplicates'
  | 'value_comparison';

/**
 * A failure scoped to one dataset, column or comparison,
 * recorded in the report instead of aborting the run
 */
export interface ReconFailure {
  code: ReconErrorCode;
  message: string;
  stage: FailureStage;
  dataset?: string;
  column?: string;
  keys?: string[];
}

export interface ReconErrorDetails {
  code: ReconErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  /** Dataset name the failure concerns */
  dataset?: string;
  column?: string;
  keys?: string[];
  context?: Record<string, unknown>;
}

export class ReconError extends Error {
  readonly code: ReconErrorCode;
  readonly suggestion?: string;
  readonly dataset?: string;
  readonly column?: string;
  readonly keys?: string[];
  readonly context?: Record<string, unknown>;

  constructor(details: ReconErrorDetails) {
    super(details.message);
    this.name = 'ReconError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.dataset = details.dataset;
    this.column = details.column;
    this.keys = details.keys;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for build logs
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
    if (this.dataset) {
      parts.push(`Dataset: ${this.dataset}`);
    }
    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }
    return parts.join('\n');
  }

  toFailure(stage: FailureStage): ReconFailure {
    const failure: ReconFailure = { code: this.code, message: this.message, stage };
    if (this.dataset !== undefined) failure.dataset = this.dataset;
    if (this.column !== undefined) failure.column = this.column;
    if (this.keys !== undefined) failure.keys = [...this.keys];
    return failure;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      dataset: this.dataset,
      column: this.column,
      keys: this.keys,
      context: this.context,
    };
  }
}

/**
 * Wrap a thrown value as a ReconError.
 * Connector schema mismatches (unknown columns) become KEY_COLUMN_NOT_FOUND
 * when keys are involved; everything else takes the given code.
 */
export function toReconError(
  error: unknown,
  code: ReconErrorCode,
  scope: Pick<ReconErrorDetails, 'dataset' | 'column' | 'keys'> = {}
): ReconError {
  if (error instanceof ReconError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const resolvedCode =
    error instanceof ConnectorError && error.code === 'SCHEMA_MISMATCH' && scope.keys
      ? 'KEY_COLUMN_NOT_FOUND'
      : code;

  return new ReconError({
    code: resolvedCode,
    message: errorMessage(error),
    suggestion: error instanceof ConnectorError ? error.suggestion : undefined,
    cause,
    ...scope,
  });
}
