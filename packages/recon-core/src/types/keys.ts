/**
 * Join key types
 */

export type KeyOrigin = 'explicit' | 'inferred';

/**
 * How inferred keys were chosen:
 * - pattern: columns whose names contain id/key/pk/primary_key
 * - first_common: the first common column
 * - all_common: every common column as a composite key
 */
export type KeyStrategy = 'pattern' | 'first_common' | 'all_common';

/** Fallback used when no common column matches a key pattern */
export type KeyFallback = 'first_common' | 'all_common';

export interface KeySet {
  columns: [string, ...string[]];
  origin: KeyOrigin;
  strategy?: KeyStrategy;
}

export interface KeyInferenceOptions {
  /** Default: first_common */
  fallback?: KeyFallback;
}
