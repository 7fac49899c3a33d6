/**
 * Interface exports for recon-core
 */

export { COMPARISON_SCOPES } from './reconciliation-engine.js';
export type {
  AggregateRequest,
  ComparisonScope,
  DuplicateRequest,
  IReconciliationEngine,
  KeyOptions,
  ProfileRequest,
  ReconciliationRequest,
  ValueRequest,
  VersionRequest,
} from './reconciliation-engine.js';
