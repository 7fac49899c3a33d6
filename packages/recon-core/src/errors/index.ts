/**
 * Error exports for recon-core
 */

export { ReconError, toReconError } from './recon-error.js';
export type { ReconErrorCode, ReconErrorDetails, ReconFailure, FailureStage } from './recon-error.js';
