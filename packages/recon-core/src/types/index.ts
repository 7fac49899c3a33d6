/**
 * Type exports for recon-core
 */

export * from './keys.js';
export * from './rows.js';
export * from './schema.js';
export * from './profile.js';
export * from './report.js';
export * from './logger.js';
