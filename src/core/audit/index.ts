/**
 * Configuration auditor barrel export.
 */
export * from './types.js';
export * from './auditor.js';
