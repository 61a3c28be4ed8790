/**
 * Query layer barrel export.
 */
export * from './base-query.js';
export * from './option-query.js';
export * from './selection-query.js';
export * from './rows.js';
