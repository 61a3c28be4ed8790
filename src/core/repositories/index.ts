/**
 * Repositories barrel export.
 */
export * from './types.js';
export * from './option-repository.js';
export * from './selection-repository.js';
export * from './tenant-options.js';
export * from './catalog.js';
