/**
 * Lifecycle barrel export.
 */
export * from './state.js';
export * from './result.js';
export * from './validation.js';
export * from './write.js';
