/**
 * Migrations barrel export.
 */
export * from './format.js';
export * from './history.js';
export * from './runner.js';
