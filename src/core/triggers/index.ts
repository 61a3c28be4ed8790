/**
 * Trigger generation barrel export.
 */
export * from './types.js';
export * from './vendors.js';
export * from './naming.js';
export * from './sql.js';
export * from './targets.js';
export * from './generator.js';
export * from './remover.js';
