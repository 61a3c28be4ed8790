/**
 * Database barrel export.
 */
export * from './manager.js';
export * from './schema.js';
export * from './identifiers.js';
export * from './tenants.js';
