/**
 * Model definitions barrel export.
 */
export * from './option-type.js';
export * from './types.js';
export * from './traits.js';
export * from './constraints.js';
export * from './define.js';
export * from './registry.js';
