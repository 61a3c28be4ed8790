/**
 * Tenant options catalog.
 * Main library exports barrel file.
 */

// Models and registry
export * from './core/models/index.js';

// Storage
export * from './core/db/index.js';

// Queries, lifecycle and repositories
export * from './core/query/index.js';
export * from './core/lifecycle/index.js';
export * from './core/repositories/index.js';

// Migrations and triggers
export * from './core/migrations/index.js';
export * from './core/triggers/index.js';

// Configuration audit
export * from './core/audit/index.js';

// Configuration
export {
  ConfigSchema,
  DEFAULT_CONFIG_PATH,
  buildRegistry,
  getConfigPath,
  getDefaultConfig,
  loadConfig,
  type Config,
  type OptionModelConfig,
  type SelectionModelConfig,
} from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
