/**
 * Shared setup for commands that work on the catalog database.
 */
import type Database from 'better-sqlite3';
import * as path from 'node:path';
import { buildRegistry, loadConfig, type Config } from '../core/config/index.js';
import { closeDb, getDbPath, initializeSchema, openDb } from '../core/db/index.js';
import type { ModelRegistry } from '../core/models/index.js';
import { OptionsCatalog } from '../core/repositories/index.js';
import { logger } from '../utils/logger.js';

export interface CommandContext {
  projectRoot: string;
  config: Config;
  registry: ModelRegistry;
  db: Database.Database;
  catalog: OptionsCatalog;
  /** Migration root: the override when given, else the configured one */
  migrationDir(override?: string): string;
  close(): void;
}

/**
 * Load config, build the registry and open the database with every model's
 * tables in place. Callers must `close()` the context.
 */
export async function openCommandContext(configPath: string, projectRoot = process.cwd()): Promise<CommandContext> {
  const config = await loadConfig(projectRoot, configPath);
  logger.setLevel(config.log_level);

  const registry = buildRegistry(config);
  const dbPath = getDbPath(projectRoot, config.database.path);
  const db = openDb(dbPath);
  initializeSchema(db, registry);

  return {
    projectRoot,
    config,
    registry,
    db,
    catalog: new OptionsCatalog(db, registry),
    migrationDir: (override) => path.resolve(projectRoot, override ?? config.migrations.dir),
    close: () => {
      if (dbPath === ':memory:') {
        db.close();
      } else {
        closeDb(dbPath);
      }
    },
  };
}
