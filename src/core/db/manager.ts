/**
 * Database manager for the options catalog SQLite store.
 * Provides per-path connection caching and transaction support.
 */

import Database from 'better-sqlite3';
import { dirname, resolve } from 'node:path';
import { mkdirSync } from 'node:fs';
import { IntegrityError } from '../../utils/errors.js';

/** SQLite cache size in KB (negative means KB, positive means pages) */
const CACHE_SIZE_KB = -16000; // 16MB

const MEMORY = ':memory:';

/** Database connections by resolved path */
const connections = new Map<string, Database.Database>();

/**
 * Resolve the configured database path against the project root.
 */
export function getDbPath(projectRoot: string, configuredPath: string): string {
  return configuredPath === MEMORY ? MEMORY : resolve(projectRoot, configuredPath);
}

/**
 * Open (or reuse) a connection. In-memory databases are never cached since
 * each handle is its own database.
 */
export function openDb(dbPath: string): Database.Database {
  if (dbPath !== MEMORY) {
    const existing = connections.get(dbPath);
    if (existing) {
      return existing;
    }
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('foreign_keys = ON');

  if (dbPath !== MEMORY) {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.pragma(`cache_size = ${CACHE_SIZE_KB}`);
    connections.set(dbPath, db);
  }

  return db;
}

/**
 * Close the cached connection for a path.
 */
export function closeDb(dbPath: string): void {
  const db = connections.get(dbPath);
  if (db) {
    db.close();
    connections.delete(dbPath);
  }
}

/**
 * Close all cached connections.
 */
export function closeAllDbs(): void {
  for (const [dbPath, db] of connections) {
    db.close();
    connections.delete(dbPath);
  }
}

/**
 * Run a function within a database transaction.
 * Commits on success, rolls back on error. Nested calls use savepoints.
 */
export function transaction<T>(db: Database.Database, fn: () => T): T {
  return db.transaction(fn)();
}

/**
 * Whether an error is a constraint violation raised by SQLite (unique index,
 * check constraint, foreign key, NOT NULL, or a trigger's RAISE).
 */
export function isConstraintViolation(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_CONSTRAINT')
  );
}

/**
 * Convert a SQLite constraint violation into an IntegrityError.
 */
export function toIntegrityError(error: Error & { code: string }, context?: Record<string, unknown>): IntegrityError {
  return new IntegrityError(error.message, { sqliteCode: error.code, ...context });
}
