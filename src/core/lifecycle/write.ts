/**
 * Write boundary: every create, update and delete runs here.
 */
import type Database from 'better-sqlite3';
import { isConstraintViolation, toIntegrityError, transaction } from '../db/manager.js';

/**
 * Run a write in a transaction. Constraint violations raised by the store
 * (unique indexes, check constraints, foreign keys, triggers) surface as
 * IntegrityError; anything else propagates unchanged.
 */
export function runWrite<T>(db: Database.Database, fn: () => T, context?: Record<string, unknown>): T {
  try {
    return transaction(db, fn);
  } catch (error) {
    if (isConstraintViolation(error)) {
      throw toIntegrityError(error, context);
    }
    throw error;
  }
}
