/**
 * Tests for the write boundary.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runWrite } from '../../../../src/core/lifecycle/write.js';
import { IntegrityError } from '../../../../src/utils/errors.js';

describe('runWrite', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
    db.exec('CREATE TABLE item (id INTEGER PRIMARY KEY, code TEXT UNIQUE)');
  });

  afterEach(() => {
    db.close();
  });

  it('should return the result of the write', () => {
    const id = runWrite(db, () => Number(db.prepare("INSERT INTO item (code) VALUES ('a')").run().lastInsertRowid));
    expect(id).toBe(1);
  });

  it('should turn constraint violations into IntegrityError and roll back', () => {
    db.prepare("INSERT INTO item (code) VALUES ('a')").run();

    try {
      runWrite(
        db,
        () => {
          db.prepare("INSERT INTO item (code) VALUES ('b')").run();
          db.prepare("INSERT INTO item (code) VALUES ('a')").run();
        },
        { model: 'tasks.Item' }
      );
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IntegrityError);
      if (error instanceof IntegrityError) {
        expect(error.code).toBe('D001');
        expect(error.details).toEqual({ sqliteCode: 'SQLITE_CONSTRAINT_UNIQUE', model: 'tasks.Item' });
      }
    }
    expect(db.prepare('SELECT code FROM item ORDER BY id').all()).toEqual([{ code: 'a' }]);
  });

  it('should pass other errors through unchanged', () => {
    const failure = new Error('not a constraint');
    expect(() =>
      runWrite(db, () => {
        throw failure;
      })
    ).toThrow(failure);
  });
});
