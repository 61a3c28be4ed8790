/**
 * Tests for connection management, identifiers and tenant labels.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import Database from 'better-sqlite3';
import {
  closeAllDbs,
  closeDb,
  getDbPath,
  isConstraintViolation,
  openDb,
  transaction,
} from '../../../../src/core/db/manager.js';
import { isSafeIdentifier, quoteIdentifier } from '../../../../src/core/db/identifiers.js';
import { tenantLabel } from '../../../../src/core/db/tenants.js';
import { TriggerGenerationError } from '../../../../src/utils/errors.js';

describe('db manager', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'options-db-'));
  });

  afterEach(async () => {
    closeAllDbs();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should resolve configured paths against the project root', () => {
    expect(getDbPath('/project', ':memory:')).toBe(':memory:');
    expect(getDbPath('/project', '.options/options.db')).toBe(resolve('/project', '.options/options.db'));
  });

  it('should cache file connections and create parent directories', () => {
    const dbPath = join(testDir, 'nested', 'options.db');
    const db = openDb(dbPath);

    expect(openDb(dbPath)).toBe(db);
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);

    closeDb(dbPath);
    expect(db.open).toBe(false);
    expect(openDb(dbPath)).not.toBe(db);
  });

  it('should hand out a new in-memory database each time', () => {
    const a = openDb(':memory:');
    const b = openDb(':memory:');

    expect(a).not.toBe(b);
    a.close();
    b.close();
  });

  it('should roll back a failed transaction', () => {
    const db = new Database(':memory:');
    db.exec('CREATE TABLE item (id INTEGER PRIMARY KEY)');

    expect(() =>
      transaction(db, () => {
        db.prepare('INSERT INTO item (id) VALUES (1)').run();
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(db.prepare('SELECT COUNT(*) AS count FROM item').get()).toEqual({ count: 0 });
    db.close();
  });

  it('should recognise constraint violations', () => {
    const violation = Object.assign(new Error('UNIQUE constraint failed'), { code: 'SQLITE_CONSTRAINT_UNIQUE' });

    expect(isConstraintViolation(violation)).toBe(true);
    expect(isConstraintViolation(Object.assign(new Error('busy'), { code: 'SQLITE_BUSY' }))).toBe(false);
    expect(isConstraintViolation(new Error('plain'))).toBe(false);
  });
});

describe('identifiers', () => {
  it('should quote each part of a qualified name', () => {
    expect(quoteIdentifier('public.tenant')).toBe('"public"."tenant"');
    expect(quoteIdentifier('tenant', '`')).toBe('`tenant`');
  });

  it('should refuse unsafe identifiers', () => {
    expect(isSafeIdentifier('tenant; DROP TABLE x')).toBe(false);
    expect(() => quoteIdentifier('a-b')).toThrow(TriggerGenerationError);
  });
});

describe('tenantLabel', () => {
  it('should use the display column when available', () => {
    const db = new Database(':memory:');
    db.exec("CREATE TABLE tenant (id INTEGER PRIMARY KEY, name TEXT); INSERT INTO tenant VALUES (1, 'Acme'), (2, NULL);");
    const tenant = { table: 'tenant', displayColumn: 'name' };

    expect(tenantLabel(db, tenant, 1)).toBe('Acme');
    expect(tenantLabel(db, tenant, 2)).toBe('2');
    expect(tenantLabel(db, tenant, 9)).toBe('9');
    expect(tenantLabel(db, { table: 'tenant' }, 1)).toBe('1');
    db.close();
  });
});
