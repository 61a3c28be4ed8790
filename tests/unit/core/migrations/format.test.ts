/**
 * Tests for the SQL migration file format.
 */
import { describe, it, expect } from 'vitest';
import {
  formatMigrationName,
  formatTimestamp,
  migrationNumber,
  parseMigration,
  renderMigration,
} from '../../../../src/core/migrations/format.js';
import { MigrationError } from '../../../../src/utils/errors.js';

describe('migration format', () => {
  const createdAt = new Date(2026, 0, 31, 9, 5);

  it('should format timestamps in local time', () => {
    expect(formatTimestamp(createdAt)).toBe('2026-01-31 09:05');
  });

  it('should render header, up and down sections', () => {
    const content = renderMigration({
      description: 'Creates items.',
      dependsOn: '0001_initial',
      up: '\nCREATE TABLE items (id INTEGER);\n',
      down: 'DROP TABLE items;',
      createdAt,
    });

    expect(content).toBe(
      [
        '-- Generated by tenant-options on 2026-01-31 09:05',
        '-- Creates items.',
        '-- depends: 0001_initial',
        '-- migrate:up',
        'CREATE TABLE items (id INTEGER);',
        '',
        '-- migrate:down',
        'DROP TABLE items;',
        '',
      ].join('\n')
    );
  });

  it('should leave the down section empty when there is nothing to undo', () => {
    const content = renderMigration({ description: 'Drops.', dependsOn: null, up: 'SELECT 1;', down: '  ', createdAt });

    expect(content.endsWith('-- migrate:down\n')).toBe(true);
    expect(content).toContain('-- depends: none\n');
  });

  it('should parse what it renders', () => {
    const content = renderMigration({
      description: 'Creates items.',
      dependsOn: null,
      up: 'CREATE TABLE items (id INTEGER);',
      down: 'DROP TABLE items;',
      createdAt,
    });

    expect(parseMigration(content, 'x.sql')).toEqual({
      dependsOn: null,
      up: 'CREATE TABLE items (id INTEGER);',
      down: 'DROP TABLE items;',
    });
  });

  it('should read files without a down section', () => {
    const parsed = parseMigration('-- depends: 0003_more\r\n-- migrate:up\r\nSELECT 1;\r\n', 'y.sql');

    expect(parsed).toEqual({ dependsOn: '0003_more', up: 'SELECT 1;', down: '' });
  });

  it('should reject malformed files', () => {
    expect(() => parseMigration('SELECT 1;', 'a.sql')).toThrow(MigrationError);
    expect(() => parseMigration('-- migrate:down\n-- migrate:up\n', 'b.sql')).toThrow(
      'Migration b.sql has its down section before its up section'
    );
  });

  it('should number migration names', () => {
    expect(formatMigrationName(7, 'auto_trigger_item')).toBe('0007_auto_trigger_item');
    expect(migrationNumber('0012_remove_triggers')).toBe(12);
    expect(migrationNumber('initial')).toBeNull();
  });
});
