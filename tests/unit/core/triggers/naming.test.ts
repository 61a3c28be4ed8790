/**
 * Tests for trigger naming, vendors and per-vendor SQL.
 */
import { describe, it, expect } from 'vitest';
import { triggerName } from '../../../../src/core/triggers/naming.js';
import { TENANT_MISMATCH_MESSAGE, createTriggerSql, dropTriggerSql } from '../../../../src/core/triggers/sql.js';
import { resolveVendor } from '../../../../src/core/triggers/vendors.js';
import { TriggerGenerationError } from '../../../../src/utils/errors.js';

describe('triggerName', () => {
  it('should append a short hash of the untruncated name', () => {
    expect(triggerName('tasks_taskpriorityselection')).toBe('tasks_taskpriorityselection_tenant_check_5076866180');
    expect(triggerName('tasks_taskpriorityselection', 'postgresql')).toBe(
      'tasks_taskpriorityselection_tenant_check_5076866180'
    );
  });

  it('should fit the identifier limit of the vendor', () => {
    const name = triggerName('tasks_taskpriorityselection', 'oracle');

    expect(name).toBe('tasks_taskprioritys_5076866180');
    expect(name).toHaveLength(30);
  });

  it('should be deterministic and ignore quoting', () => {
    expect(triggerName('"tasks_taskpriorityselection"')).toBe(triggerName('tasks_taskpriorityselection'));
    expect(triggerName('public.items')).toBe(triggerName('public_items'));
  });

  it('should prefix names that start with a digit', () => {
    expect(triggerName('2fa_selection')).toBe('t2fa_selection_tenant_chec_65f45a46d6');
  });

  it('should refuse unsafe table names', () => {
    expect(() => triggerName('items; DROP TABLE x')).toThrow(TriggerGenerationError);
  });
});

describe('resolveVendor', () => {
  it('should default to sqlite', () => {
    expect(resolveVendor(undefined)).toBe('sqlite');
    expect(resolveVendor('mysql')).toBe('mysql');
  });

  it('should reject unknown backends', () => {
    expect(() => resolveVendor('mssql')).toThrow('Unsupported database backend: mssql');
  });
});

describe('trigger SQL', () => {
  const context = { triggerName: 'sel_tenant_check_abc', selectionTable: 'app_sel', optionTable: 'app_opt' };

  it('should compare tenants in a SQLite WHEN clause', () => {
    const sql = createTriggerSql('sqlite', context);

    expect(sql.split('\n')).toEqual([
      'DROP TRIGGER IF EXISTS "sel_tenant_check_abc";',
      'CREATE TRIGGER "sel_tenant_check_abc"',
      'BEFORE INSERT ON "app_sel"',
      'FOR EACH ROW',
      'WHEN NEW.tenant_id != (SELECT tenant_id FROM "app_opt" WHERE id = NEW.option_id)',
      'BEGIN',
      `    SELECT RAISE(FAIL, '${TENANT_MISMATCH_MESSAGE}');`,
      'END;',
    ]);
  });

  it('should define a trigger function on PostgreSQL', () => {
    const sql = createTriggerSql('postgresql', context);

    expect(sql).toContain('CREATE OR REPLACE FUNCTION "sel_tenant_check_abc_func"()');
    expect(sql).toContain('EXECUTE FUNCTION "sel_tenant_check_abc_func"();');
    expect(dropTriggerSql('postgresql', context)).toBe('DROP TRIGGER IF EXISTS "sel_tenant_check_abc" ON "app_sel";');
  });

  it('should use backticks and SIGNAL on MySQL', () => {
    const sql = createTriggerSql('mysql', context);

    expect(sql).toContain('BEFORE INSERT ON `app_sel`');
    expect(sql).toContain("SIGNAL SQLSTATE '45000'");
    expect(dropTriggerSql('mysql', context)).toBe('DROP TRIGGER IF EXISTS `sel_tenant_check_abc`;');
  });

  it('should raise an application error on Oracle', () => {
    const sql = createTriggerSql('oracle', context);

    expect(sql).toContain('SELECT tenant_id INTO option_tenant_id FROM "app_opt" WHERE id = :NEW.option_id;');
    expect(sql).toContain(`RAISE_APPLICATION_ERROR(-20001, '${TENANT_MISMATCH_MESSAGE}');`);
  });

  it('should quote schema-qualified tables per part', () => {
    const sql = dropTriggerSql('postgresql', { ...context, selectionTable: 'tenant.app_sel' });

    expect(sql).toBe('DROP TRIGGER IF EXISTS "sel_tenant_check_abc" ON "tenant"."app_sel";');
  });
});
