/**
 * Per-vendor SQL for the tenant-consistency trigger.
 *
 * The trigger fires before a selection row is inserted and rejects it when
 * its tenant differs from the tenant of the referenced option. Options
 * without a tenant (mandatory and optional) compare as NULL and pass.
 */
import { quoteIdentifier } from '../db/identifiers.js';
import type { DbVendor } from './vendors.js';
import { identifierQuote } from './vendors.js';

export const TENANT_MISMATCH_MESSAGE = 'Tenant mismatch between options and selections';

export interface TriggerSqlContext {
  triggerName: string;
  selectionTable: string;
  optionTable: string;
}

interface QuotedNames {
  trigger: string;
  selection: string;
  option: string;
}

function quoted(vendor: DbVendor, context: TriggerSqlContext): QuotedNames {
  const quote = identifierQuote(vendor);
  return {
    trigger: quoteIdentifier(context.triggerName, quote),
    selection: quoteIdentifier(context.selectionTable, quote),
    option: quoteIdentifier(context.optionTable, quote),
  };
}

function sqliteTrigger({ trigger, selection, option }: QuotedNames): string {
  return `DROP TRIGGER IF EXISTS ${trigger};
CREATE TRIGGER ${trigger}
BEFORE INSERT ON ${selection}
FOR EACH ROW
WHEN NEW.tenant_id != (SELECT tenant_id FROM ${option} WHERE id = NEW.option_id)
BEGIN
    SELECT RAISE(FAIL, '${TENANT_MISMATCH_MESSAGE}');
END;`;
}

function postgresqlTrigger({ trigger, selection, option }: QuotedNames, context: TriggerSqlContext): string {
  const fn = quoteIdentifier(`${context.triggerName}_func`);
  return `CREATE OR REPLACE FUNCTION ${fn}()
RETURNS TRIGGER AS $$
BEGIN
    IF NEW.tenant_id != (SELECT tenant_id FROM ${option} WHERE id = NEW.option_id) THEN
        RAISE EXCEPTION '${TENANT_MISMATCH_MESSAGE}';
    END IF;
    RETURN NEW;
END;
$$ LANGUAGE plpgsql;

DROP TRIGGER IF EXISTS ${trigger} ON ${selection};
CREATE TRIGGER ${trigger}
BEFORE INSERT ON ${selection}
FOR EACH ROW
EXECUTE FUNCTION ${fn}();`;
}

function mysqlTrigger({ trigger, selection, option }: QuotedNames): string {
  return `DROP TRIGGER IF EXISTS ${trigger};
CREATE TRIGGER ${trigger}
BEFORE INSERT ON ${selection}
FOR EACH ROW
BEGIN
    DECLARE option_tenant_id INT;
    SELECT tenant_id INTO option_tenant_id FROM ${option} WHERE id = NEW.option_id;

    IF NEW.tenant_id != option_tenant_id THEN
        SIGNAL SQLSTATE '45000'
        SET MESSAGE_TEXT = '${TENANT_MISMATCH_MESSAGE}';
    END IF;
END;`;
}

function oracleTrigger({ trigger, selection, option }: QuotedNames): string {
  return `CREATE OR REPLACE TRIGGER ${trigger}
BEFORE INSERT ON ${selection}
FOR EACH ROW
DECLARE
    option_tenant_id NUMBER;
BEGIN
    SELECT tenant_id INTO option_tenant_id FROM ${option} WHERE id = :NEW.option_id;

    IF :NEW.tenant_id != option_tenant_id THEN
        RAISE_APPLICATION_ERROR(-20001, '${TENANT_MISMATCH_MESSAGE}');
    END IF;
END;`;
}

/**
 * SQL that installs the trigger.
 */
export function createTriggerSql(vendor: DbVendor, context: TriggerSqlContext): string {
  const names = quoted(vendor, context);
  switch (vendor) {
    case 'sqlite':
      return sqliteTrigger(names);
    case 'postgresql':
      return postgresqlTrigger(names, context);
    case 'mysql':
      return mysqlTrigger(names);
    case 'oracle':
      return oracleTrigger(names);
  }
}

/**
 * SQL that removes the trigger. PostgreSQL scopes trigger names to their
 * table.
 */
export function dropTriggerSql(vendor: DbVendor, context: TriggerSqlContext): string {
  const { trigger, selection } = quoted(vendor, context);
  return vendor === 'postgresql'
    ? `DROP TRIGGER IF EXISTS ${trigger} ON ${selection};`
    : `DROP TRIGGER IF EXISTS ${trigger};`;
}
