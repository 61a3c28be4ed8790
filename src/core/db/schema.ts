/**
 * Database schema for the options catalog.
 *
 * The catalog's own bookkeeping table is fixed; option, selection and tenant
 * tables are derived from the models in a registry.
 * Note: db.exec() is SQLite's exec method for running SQL, not child_process.exec()
 */

import type Database from 'better-sqlite3';
import { expandConstraintName } from '../models/constraints.js';
import type { ModelRegistry } from '../models/registry.js';
import type { CatalogModel, FieldSpec, OnDeletePolicy, OptionModel, SelectionModel, TenantModel } from '../models/types.js';
import { quoteIdentifier } from './identifiers.js';

/** Table recording applied migrations. */
export const MIGRATIONS_TABLE = 'options_migrations';

/**
 * SQL statements for the catalog's own tables.
 */
export const CORE_SCHEMA_SQL = `
-- Applied migrations, per app
CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
  id INTEGER PRIMARY KEY,
  app TEXT NOT NULL,
  name TEXT NOT NULL,
  applied TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  UNIQUE(app, name)
);

CREATE INDEX IF NOT EXISTS idx_options_migrations_app ON ${MIGRATIONS_TABLE}(app);
`;

function onDeleteSql(policy: OnDeletePolicy): string {
  return policy === 'restrict' ? 'ON DELETE RESTRICT' : 'ON DELETE CASCADE';
}

function columnSql(field: FieldSpec, model: CatalogModel, registry: ModelRegistry): string {
  const column = quoteIdentifier(field.name);
  if (field.name === 'id') {
    return `${column} INTEGER PRIMARY KEY`;
  }

  let sql = `${column} ${field.sqlType}${field.nullable ? '' : ' NOT NULL'}`;
  const ref = field.references;

  // Unresolvable references get no foreign key; the auditor reports them.
  if (ref?.target === 'tenant' && model.tenantModel) {
    sql += ` REFERENCES ${quoteIdentifier(model.tenantModel.table)}(id) ${onDeleteSql(ref.onDelete)}`;
  } else if (ref?.target === 'option' && ref.model !== undefined) {
    const target = registry.get(ref.model);
    if (target?.kind === 'option') {
      sql += ` REFERENCES ${quoteIdentifier(target.table)}(id) ${onDeleteSql(ref.onDelete)}`;
    }
  }

  return sql;
}

/**
 * DDL for a host tenant table. Hosts that already own the table are
 * unaffected.
 */
export function tenantTableSql(tenant: TenantModel): string {
  const columns = ['id INTEGER PRIMARY KEY'];
  if (tenant.displayColumn && tenant.displayColumn !== 'id') {
    columns.push(`${quoteIdentifier(tenant.displayColumn)} TEXT`);
  }
  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(tenant.table)} (\n  ${columns.join(',\n  ')}\n);`;
}

/**
 * DDL for an option table with its declared constraints.
 */
export function optionTableSql(model: OptionModel, registry: ModelRegistry): string {
  const table = quoteIdentifier(model.table);
  const lines = model.fields.map((field) => columnSql(field, model, registry));
  const statements: string[] = [];

  for (const constraint of model.constraints) {
    const name = quoteIdentifier(expandConstraintName(constraint.name, model.app, model.modelName));
    if (constraint.kind === 'tenant_check') {
      lines.push(
        `CONSTRAINT ${name} CHECK ((option_type = 'custom' AND tenant_id IS NOT NULL) OR ` +
          `(option_type IN ('mandatory', 'optional') AND tenant_id IS NULL))`
      );
    } else if (constraint.kind === 'unique_name') {
      statements.push(`CREATE UNIQUE INDEX IF NOT EXISTS ${name} ON ${table} (lower(name), coalesce(tenant_id, -1));`);
    }
  }

  return [`CREATE TABLE IF NOT EXISTS ${table} (\n  ${lines.join(',\n  ')}\n);`, ...statements].join('\n');
}

/**
 * DDL for a selection table with its declared constraints.
 */
export function selectionTableSql(model: SelectionModel, registry: ModelRegistry): string {
  const table = quoteIdentifier(model.table);
  const lines = model.fields.map((field) => columnSql(field, model, registry));
  const statements = [`CREATE INDEX IF NOT EXISTS ${quoteIdentifier(`${model.table}_option_idx`)} ON ${table} (option_id);`];

  for (const constraint of model.constraints) {
    const name = quoteIdentifier(expandConstraintName(constraint.name, model.app, model.modelName));
    switch (constraint.kind) {
      case 'option_not_null':
        lines.push(`CONSTRAINT ${name} CHECK (option_id IS NOT NULL)`);
        break;
      case 'tenant_not_null':
        lines.push(`CONSTRAINT ${name} CHECK (tenant_id IS NOT NULL)`);
        break;
      case 'unique_active_selection':
        statements.push(
          `CREATE UNIQUE INDEX IF NOT EXISTS ${name} ON ${table} (tenant_id, option_id) WHERE deleted IS NULL;`
        );
        break;
      default:
        break;
    }
  }

  return [`CREATE TABLE IF NOT EXISTS ${table} (\n  ${lines.join(',\n  ')}\n);`, ...statements].join('\n');
}

/**
 * Full DDL for every model in a registry: tenant tables first, then option
 * tables, then selection tables.
 */
export function buildSchemaSql(registry: ModelRegistry): string {
  const parts: string[] = [];
  const tenants = new Map<string, TenantModel>();

  for (const model of [...registry.optionModels(), ...registry.selectionModels()]) {
    if (model.tenantModel && !tenants.has(model.tenantModel.table)) {
      tenants.set(model.tenantModel.table, model.tenantModel);
    }
  }

  for (const tenant of tenants.values()) {
    parts.push(tenantTableSql(tenant));
  }
  for (const model of registry.optionModels()) {
    parts.push(optionTableSql(model, registry));
  }
  for (const model of registry.selectionModels()) {
    parts.push(selectionTableSql(model, registry));
  }

  return parts.join('\n\n');
}

/**
 * Initialize the database schema.
 * Creates the catalog tables and, when a registry is given, every model's
 * tables. Safe to run repeatedly.
 */
export function initializeSchema(db: Database.Database, registry?: ModelRegistry): void {
  db.pragma('foreign_keys = ON');
  db.exec(CORE_SCHEMA_SQL);

  if (registry) {
    db.exec(buildSchemaSql(registry));
  }
}

/**
 * Whether a table exists in the connected database.
 */
export function tableExists(db: Database.Database, table: string): boolean {
  const row = db.prepare("SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ?").get(table);
  return row !== undefined;
}
