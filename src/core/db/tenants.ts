/**
 * Read-only access to host tenant tables.
 */
import type Database from 'better-sqlite3';
import type { TenantId, TenantModel } from '../models/types.js';
import { quoteIdentifier } from './identifiers.js';

/**
 * Human-readable label for a tenant: its display column when one is
 * configured and set, else its id.
 */
export function tenantLabel(db: Database.Database, tenant: TenantModel | undefined, id: TenantId): string {
  if (!tenant?.displayColumn) {
    return String(id);
  }
  const row = db
    .prepare(`SELECT ${quoteIdentifier(tenant.displayColumn)} AS label FROM ${quoteIdentifier(tenant.table)} WHERE id = ?`)
    .get(id) as { label: string | number | null } | undefined;
  return row?.label === undefined || row.label === null ? String(id) : String(row.label);
}
