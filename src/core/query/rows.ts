/**
 * Row to record conversion for catalog tables.
 */
import type { OptionRecord, OptionRow, SelectionRecord, SelectionRow } from '../models/types.js';

/**
 * Convert a database row to an OptionRecord.
 */
export function optionRowToRecord(row: OptionRow): OptionRecord {
  return {
    id: row.id,
    name: row.name,
    optionType: row.option_type,
    tenantId: row.tenant_id,
    deleted: row.deleted,
  };
}

/**
 * Convert a database row to a SelectionRecord.
 */
export function selectionRowToRecord(row: SelectionRow): SelectionRecord {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    optionId: row.option_id,
    deleted: row.deleted,
  };
}
