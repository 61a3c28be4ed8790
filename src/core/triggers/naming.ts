/**
 * Deterministic, length-bounded trigger names.
 */
import { TriggerGenerationError } from '../../utils/errors.js';
import { shortSha1 } from '../../utils/checksum.js';
import { isSafeIdentifier } from '../db/identifiers.js';
import { MAX_IDENTIFIER_LENGTH, type DbVendor } from './vendors.js';

export const TRIGGER_HASH_LENGTH = 10;

/**
 * Name of the tenant-consistency trigger for a selection table:
 * `<table>_tenant_check` truncated to fit the vendor's identifier limit,
 * followed by `_` and the first ten hex digits of its SHA-1. Names that
 * would start with an underscore or digit are prefixed with `t`.
 */
export function triggerName(table: string, vendor: DbVendor = 'sqlite'): string {
  const cleaned = table.replace(/["`]/g, '').replaceAll('.', '_');
  if (!isSafeIdentifier(cleaned)) {
    throw new TriggerGenerationError(
      `Invalid table name ${table}. Only alphanumeric characters, underscores, and dots are allowed.`,
      { table }
    );
  }

  let base = `${cleaned}_tenant_check`;
  const hash = shortSha1(base, TRIGGER_HASH_LENGTH);

  if (/^[_0-9]/.test(base)) {
    base = `t${base.slice(0, -1)}`;
  }

  return `${base.slice(0, MAX_IDENTIFIER_LENGTH[vendor] - TRIGGER_HASH_LENGTH - 1)}_${hash}`;
}
