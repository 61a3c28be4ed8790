/**
 * Database vendors trigger SQL can be generated for.
 */
import { TriggerGenerationError } from '../../utils/errors.js';

export const DB_VENDORS = ['sqlite', 'postgresql', 'mysql', 'oracle'] as const;

export type DbVendor = (typeof DB_VENDORS)[number];

/** Longest identifier each vendor accepts. */
export const MAX_IDENTIFIER_LENGTH: Record<DbVendor, number> = {
  sqlite: 200,
  postgresql: 63,
  mysql: 64,
  oracle: 30,
};

export function isDbVendor(value: unknown): value is DbVendor {
  return typeof value === 'string' && (DB_VENDORS as readonly string[]).includes(value);
}

/**
 * Resolve a vendor name; sqlite when none is given.
 */
export function resolveVendor(value: string | undefined): DbVendor {
  if (value === undefined) {
    return 'sqlite';
  }
  if (!isDbVendor(value)) {
    throw new TriggerGenerationError(`Unsupported database backend: ${value}`, {
      vendor: value,
      supported: [...DB_VENDORS],
    });
  }
  return value;
}

export function identifierQuote(vendor: DbVendor): '"' | '`' {
  return vendor === 'mysql' ? '`' : '"';
}
