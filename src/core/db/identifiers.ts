/**
 * SQL identifier validation and quoting.
 */
import { TriggerGenerationError } from '../../utils/errors.js';

/** Alphanumerics, underscores, and dots for schema-qualified names. */
const SAFE_IDENTIFIER = /^[a-zA-Z0-9_.]+$/;

export function isSafeIdentifier(identifier: string): boolean {
  return SAFE_IDENTIFIER.test(identifier);
}

/**
 * Quote an identifier, quoting each part of a schema-qualified name
 * separately. Refuses identifiers outside the safe character set.
 */
export function quoteIdentifier(identifier: string, quote: '"' | '`' = '"'): string {
  if (!isSafeIdentifier(identifier)) {
    throw new TriggerGenerationError(
      `Invalid identifier ${identifier}. Only alphanumeric characters, underscores, and dots are allowed.`,
      { identifier }
    );
  }
  return identifier
    .split('.')
    .map((part) => `${quote}${part}${quote}`)
    .join('.');
}
