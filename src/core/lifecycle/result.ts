/**
 * Tagged validation results.
 *
 * Validators return these instead of throwing so callers can collect every
 * issue; `unwrap` converts a failure into the matching error at the write
 * boundary.
 */
import { ErrorCodes, NameConflictError, ValidationError } from '../../utils/errors.js';

export interface ValidationIssue {
  code: string;
  message: string;
  /** Field the issue is attached to, when there is one */
  field?: string;
}

export type Result<T = void> = { ok: true; value: T } | { ok: false; issues: ValidationIssue[] };

export function ok(): Result<void>;
export function ok<T>(value: T): Result<T>;
export function ok<T>(value?: T): Result<T | undefined> {
  return { ok: true, value };
}

export function fail<T = void>(...issues: ValidationIssue[]): Result<T> {
  return { ok: false, issues };
}

/**
 * Merge results, keeping every issue. Succeeds only if all inputs did.
 */
export function combine(results: readonly Result<unknown>[]): Result<void> {
  const issues = results.flatMap((result) => (result.ok ? [] : result.issues));
  return issues.length === 0 ? ok() : fail(...issues);
}

/**
 * Return the value of a successful result or throw for the first issue.
 */
export function unwrap<T>(result: Result<T>): T {
  if (result.ok) {
    return result.value;
  }
  const [first] = result.issues;
  const details = { issues: result.issues };
  if (first.code === ErrorCodes.NAME_CONFLICT) {
    throw new NameConflictError(first.message, details);
  }
  throw new ValidationError(first.code, first.message, details);
}
