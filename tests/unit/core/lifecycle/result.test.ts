/**
 * Tests for tagged validation results.
 */
import { describe, it, expect } from 'vitest';
import { combine, fail, ok, unwrap } from '../../../../src/core/lifecycle/result.js';
import { NameConflictError, ValidationError } from '../../../../src/utils/errors.js';

describe('validation results', () => {
  it('should carry a value on success', () => {
    expect(ok('High')).toEqual({ ok: true, value: 'High' });
    expect(unwrap(ok(42))).toBe(42);
  });

  it('should collect every issue when combining', () => {
    const merged = combine([
      ok(),
      fail({ code: 'V003', message: 'empty' }),
      fail({ code: 'V001', message: 'pairing' }, { code: 'V002', message: 'shadow' }),
    ]);

    expect(merged.ok).toBe(false);
    expect(merged.ok ? [] : merged.issues.map((i) => i.code)).toEqual(['V003', 'V001', 'V002']);
    expect(combine([ok(), ok(1)])).toEqual({ ok: true, value: undefined });
  });

  it('should throw a ValidationError for the first issue', () => {
    const result = fail({ code: 'V003', message: 'Name cannot be empty or only whitespace', field: 'name' });

    try {
      unwrap(result);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe('V003');
        expect(error.message).toBe('Name cannot be empty or only whitespace');
        expect(error.details).toEqual({ issues: [{ code: 'V003', message: 'Name cannot be empty or only whitespace', field: 'name' }] });
      }
    }
  });

  it('should throw a NameConflictError for name conflicts', () => {
    expect(() => unwrap(fail({ code: 'V009', message: 'taken' }))).toThrow(NameConflictError);
  });
});
