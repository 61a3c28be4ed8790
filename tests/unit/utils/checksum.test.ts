/**
 * Tests for checksum utility.
 */
import { describe, it, expect } from 'vitest';
import { shortSha1 } from '../../../src/utils/checksum.js';

describe('shortSha1', () => {
  it('should truncate the hex digest', () => {
    expect(shortSha1('tasks_taskpriorityselection_tenant_check', 10)).toBe('5076866180');
  });

  it('should return consistent digests for same content', () => {
    expect(shortSha1('hello world', 16)).toBe(shortSha1('hello world', 16));
  });

  it('should be case sensitive', () => {
    expect(shortSha1('Hello', 10)).not.toBe(shortSha1('hello', 10));
  });

  it('should cap the length at the full digest', () => {
    expect(shortSha1('', 100)).toHaveLength(40);
  });
});
