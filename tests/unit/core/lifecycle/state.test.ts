/**
 * Tests for the row lifecycle state machine.
 */
import { describe, it, expect } from 'vitest';
import { LifecycleState, deletedTimestamp, nextState, stateOf } from '../../../../src/core/lifecycle/state.js';

describe('lifecycle state', () => {
  it('should derive the state from the deleted marker', () => {
    expect(stateOf({ deleted: null })).toBe(LifecycleState.ACTIVE);
    expect(stateOf({ deleted: '2026-03-01T10:00:00.000Z' })).toBe(LifecycleState.SOFT_DELETED);
    expect(stateOf(null)).toBe(LifecycleState.PURGED);
  });

  it('should allow the documented transitions', () => {
    expect(nextState('active', 'soft_delete')).toBe('soft_deleted');
    expect(nextState('soft_deleted', 'soft_delete')).toBe('soft_deleted');
    expect(nextState('soft_deleted', 'undelete')).toBe('active');
    expect(nextState('active', 'hard_delete')).toBe('purged');
    expect(nextState('soft_deleted', 'hard_delete')).toBe('purged');
  });

  it('should refuse transitions out of purged and undelete of active rows', () => {
    expect(nextState('purged', 'undelete')).toBeNull();
    expect(nextState('purged', 'soft_delete')).toBeNull();
    expect(nextState('active', 'undelete')).toBeNull();
  });

  it('should store ISO timestamps', () => {
    expect(deletedTimestamp(new Date('2026-01-02T03:04:05.000Z'))).toBe('2026-01-02T03:04:05.000Z');
  });
});
