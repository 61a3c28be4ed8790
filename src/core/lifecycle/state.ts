/**
 * Row lifecycle: active, soft-deleted, purged.
 *
 * Soft delete sets the `deleted` timestamp, undelete clears it, and a hard
 * delete removes the row. Purged is terminal.
 */

export const LifecycleState = {
  ACTIVE: 'active',
  SOFT_DELETED: 'soft_deleted',
  PURGED: 'purged',
} as const;

export type LifecycleState = (typeof LifecycleState)[keyof typeof LifecycleState];

export type LifecycleTransition = 'soft_delete' | 'undelete' | 'hard_delete';

const TRANSITIONS: Record<LifecycleState, Partial<Record<LifecycleTransition, LifecycleState>>> = {
  active: { soft_delete: 'soft_deleted', hard_delete: 'purged' },
  // Soft delete of an already deleted row is a no-op that keeps its timestamp.
  soft_deleted: { soft_delete: 'soft_deleted', undelete: 'active', hard_delete: 'purged' },
  purged: {},
};

/**
 * State of a row, or `purged` when it no longer exists.
 */
export function stateOf(row: { deleted: string | null } | null | undefined): LifecycleState {
  if (!row) {
    return LifecycleState.PURGED;
  }
  return row.deleted === null ? LifecycleState.ACTIVE : LifecycleState.SOFT_DELETED;
}

/**
 * Target state of a transition, or null when it is not allowed.
 */
export function nextState(state: LifecycleState, transition: LifecycleTransition): LifecycleState | null {
  return TRANSITIONS[state][transition] ?? null;
}

/** Timestamp stored in `deleted`. */
export function deletedTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}
