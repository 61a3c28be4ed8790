/**
 * Types for the configuration auditor.
 */
import type { ModelRef } from '../models/types.js';

export type AuditSeverity = 'error' | 'warning';

/**
 * One auditor finding. Errors are fatal: the catalog cannot work as
 * configured. Warnings point at likely problems.
 */
export interface AuditFinding {
  severity: AuditSeverity;
  /** Null for findings about the registry as a whole */
  model: ModelRef | null;
  message: string;
}

export interface AuditReport {
  errors: AuditFinding[];
  warnings: AuditFinding[];
  /** Progress lines, one per passed check */
  checks: string[];
  modelsChecked: number;
  hasFatal: boolean;
}
