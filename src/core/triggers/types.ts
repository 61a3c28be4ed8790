/**
 * Shared types for the trigger generator and remover.
 */
import type Database from 'better-sqlite3';
import type { ModelRegistry } from '../models/registry.js';
import type { ModelRef } from '../models/types.js';

/** Which selection models to act on. Neither field means all of them. */
export interface TriggerTarget {
  app?: string;
  /** `app.Model`; glob patterns are allowed */
  model?: string;
}

export interface TriggerToolOptions {
  registry: ModelRegistry;
  /** Root of the per-app migration directories */
  migrationDir: string;
  /** Connection used to read applied migrations */
  db?: Database.Database;
  /** Produce artifacts without writing them */
  dryRun?: boolean;
  /** Ask `confirm` before writing each migration */
  interactive?: boolean;
  confirm?: (question: string) => Promise<boolean>;
  /** Receives progress detail when set */
  trace?: (message: string) => void;
  now?: () => Date;
}

export type TriggerArtifactStatus = 'created' | 'dry_run' | 'skipped_existing' | 'skipped_by_user';

export interface GeneratedTrigger {
  app: string;
  model: ModelRef;
  table: string;
  triggerName: string;
  status: TriggerArtifactStatus;
  migrationName?: string;
  path?: string;
  content?: string;
  /** Migration that already installs the trigger */
  existingFile?: string;
}

export interface FoundTrigger {
  triggerName: string;
  /** What the removal migration drops, e.g. `name` or `"name" ON "table"` */
  dropTarget: string;
  app: string;
  model: ModelRef;
  migrationFile: string;
}

export type RemovalStatus = 'created' | 'dry_run' | 'skipped_by_user' | 'nothing_to_remove';

export interface RemovalMigration {
  app: string;
  status: RemovalStatus;
  triggers: string[];
  /** Triggers left out because `verify` did not find them in the database */
  unverified: string[];
  migrationName?: string;
  path?: string;
  content?: string;
}
