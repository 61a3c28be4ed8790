/**
 * Generates migrations that drop triggers installed by the generator.
 *
 * Trigger names are recovered from the `DROP TRIGGER IF EXISTS` statements
 * of the migrations that created them, so the remover works without the
 * generator's naming rules and for triggers created under another vendor.
 */
import * as path from 'node:path';
import { InvalidArgumentError } from '../../utils/errors.js';
import { readFile, writeFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { isSafeIdentifier } from '../db/identifiers.js';
import { renderMigration } from '../migrations/format.js';
import { MigrationHistory, appMigrationDir, type MigrationFileRef } from '../migrations/history.js';
import type { SelectionModel } from '../models/types.js';
import { selectSelectionModels } from './targets.js';
import type { FoundTrigger, RemovalMigration, TriggerTarget, TriggerToolOptions } from './types.js';

const log = logger.child('triggers');

const DROP_PATTERN = /DROP TRIGGER IF EXISTS ([^;]+);/g;
const REMOVAL_SLUG = 'remove_triggers';

export interface RemoverOptions extends TriggerToolOptions {
  /** Only remove triggers present in the connected SQLite database */
  verify?: boolean;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const DROP_TARGET = /^(["`]?)([^"`\s]+)\1(?:\s+ON\s+(\S+))?$/i;

export interface DroppedTrigger {
  name: string;
  /** Text after `DROP TRIGGER IF EXISTS`: the name, plus `ON <table>` where the vendor needs it */
  target: string;
}

/**
 * Triggers dropped by a migration's SQL, deduplicated on the unquoted name.
 * The PostgreSQL `ON <table>` clause is kept in the target.
 */
export function extractDroppedTargets(content: string): DroppedTrigger[] {
  const found = new Map<string, DroppedTrigger>();
  for (const match of content.matchAll(DROP_PATTERN)) {
    const parsed = DROP_TARGET.exec(match[1].trim());
    if (!parsed || found.has(parsed[2])) {
      continue;
    }
    const [, quote, name, table] = parsed;
    found.set(name, { name, target: table === undefined ? name : `${quote}${name}${quote} ON ${table}` });
  }
  return [...found.values()];
}

/**
 * Trigger names dropped by a migration's SQL, without quotes or the
 * PostgreSQL `ON <table>` suffix.
 */
export function extractDroppedTriggers(content: string): string[] {
  return extractDroppedTargets(content).map((trigger) => trigger.name);
}

function isSafeTarget(trigger: DroppedTrigger): boolean {
  const table = /\sON\s+(\S+)$/i.exec(trigger.target)?.[1];
  return isSafeIdentifier(trigger.name) && (table === undefined || isSafeIdentifier(table.replace(/["`]/g, '')));
}

function isRemovalMigration(file: MigrationFileRef): boolean {
  return file.name === REMOVAL_SLUG || file.name.endsWith(`_${REMOVAL_SLUG}`);
}

export class TriggerRemover {
  constructor(private readonly options: RemoverOptions) {
    if (options.interactive && !options.confirm) {
      throw new InvalidArgumentError('Interactive mode needs a confirm callback');
    }
    if (options.verify && !options.db) {
      throw new InvalidArgumentError('Verifying triggers needs a database connection');
    }
  }

  private trace(message: string): void {
    this.options.trace?.(message);
  }

  /**
   * Triggers created for a selection model that no newer removal
   * migration has dropped yet.
   */
  async findTriggers(model: SelectionModel): Promise<FoundTrigger[]> {
    const history = await MigrationHistory.load(this.options.migrationDir, model.app);
    const modelName = escapeRegExp(model.modelName);
    const modelPattern = new RegExp(`auto_trigger_${modelName}|trigger.*${modelName}`);

    const removals: { number: number; names: Set<string> }[] = [];
    for (const file of history.files.filter(isRemovalMigration)) {
      removals.push({ number: file.number ?? 0, names: new Set(extractDroppedTriggers(await readFile(file.path))) });
    }

    const found = new Map<string, FoundTrigger>();
    for (const file of history.files) {
      if (isRemovalMigration(file) || !modelPattern.test(path.basename(file.path))) {
        continue;
      }
      this.trace(`Scanning ${file.path} for triggers of ${model.ref}`);

      for (const { name: triggerName, target } of extractDroppedTargets(await readFile(file.path))) {
        const created = file.number ?? 0;
        const removed = removals.some((removal) => removal.number > created && removal.names.has(triggerName));
        if (removed) {
          this.trace(`Trigger ${triggerName} from ${file.name} was already removed`);
          found.delete(triggerName);
          continue;
        }
        found.set(triggerName, {
          triggerName,
          dropTarget: target,
          app: model.app,
          model: model.ref,
          migrationFile: file.path,
        });
      }
    }

    return [...found.values()];
  }

  private triggerExists(name: string): boolean {
    const db = this.options.db;
    if (!db) {
      return false;
    }
    return db.prepare("SELECT 1 FROM sqlite_master WHERE type = 'trigger' AND name = ?").get(name) !== undefined;
  }

  /**
   * Write one consolidated removal migration per app.
   */
  async remove(target: TriggerTarget = {}): Promise<RemovalMigration[]> {
    const byApp = new Map<string, Map<string, DroppedTrigger>>();
    for (const model of selectSelectionModels(this.options.registry, target)) {
      const triggers = byApp.get(model.app) ?? new Map<string, DroppedTrigger>();
      for (const trigger of await this.findTriggers(model)) {
        triggers.set(trigger.triggerName, { name: trigger.triggerName, target: trigger.dropTarget });
      }
      byApp.set(model.app, triggers);
    }

    const results: RemovalMigration[] = [];
    for (const [app, triggers] of byApp) {
      const sorted = [...triggers.values()].sort((a, b) => a.name.localeCompare(b.name));
      results.push(await this.createRemoval(app, sorted));
    }
    return results;
  }

  private async createRemoval(app: string, candidates: DroppedTrigger[]): Promise<RemovalMigration> {
    const unverified: string[] = [];
    const triggers: string[] = [];
    const targets: string[] = [];

    for (const candidate of candidates) {
      const { name } = candidate;
      if (!isSafeTarget(candidate)) {
        log.warn(`Skipping trigger with unsafe target '${candidate.target}' in app ${app}`);
        continue;
      }
      if (this.options.verify && !this.triggerExists(name)) {
        this.trace(`Trigger ${name} is not present in the database`);
        unverified.push(name);
        continue;
      }
      triggers.push(name);
      targets.push(candidate.target);
    }

    if (triggers.length === 0) {
      return { app, status: 'nothing_to_remove', triggers, unverified };
    }

    const history = await MigrationHistory.load(this.options.migrationDir, app, this.options.db);
    const migrationName = history.nextName(REMOVAL_SLUG);
    const filePath = path.join(appMigrationDir(this.options.migrationDir, app), `${migrationName}.sql`);
    const content = renderMigration({
      description: 'Removes triggers previously created by make-triggers.',
      dependsOn: history.latest(),
      up: targets.map((target) => `DROP TRIGGER IF EXISTS ${target};`).join('\n'),
      // Dropping a trigger has no meaningful reverse.
      down: '',
      createdAt: this.options.now?.(),
    });

    if (this.options.dryRun) {
      return { app, status: 'dry_run', triggers, unverified, migrationName, path: filePath, content };
    }

    if (this.options.interactive && this.options.confirm) {
      const question = `Will remove the following triggers from ${app}:\n  ${triggers.join('\n  ')}\nProceed?`;
      if (!(await this.options.confirm(question))) {
        return { app, status: 'skipped_by_user', triggers, unverified, migrationName, path: filePath };
      }
    }

    await writeFile(filePath, content);
    return { app, status: 'created', triggers, unverified, migrationName, path: filePath, content };
  }
}
