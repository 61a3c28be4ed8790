/**
 * Applies and reverts SQL migrations on a SQLite database.
 */
import type Database from 'better-sqlite3';
import { MigrationError } from '../../utils/errors.js';
import { listDirectories, readFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { transaction } from '../db/manager.js';
import { parseMigration } from './format.js';
import { MigrationRecorder, listMigrationFiles, type MigrationFileRef } from './history.js';

const log = logger.child('migrate');

export interface ApplyOptions {
  /** Only apply this app's migrations */
  app?: string;
}

export interface AppliedRef {
  app: string;
  name: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function applyOne(db: Database.Database, recorder: MigrationRecorder, file: MigrationFileRef): Promise<void> {
  const { up } = parseMigration(await readFile(file.path), file.path);
  try {
    transaction(db, () => {
      if (up) {
        db.exec(up);
      }
      recorder.record(file.app, file.name);
    });
  } catch (error) {
    throw new MigrationError(`Failed to apply ${file.app}/${file.name}: ${describe(error)}`, {
      app: file.app,
      name: file.name,
      file: file.path,
    });
  }
}

/**
 * Apply every pending migration under `<dir>/<app>/`, app by app, in
 * numeric order. Returns what was applied.
 */
export async function applyMigrations(
  db: Database.Database,
  dir: string,
  options: ApplyOptions = {}
): Promise<AppliedRef[]> {
  const recorder = new MigrationRecorder(db);
  recorder.ensureTable();

  const apps = options.app ? [options.app] : await listDirectories(dir);
  const applied: AppliedRef[] = [];

  for (const app of apps) {
    const done = new Set(recorder.applied(app).map((m) => m.name));
    for (const file of await listMigrationFiles(dir, app)) {
      if (done.has(file.name)) {
        continue;
      }
      await applyOne(db, recorder, file);
      log.debug(`Applied ${app}/${file.name}`);
      applied.push({ app, name: file.name });
    }
  }

  return applied;
}

/**
 * Run the down section of an applied migration (the app's newest by
 * default) and forget it. Returns the reverted name, or null when nothing
 * is applied.
 */
export async function revertMigration(
  db: Database.Database,
  dir: string,
  app: string,
  name?: string
): Promise<string | null> {
  const recorder = new MigrationRecorder(db);
  const applied = recorder.applied(app);
  const target = name ?? applied[0]?.name;
  if (target === undefined) {
    return null;
  }
  if (!applied.some((m) => m.name === target)) {
    throw new MigrationError(`Migration ${app}/${target} is not applied`, { app, name: target });
  }

  const file = (await listMigrationFiles(dir, app)).find((f) => f.name === target);
  if (!file) {
    throw new MigrationError(`Migration file for ${app}/${target} not found in ${dir}`, { app, name: target });
  }

  const { down } = parseMigration(await readFile(file.path), file.path);
  try {
    transaction(db, () => {
      if (down) {
        db.exec(down);
      }
      recorder.unrecord(app, target);
    });
  } catch (error) {
    throw new MigrationError(`Failed to revert ${app}/${target}: ${describe(error)}`, { app, name: target });
  }

  log.debug(`Reverted ${app}/${target}`);
  return target;
}
