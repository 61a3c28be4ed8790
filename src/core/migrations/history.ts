/**
 * Migration history: what the database has applied and what is on disk.
 */
import * as path from 'node:path';
import type Database from 'better-sqlite3';
import { globFiles } from '../../utils/file-system.js';
import { MIGRATIONS_TABLE, initializeSchema, tableExists } from '../db/schema.js';
import { formatMigrationName, migrationNumber } from './format.js';

export interface AppliedMigration {
  app: string;
  name: string;
  applied: string;
}

export interface MigrationFileRef {
  app: string;
  name: string;
  path: string;
  number: number | null;
}

/**
 * Records applied migrations in the options_migrations table.
 */
export class MigrationRecorder {
  constructor(private readonly db: Database.Database) {}

  ensureTable(): void {
    initializeSchema(this.db);
  }

  /**
   * Applied migrations of an app, newest first. Empty when the table has
   * not been created yet.
   */
  applied(app: string): AppliedMigration[] {
    if (!tableExists(this.db, MIGRATIONS_TABLE)) {
      return [];
    }
    return this.db
      .prepare(`SELECT app, name, applied FROM ${MIGRATIONS_TABLE} WHERE app = ? ORDER BY applied DESC, id DESC`)
      .all(app) as AppliedMigration[];
  }

  isApplied(app: string, name: string): boolean {
    return this.applied(app).some((migration) => migration.name === name);
  }

  record(app: string, name: string): void {
    this.db.prepare(`INSERT INTO ${MIGRATIONS_TABLE} (app, name) VALUES (?, ?)`).run(app, name);
  }

  unrecord(app: string, name: string): void {
    this.db.prepare(`DELETE FROM ${MIGRATIONS_TABLE} WHERE app = ? AND name = ?`).run(app, name);
  }
}

/** Directory holding an app's migration files. */
export function appMigrationDir(baseDir: string, app: string): string {
  return path.join(baseDir, app);
}

function compareRefs(a: { name: string; number: number | null }, b: { name: string; number: number | null }): number {
  const byNumber = (a.number ?? -1) - (b.number ?? -1);
  return byNumber !== 0 ? byNumber : a.name.localeCompare(b.name);
}

/**
 * Migration files of an app, in numeric order.
 */
export async function listMigrationFiles(baseDir: string, app: string): Promise<MigrationFileRef[]> {
  const files = await globFiles('*.sql', { cwd: appMigrationDir(baseDir, app) });
  return files
    .map((file) => {
      const name = path.basename(file, '.sql');
      return { app, name, path: file, number: migrationNumber(name) };
    })
    .sort(compareRefs);
}

/**
 * Snapshot of one app's migrations, from the database and from disk, plus
 * the migrations generated during the current run.
 */
export class MigrationHistory {
  private readonly generated: string[] = [];

  private constructor(
    readonly app: string,
    readonly applied: readonly AppliedMigration[],
    readonly files: readonly MigrationFileRef[]
  ) {}

  static async load(baseDir: string, app: string, db?: Database.Database): Promise<MigrationHistory> {
    const applied = db ? new MigrationRecorder(db).applied(app) : [];
    return new MigrationHistory(app, applied, await listMigrationFiles(baseDir, app));
  }

  /** Record a migration generated in this run so numbering continues past it. */
  addGenerated(name: string): void {
    this.generated.push(name);
  }

  /**
   * The highest-numbered migration known for the app, or null when there
   * is none.
   */
  latest(): string | null {
    const names = [
      ...this.applied.map((m) => m.name),
      ...this.files.map((f) => f.name),
      ...this.generated,
    ];
    const numbered = names
      .map((name) => ({ name, number: migrationNumber(name) }))
      .filter((ref) => ref.number !== null)
      .sort(compareRefs);
    return numbered.length > 0 ? numbered[numbered.length - 1].name : null;
  }

  /**
   * Name for the next migration: one more than the highest number, 0001
   * when there are none.
   */
  nextName(slug: string): string {
    const latest = this.latest();
    const current = latest === null ? 0 : (migrationNumber(latest) ?? 0);
    return formatMigrationName(current + 1, slug);
  }
}
