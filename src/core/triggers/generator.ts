/**
 * Generates migrations that install the tenant-consistency trigger on
 * selection tables.
 */
import * as path from 'node:path';
import { InvalidArgumentError } from '../../utils/errors.js';
import { fileExists, readFile, writeFile } from '../../utils/file-system.js';
import { renderMigration } from '../migrations/format.js';
import { MigrationHistory, appMigrationDir } from '../migrations/history.js';
import type { SelectionModel } from '../models/types.js';
import { triggerName } from './naming.js';
import { createTriggerSql, dropTriggerSql } from './sql.js';
import { selectSelectionModels } from './targets.js';
import type { GeneratedTrigger, TriggerTarget, TriggerToolOptions } from './types.js';
import type { DbVendor } from './vendors.js';

export interface GeneratorOptions extends TriggerToolOptions {
  vendor?: DbVendor;
  /** Generate even when a migration already installs the trigger */
  force?: boolean;
}

export class TriggerGenerator {
  private readonly vendor: DbVendor;
  private readonly histories = new Map<string, MigrationHistory>();

  constructor(private readonly options: GeneratorOptions) {
    if (options.interactive && !options.confirm) {
      throw new InvalidArgumentError('Interactive mode needs a confirm callback');
    }
    this.vendor = options.vendor ?? 'sqlite';
  }

  private trace(message: string): void {
    this.options.trace?.(message);
  }

  private async history(app: string): Promise<MigrationHistory> {
    let history = this.histories.get(app);
    if (!history) {
      history = await MigrationHistory.load(this.options.migrationDir, app, this.options.db);
      this.histories.set(app, history);
    }
    return history;
  }

  /**
   * Generate one migration per targeted selection model, in registry order.
   */
  async generate(target: TriggerTarget = {}): Promise<GeneratedTrigger[]> {
    const results: GeneratedTrigger[] = [];
    for (const model of selectSelectionModels(this.options.registry, target)) {
      results.push(await this.processModel(model));
    }
    return results;
  }

  /**
   * Migration file of the app that already mentions the trigger: applied
   * migrations are checked newest first, then every file on disk.
   */
  async findExisting(app: string, name: string): Promise<string | null> {
    const history = await this.history(app);
    const dir = appMigrationDir(this.options.migrationDir, app);
    const candidates = [
      ...history.applied.map((migration) => path.join(dir, `${migration.name}.sql`)),
      ...history.files.map((file) => file.path),
    ];

    for (const file of candidates) {
      this.trace(`Checking migration file for trigger ${name}: ${file}`);
      if ((await fileExists(file)) && (await readFile(file)).includes(name)) {
        return file;
      }
    }
    return null;
  }

  private async processModel(model: SelectionModel): Promise<GeneratedTrigger> {
    const name = triggerName(model.table, this.vendor);
    const optionModel = this.options.registry.getOptionModel(model.optionModel);
    const base = { app: model.app, model: model.ref, table: model.table, triggerName: name };

    this.trace(`Processing model '${model.modelName}' in app '${model.app}' with table '${model.table}'`);

    if (!this.options.force) {
      const existingFile = await this.findExisting(model.app, name);
      if (existingFile) {
        return { ...base, status: 'skipped_existing', existingFile };
      }
    }

    const history = await this.history(model.app);
    const migrationName = history.nextName(`auto_trigger_${model.modelName}`);
    const filePath = path.join(appMigrationDir(this.options.migrationDir, model.app), `${migrationName}.sql`);

    this.trace(`Generating trigger SQL for '${model.modelName}' with table '${model.table}' and vendor '${this.vendor}'`);
    const context = { triggerName: name, selectionTable: model.table, optionTable: optionModel.table };
    const content = renderMigration({
      description: `Adds an auto-generated tenant-consistency trigger for ${model.ref}.`,
      dependsOn: history.latest(),
      up: createTriggerSql(this.vendor, context),
      down: dropTriggerSql(this.vendor, context),
      createdAt: this.options.now?.(),
    });

    if (this.options.dryRun) {
      history.addGenerated(migrationName);
      return { ...base, status: 'dry_run', migrationName, path: filePath, content };
    }

    if (this.options.interactive && this.options.confirm) {
      const confirmed = await this.options.confirm(`Do you want to create a migration for ${model.modelName}?`);
      if (!confirmed) {
        return { ...base, status: 'skipped_by_user', migrationName, path: filePath };
      }
    }

    await writeFile(filePath, content);
    history.addGenerated(migrationName);
    return { ...base, status: 'created', migrationName, path: filePath, content };
  }
}
