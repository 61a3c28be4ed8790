import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/index.js';
import { applyMigrations, revertMigration } from '../../core/migrations/index.js';
import { InvalidArgumentError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';
import { openCommandContext } from '../context.js';

/**
 * Create the migrate command.
 */
export function createMigrateCommand(): Command {
  return new Command('migrate')
    .description('Apply pending migrations to the configured SQLite database')
    .option('--app <app>', 'Only migrations of this app')
    .option('--migration-dir <dir>', 'Migration root directory')
    .option('--revert [name]', 'Revert the newest (or the named) applied migration of --app')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (options: MigrateOptions) => {
      try {
        await runMigrate(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface MigrateOptions {
  app?: string;
  migrationDir?: string;
  revert?: string | boolean;
  config: string;
}

async function runMigrate(options: MigrateOptions): Promise<void> {
  const ctx = await openCommandContext(options.config);

  try {
    const dir = ctx.migrationDir(options.migrationDir);

    if (options.revert !== undefined) {
      if (!options.app) {
        throw new InvalidArgumentError('--revert requires --app');
      }
      const name = typeof options.revert === 'string' ? options.revert : undefined;
      const reverted = await revertMigration(ctx.db, dir, options.app, name);
      if (reverted) {
        log.success(`Reverted ${options.app}/${reverted}`);
      } else {
        console.log(chalk.dim(`No applied migrations for ${options.app}.`));
      }
      return;
    }

    const applied = await applyMigrations(ctx.db, dir, { app: options.app });
    if (applied.length === 0) {
      console.log(chalk.dim('No pending migrations.'));
      return;
    }
    for (const migration of applied) {
      log.success(`Applied ${migration.app}/${migration.name}`);
    }
  } finally {
    ctx.close();
  }
}
