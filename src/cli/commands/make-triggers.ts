import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/index.js';
import { TriggerGenerator, resolveVendor, type GeneratedTrigger } from '../../core/triggers/index.js';
import { logger as log } from '../../utils/logger.js';
import { openCommandContext } from '../context.js';
import { confirm } from './prompt.js';

/**
 * Create the make-triggers command.
 */
export function createMakeTriggersCommand(): Command {
  return new Command('make-triggers')
    .description('Generate migrations that add tenant-consistency triggers to selection tables')
    .option('--app <app>', 'Only models of this app')
    .option('--model <model>', 'Only this model (app.Model, glob allowed)')
    .option('--force', 'Generate even if a migration already installs the trigger')
    .option('--dry-run', 'Print the migrations instead of writing them')
    .option('--migration-dir <dir>', 'Migration root directory')
    .option('--interactive', 'Confirm each migration before writing it')
    .option('--verbose', 'Show detailed progress')
    .option('--db-vendor-override <vendor>', 'Generate SQL for this database (sqlite, postgresql, mysql, oracle)')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (options: MakeTriggersOptions) => {
      try {
        await runMakeTriggers(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface MakeTriggersOptions {
  app?: string;
  model?: string;
  force?: boolean;
  dryRun?: boolean;
  migrationDir?: string;
  interactive?: boolean;
  verbose?: boolean;
  dbVendorOverride?: string;
  config: string;
}

async function runMakeTriggers(options: MakeTriggersOptions): Promise<void> {
  const ctx = await openCommandContext(options.config);

  try {
    if (options.verbose) {
      log.setLevel('debug');
    }

    const generator = new TriggerGenerator({
      registry: ctx.registry,
      migrationDir: ctx.migrationDir(options.migrationDir),
      db: ctx.db,
      vendor: resolveVendor(options.dbVendorOverride ?? ctx.config.database.vendor),
      force: options.force,
      dryRun: options.dryRun,
      interactive: options.interactive,
      confirm: options.interactive ? confirm : undefined,
      trace: options.verbose ? (message) => log.debug(message) : undefined,
    });

    const results = await generator.generate({ app: options.app, model: options.model });
    if (results.length === 0) {
      console.log(chalk.yellow('No selection models found.'));
      return;
    }

    for (const result of results) {
      printResult(result, ctx.projectRoot);
    }
  } finally {
    ctx.close();
  }
}

function printResult(result: GeneratedTrigger, projectRoot: string): void {
  const where = (file: string | undefined): string => (file ? path.relative(projectRoot, file) : '');

  switch (result.status) {
    case 'created':
      log.success(`Created migration ${where(result.path)} for ${result.model}`);
      break;
    case 'dry_run':
      console.log(chalk.bold(`-- ${where(result.path)}`));
      console.log(result.content ?? '');
      break;
    case 'skipped_existing':
      console.log(
        chalk.yellow(`Trigger ${result.triggerName} for ${result.model} already exists in ${where(result.existingFile)}. Skipping.`)
      );
      break;
    case 'skipped_by_user':
      console.log(chalk.dim(`Skipped migration for ${result.model}`));
      break;
  }
}
