import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/index.js';
import { TriggerRemover, type RemovalMigration } from '../../core/triggers/index.js';
import { logger as log } from '../../utils/logger.js';
import { openCommandContext } from '../context.js';
import { confirm } from './prompt.js';

/**
 * Create the remove-triggers command.
 */
export function createRemoveTriggersCommand(): Command {
  return new Command('remove-triggers')
    .description('Generate migrations that drop previously generated tenant-consistency triggers')
    .option('--app <app>', 'Only models of this app')
    .option('--model <model>', 'Only this model (app.Model, glob allowed)')
    .option('--dry-run', 'Print the migrations instead of writing them')
    .option('--migration-dir <dir>', 'Migration root directory')
    .option('--interactive', 'Confirm each migration before writing it')
    .option('--verbose', 'Show detailed progress')
    .option('--verify', 'Only remove triggers present in the database')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (options: RemoveTriggersOptions) => {
      try {
        await runRemoveTriggers(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface RemoveTriggersOptions {
  app?: string;
  model?: string;
  dryRun?: boolean;
  migrationDir?: string;
  interactive?: boolean;
  verbose?: boolean;
  verify?: boolean;
  config: string;
}

async function runRemoveTriggers(options: RemoveTriggersOptions): Promise<void> {
  const ctx = await openCommandContext(options.config);

  try {
    if (options.verbose) {
      log.setLevel('debug');
    }

    const remover = new TriggerRemover({
      registry: ctx.registry,
      migrationDir: ctx.migrationDir(options.migrationDir),
      db: ctx.db,
      verify: options.verify,
      dryRun: options.dryRun,
      interactive: options.interactive,
      confirm: options.interactive ? confirm : undefined,
      trace: options.verbose ? (message) => log.debug(message) : undefined,
    });

    const results = await remover.remove({ app: options.app, model: options.model });
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

function printResult(result: RemovalMigration, projectRoot: string): void {
  const where = result.path ? path.relative(projectRoot, result.path) : '';

  if (result.unverified.length > 0) {
    log.warn(`Not found in the database, skipping: ${result.unverified.join(', ')}`);
  }

  switch (result.status) {
    case 'nothing_to_remove':
      console.log(chalk.dim(`No triggers to remove for ${result.app}`));
      break;
    case 'created':
      log.success(`Created migration ${where} removing ${result.triggers.length} trigger(s) from ${result.app}`);
      break;
    case 'dry_run':
      console.log(chalk.bold(`-- ${where}`));
      console.log(result.content ?? '');
      break;
    case 'skipped_by_user':
      console.log(chalk.dim(`Skipped removal migration for ${result.app}`));
      break;
  }
}
