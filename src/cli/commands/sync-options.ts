import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/index.js';
import { tenantLabel } from '../../core/db/index.js';
import { OPTION_TYPE_LABELS, type OptionModel } from '../../core/models/index.js';
import type { OptionManager, SyncReport } from '../../core/repositories/index.js';
import { logger as log } from '../../utils/logger.js';
import { openCommandContext, type CommandContext } from '../context.js';

/**
 * Create the sync-options command.
 */
export function createSyncOptionsCommand(): Command {
  return new Command('sync-options')
    .description("Synchronize stored default options with each model's default-options table")
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (options: SyncOptionsOptions) => {
      try {
        await runSyncOptions(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface SyncOptionsOptions {
  config: string;
}

async function runSyncOptions(options: SyncOptionsOptions): Promise<void> {
  const ctx = await openCommandContext(options.config);

  try {
    const models = ctx.registry.optionModels();
    if (models.length === 0) {
      console.log(chalk.yellow('No default options found in the project.'));
      return;
    }

    for (const model of models) {
      const synced = syncModel(ctx, model);
      if (synced && Object.keys(synced.report).length > 0) {
        printSyncReport(ctx, model, synced.repository, synced.report);
      }
    }
  } finally {
    ctx.close();
  }
}

function syncModel(
  ctx: CommandContext,
  model: OptionModel
): { repository: OptionManager; report: SyncReport } | null {
  try {
    const repository = ctx.catalog.options(model.ref);
    return { repository, report: repository.syncDefaultOptions() };
  } catch (error) {
    log.error(`Error updating options for ${model.name}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

function printSyncReport(ctx: CommandContext, model: OptionModel, repository: OptionManager, report: SyncReport): void {
  const entries = Object.entries(report);
  const kept = entries.filter(([, entry]) => entry.action !== 'deleted');
  const retired = entries.filter(([, entry]) => entry.action === 'deleted');

  console.log();
  console.log(chalk.cyan(`Model: ${model.name}`));

  if (kept.length > 0) {
    console.log(chalk.yellow('  Imported or Verified Options:'));
    for (const [name, entry] of kept) {
      console.log(`    - '${name}', Type: ${OPTION_TYPE_LABELS[entry.optionType]} (${entry.action})`);
    }
    console.log(`    ${kept.length} options imported or verified`);
  } else {
    console.log(chalk.yellow('  No options imported or verified'));
  }

  const custom = repository.query().customOptions().active().all();
  if (custom.length > 0) {
    console.log(chalk.yellow('  All Custom Options:'));
    for (const option of custom) {
      const tenant = option.tenantId === null ? '-' : tenantLabel(ctx.db, model.tenantModel, option.tenantId);
      console.log(`    - '${option.name}', Tenant: ${tenant}`);
    }
    console.log(`    ${custom.length} Custom Options`);
  } else {
    console.log(chalk.yellow('  No Custom Options'));
  }

  if (retired.length > 0) {
    console.log(chalk.yellow('  Newly Deleted Options:'));
    for (const [name] of retired) {
      console.log(`    - '${name}'`);
    }
    console.log(`    ${retired.length} Newly Deleted Options`);
  } else {
    console.log(chalk.yellow('  No Newly Deleted Options'));
  }

  const preExisting = repository.query().deleted().excludeNames(Object.keys(report)).all();
  if (preExisting.length > 0) {
    console.log(chalk.yellow('  All Pre-existing Deleted Options:'));
    for (const option of preExisting) {
      console.log(`    - '${option.name}', Type: ${OPTION_TYPE_LABELS[option.optionType]}`);
    }
    console.log(`    ${preExisting.length} Pre-existing Deleted Options`);
  } else {
    console.log(chalk.yellow('  No Pre-existing Deleted Options'));
  }
}
