import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH } from '../../core/config/index.js';
import { tenantLabel } from '../../core/db/index.js';
import { logger as log } from '../../utils/logger.js';
import { openCommandContext } from '../context.js';

/**
 * Create the list-options command.
 */
export function createListOptionsCommand(): Command {
  return new Command('list-options')
    .description('List the active (not soft-deleted) options of every option model')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (options: ListOptionsOptions) => {
      try {
        await runListOptions(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface ListOptionsOptions {
  config: string;
}

async function runListOptions(options: ListOptionsOptions): Promise<void> {
  const ctx = await openCommandContext(options.config);

  try {
    const models = ctx.registry.optionModels();
    if (models.length === 0) {
      console.log('No options found in the project.');
      return;
    }

    for (const model of models) {
      console.log(chalk.cyan(`Model: ${model.name}`));
      console.log(chalk.yellow('  Options:'));
      try {
        for (const option of ctx.catalog.options(model.ref).query().active().all()) {
          if (option.tenantId !== null) {
            console.log(`    - ${option.name} (Tenant: ${tenantLabel(ctx.db, model.tenantModel, option.tenantId)})`);
          } else {
            console.log(`    - ${option.name}`);
          }
        }
      } catch (error) {
        log.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
      }
      console.log();
    }
  } finally {
    ctx.close();
  }
}
