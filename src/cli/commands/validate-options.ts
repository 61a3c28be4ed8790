import { Command } from 'commander';
import chalk from 'chalk';
import { auditConfiguration, type AuditReport } from '../../core/audit/index.js';
import { DEFAULT_CONFIG_PATH } from '../../core/config/index.js';
import { logger as log } from '../../utils/logger.js';
import { openCommandContext } from '../context.js';

const RULE = '═'.repeat(67);

/**
 * Create the validate-options command.
 */
export function createValidateOptionsCommand(): Command {
  return new Command('validate-options')
    .description('Validate that every option and selection model is properly configured')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .action(async (options: ValidateOptionsOptions) => {
      let report: AuditReport;
      try {
        report = await runValidateOptions(options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
      // Fatal findings fail the run, for CI.
      if (report.hasFatal) {
        process.exit(1);
      }
    });
}

interface ValidateOptionsOptions {
  json?: boolean;
  config: string;
}

async function runValidateOptions(options: ValidateOptionsOptions): Promise<AuditReport> {
  const ctx = await openCommandContext(options.config);

  try {
    const report = auditConfiguration(ctx.db, ctx.registry);
    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
    }
    return report;
  } finally {
    ctx.close();
  }
}

function printReport(report: AuditReport): void {
  console.log();
  console.log(chalk.bold(RULE));
  console.log(chalk.bold('OPTIONS CONFIGURATION VALIDATION'));
  console.log(chalk.bold(RULE));
  console.log();

  for (const line of report.checks) {
    console.log(chalk.dim(line));
  }
  console.log();

  if (report.errors.length > 0) {
    console.log(chalk.red.bold('ERRORS FOUND:'));
    report.errors.forEach((finding, i) => console.log(chalk.red(`  ${i + 1}. ${finding.message}`)));
    console.log();
  }

  if (report.warnings.length > 0) {
    console.log(chalk.yellow.bold('WARNINGS:'));
    report.warnings.forEach((finding, i) => console.log(chalk.yellow(`  ${i + 1}. ${finding.message}`)));
    console.log();
  }

  if (report.errors.length === 0 && report.warnings.length === 0) {
    console.log(chalk.green('All validations passed!'));
    console.log(chalk.green('The options configuration is properly set up.'));
    console.log();
  }

  console.log(chalk.bold('─'.repeat(60)));
  console.log(`${report.modelsChecked} model(s) checked, ${report.errors.length} error(s), ${report.warnings.length} warning(s)`);
}
