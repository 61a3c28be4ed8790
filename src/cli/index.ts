/**
 * Command-line interface for the options catalog.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createListOptionsCommand } from './commands/list-options.js';
import { createSyncOptionsCommand } from './commands/sync-options.js';
import { createMakeTriggersCommand } from './commands/make-triggers.js';
import { createRemoveTriggersCommand } from './commands/remove-triggers.js';
import { createValidateOptionsCommand } from './commands/validate-options.js';
import { createMigrateCommand } from './commands/migrate.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('tenant-options')
    .description('Manage tenant-scoped option catalogs')
    .version(readVersion());
  [
    createListOptionsCommand,
    createSyncOptionsCommand,
    createMakeTriggersCommand,
    createRemoveTriggersCommand,
    createValidateOptionsCommand,
    createMigrateCommand,
  ].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
