/**
 * Temporary project directories for CLI command tests: a config file with
 * absolute database and migration paths, and helpers to seed and read the
 * database outside the command under test.
 */
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import type { Command } from 'commander';
import type Database from 'better-sqlite3';
import { openCommandContext } from '../../src/cli/context.js';
import type { OptionsCatalog } from '../../src/core/repositories/index.js';

export const TASK_MODELS = `
tenant_model:
  table: tenant
  display_column: name
option_models:
  - app: tasks
    name: TaskPriority
    selection_model: tasks.TaskPrioritySelection
    default_options:
      Critical:
      Low:
        option_type: optional
selection_models:
  - app: tasks
    name: TaskPrioritySelection
    option_model: tasks.TaskPriority
`;

export interface CliProject {
  root: string;
  configPath: string;
  dbPath: string;
  migrationDir: string;
  /** Run a command against this project's config */
  run(command: Command, args?: string[]): Promise<void>;
  /** Work on the project database with its registry in place */
  seed(fn: (catalog: OptionsCatalog, db: Database.Database) => void): Promise<void>;
  cleanup(): Promise<void>;
}

export async function createCliProject(models = TASK_MODELS): Promise<CliProject> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'tenant-options-cli-'));
  const configPath = path.join(root, 'config.yaml');
  const dbPath = path.join(root, 'options.db');
  const migrationDir = path.join(root, 'migrations');

  await fs.writeFile(
    configPath,
    `database:\n  path: ${dbPath}\nmigrations:\n  dir: ${migrationDir}\nlog_level: info\n${models}`
  );

  return {
    root,
    configPath,
    dbPath,
    migrationDir,
    run: async (command, args = []) => {
      await command.parseAsync(['node', 'test', ...args, '-c', configPath]);
    },
    seed: async (fn) => {
      const ctx = await openCommandContext(configPath, root);
      try {
        fn(ctx.catalog, ctx.db);
      } finally {
        ctx.close();
      }
    },
    cleanup: async () => {
      await fs.rm(root, { recursive: true, force: true });
    },
  };
}

/** Every console.log call as one line; bare `console.log()` is ''. */
export function loggedLines(calls: unknown[][]): string[] {
  return calls.map((call) => (call.length === 0 ? '' : String(call[0])));
}
