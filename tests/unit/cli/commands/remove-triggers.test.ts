/**
 * Tests for the remove-triggers command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createMakeTriggersCommand } from '../../../../src/cli/commands/make-triggers.js';
import { createRemoveTriggersCommand } from '../../../../src/cli/commands/remove-triggers.js';
import { createCliProject, loggedLines, type CliProject } from '../../../helpers/cli-project.js';

// Mock chalk with pass-through
vi.mock('chalk', () => {
  const identity = (s: string): string => s;
  const color = Object.assign((s: string): string => s, { bold: identity });
  return {
    default: { bold: identity, dim: identity, cyan: identity, gray: identity, blue: identity, green: color, yellow: color, red: color },
  };
});

const TRIGGER = 'tasks_taskpriorityselection_tenant_check_5076866180';

describe('remove-triggers command', () => {
  let project: CliProject;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleWarnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    project = await createCliProject();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    await project.run(createMakeTriggersCommand());
    consoleLogSpy.mockClear();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await project.cleanup();
  });

  it('should write one removal migration per app', async () => {
    const removal = path.join(project.migrationDir, 'tasks', '0002_remove_triggers.sql');

    await project.run(createRemoveTriggersCommand());

    expect(loggedLines(consoleLogSpy.mock.calls)).toEqual([
      `✓ Created migration ${path.relative(process.cwd(), removal)} removing 1 trigger(s) from tasks`,
    ]);
    expect(await fs.readFile(removal, 'utf-8')).toContain(`-- migrate:up\nDROP TRIGGER IF EXISTS ${TRIGGER};\n`);
  });

  it('should have nothing to remove the second time', async () => {
    await project.run(createRemoveTriggersCommand());
    consoleLogSpy.mockClear();

    await project.run(createRemoveTriggersCommand());

    expect(loggedLines(consoleLogSpy.mock.calls)).toEqual(['No triggers to remove for tasks']);
  });

  it('should skip triggers missing from the database with --verify', async () => {
    await project.run(createRemoveTriggersCommand(), ['--verify']);

    expect(consoleWarnSpy).toHaveBeenCalledWith(`[WARN] Not found in the database, skipping: ${TRIGGER}`);
    expect(loggedLines(consoleLogSpy.mock.calls)).toEqual(['No triggers to remove for tasks']);
  });

  it('should print the removal on a dry run', async () => {
    await project.run(createRemoveTriggersCommand(), ['--dry-run', '--app', 'tasks']);

    const lines = loggedLines(consoleLogSpy.mock.calls);
    expect(lines[0]).toBe(
      `-- ${path.relative(process.cwd(), path.join(project.migrationDir, 'tasks', '0002_remove_triggers.sql'))}`
    );
    expect(lines[1]).toContain('-- Removes triggers previously created by make-triggers.');
  });
});
