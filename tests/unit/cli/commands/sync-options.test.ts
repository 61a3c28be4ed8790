/**
 * Tests for the sync-options command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createSyncOptionsCommand } from '../../../../src/cli/commands/sync-options.js';
import { TASK_MODELS, createCliProject, loggedLines, type CliProject } from '../../../helpers/cli-project.js';

// Mock chalk with pass-through
vi.mock('chalk', () => {
  const identity = (s: string): string => s;
  const color = Object.assign((s: string): string => s, { bold: identity });
  return {
    default: { bold: identity, dim: identity, cyan: identity, gray: identity, blue: identity, green: color, yellow: color, red: color },
  };
});

describe('sync-options command', () => {
  let project: CliProject | undefined;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    project = undefined;
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await project?.cleanup();
  });

  it('should report a project without option models', async () => {
    project = await createCliProject('');

    await project.run(createSyncOptionsCommand());

    expect(loggedLines(consoleLogSpy.mock.calls)).toEqual(['No default options found in the project.']);
  });

  it('should create declared defaults on first run', async () => {
    project = await createCliProject();

    await project.run(createSyncOptionsCommand());

    expect(loggedLines(consoleLogSpy.mock.calls)).toEqual([
      '',
      'Model: TaskPriority',
      '  Imported or Verified Options:',
      "    - 'Critical', Type: Default Mandatory (created)",
      "    - 'Low', Type: Default Optional (created)",
      '    2 options imported or verified',
      '  No Custom Options',
      '  No Newly Deleted Options',
      '  No Pre-existing Deleted Options',
    ]);
  });

  it('should verify on a second run', async () => {
    project = await createCliProject();
    await project.run(createSyncOptionsCommand());
    consoleLogSpy.mockClear();

    await project.run(createSyncOptionsCommand());

    expect(loggedLines(consoleLogSpy.mock.calls).slice(3, 5)).toEqual([
      "    - 'Critical', Type: Default Mandatory (verified)",
      "    - 'Low', Type: Default Optional (verified)",
    ]);
  });

  it('should list custom, retired and previously deleted options', async () => {
    project = await createCliProject();
    await project.seed((catalog, db) => {
      db.prepare("INSERT INTO tenant (id, name) VALUES (1, 'Acme')").run();
      const options = catalog.options('tasks.TaskPriority');
      options.createMandatory('Old');
      options.createForTenant(1, 'Someday');
      options.delete(options.createOptional('Gone').id);
    });

    await project.run(createSyncOptionsCommand());

    expect(loggedLines(consoleLogSpy.mock.calls)).toEqual([
      '',
      'Model: TaskPriority',
      '  Imported or Verified Options:',
      "    - 'Critical', Type: Default Mandatory (created)",
      "    - 'Low', Type: Default Optional (created)",
      '    2 options imported or verified',
      '  All Custom Options:',
      "    - 'Someday', Tenant: Acme",
      '    1 Custom Options',
      '  Newly Deleted Options:',
      "    - 'Old'",
      '    1 Newly Deleted Options',
      '  All Pre-existing Deleted Options:',
      "    - 'Gone', Type: Default Optional",
      '    1 Pre-existing Deleted Options',
    ]);
  });

  it('should log invalid defaults and carry on', async () => {
    project = await createCliProject(TASK_MODELS.replace('option_type: optional', 'option_type: custom'));

    await project.run(createSyncOptionsCommand());

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "[ERROR] Error updating options for TaskPriority: Option defaults must be of type 'mandatory' or 'optional'. " +
        "You specified option_type = custom for 'Low'."
    );
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });
});
