/**
 * Tests for the yes/no terminal prompt.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as readline from 'node:readline';
import { confirm } from '../../../../src/cli/commands/prompt.js';

vi.mock('node:readline', () => ({
  createInterface: vi.fn(),
}));

describe('confirm', () => {
  let answer: string;
  const question = vi.fn((text: string, callback: (reply: string) => void) => callback(answer));
  const close = vi.fn();

  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(readline.createInterface).mockReturnValue({ question, close } as unknown as readline.Interface);
  });

  it('should accept y and yes in any case', async () => {
    answer = ' YES ';
    expect(await confirm('Proceed?')).toBe(true);

    answer = 'y';
    expect(await confirm('Proceed?')).toBe(true);
  });

  it('should treat anything else as no', async () => {
    answer = '';
    expect(await confirm('Proceed?')).toBe(false);

    answer = 'nope';
    expect(await confirm('Proceed?')).toBe(false);
  });

  it('should show the default and close the interface', async () => {
    answer = 'n';

    await confirm('Remove triggers?');

    expect(question).toHaveBeenCalledWith('Remove triggers? [y/N] ', expect.any(Function));
    expect(close).toHaveBeenCalledTimes(1);
  });
});
