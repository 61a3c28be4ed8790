/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema } from '../../../src/utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

// Mock file-system for the async loader
vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const schema = z.object({
  database: z.string(),
  log_level: z.enum(['debug', 'info']).default('info'),
});

describe('parseYaml', () => {
  it('should parse valid YAML string', () => {
    expect(parseYaml('database: options.db\nretries: 2\n')).toEqual({ database: 'options.db', retries: 2 });
  });

  it('should parse an empty document as no value', () => {
    expect(parseYaml('') ?? null).toBeNull();
  });

  it('should throw ConfigError on invalid YAML', () => {
    try {
      parseYaml('key: [unclosed');
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect((error as ConfigError).code).toBe(ErrorCodes.CONFIG_LOAD_ERROR);
      expect((error as ConfigError).message).toMatch(/^Failed to parse YAML: /);
    }
  });
});

describe('parseYamlWithSchema', () => {
  it('should apply schema defaults', () => {
    expect(parseYamlWithSchema('database: options.db\n', schema)).toEqual({
      database: 'options.db',
      log_level: 'info',
    });
  });

  it('should treat an empty document as an empty mapping', () => {
    const optional = z.object({ database: z.string().default(':memory:') });

    expect(parseYamlWithSchema('', optional)).toEqual({ database: ':memory:' });
  });

  it('should report the failing path', () => {
    try {
      parseYamlWithSchema('database: 3\n', schema);
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect((error as ConfigError).code).toBe(ErrorCodes.CONFIG_INVALID);
      expect((error as ConfigError).message).toMatch(/^YAML validation failed: database: /);
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should read and validate the file', async () => {
    mockReadFile.mockResolvedValue('database: data/options.db\nlog_level: debug\n');

    const result = await loadYamlWithSchema('/project/.options/config.yaml', schema);

    expect(mockReadFile).toHaveBeenCalledWith('/project/.options/config.yaml');
    expect(result).toEqual({ database: 'data/options.db', log_level: 'debug' });
  });

  it('should name the file in validation errors', async () => {
    mockReadFile.mockResolvedValue('log_level: loud\n');

    await expect(loadYamlWithSchema('/project/config.yaml', schema)).rejects.toMatchObject({
      code: ErrorCodes.CONFIG_INVALID,
      details: expect.objectContaining({ filePath: '/project/config.yaml' }),
    });
    await expect(loadYamlWithSchema('/project/config.yaml', schema)).rejects.toThrow(/\(file: \/project\/config\.yaml\)$/);
  });

  it('should pass through read errors', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/missing.yaml', schema)).rejects.toThrow('ENOENT');
  });
});
