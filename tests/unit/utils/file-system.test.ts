/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  readFile,
  writeFile,
  fileExists,
  isDirectory,
  ensureDir,
  globFiles,
  listDirectories,
} from '../../../src/utils/file-system.js';

describe('file-system', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'options-fs-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('readFile / writeFile', () => {
    it('should write and read back content', async () => {
      const file = path.join(tempDir, 'note.txt');

      await writeFile(file, 'hello');

      expect(await readFile(file)).toBe('hello');
    });

    it('should create parent directories', async () => {
      const file = path.join(tempDir, 'tasks', 'migrations', '0001_auto_trigger_item.sql');

      await writeFile(file, '-- up');

      expect(fs.readFileSync(file, 'utf-8')).toBe('-- up');
    });

    it('should reject for a missing file', async () => {
      await expect(readFile(path.join(tempDir, 'missing.txt'))).rejects.toThrow();
    });
  });

  describe('fileExists / isDirectory', () => {
    it('should distinguish files, directories and missing paths', async () => {
      const file = path.join(tempDir, 'a.txt');
      fs.writeFileSync(file, 'x');

      expect(await fileExists(file)).toBe(true);
      expect(await fileExists(path.join(tempDir, 'b.txt'))).toBe(false);
      expect(await isDirectory(tempDir)).toBe(true);
      expect(await isDirectory(file)).toBe(false);
      expect(await isDirectory(path.join(tempDir, 'nope'))).toBe(false);
    });
  });

  describe('ensureDir', () => {
    it('should create nested directories and tolerate existing ones', async () => {
      const dir = path.join(tempDir, 'a', 'b');

      await ensureDir(dir);
      await ensureDir(dir);

      expect(fs.statSync(dir).isDirectory()).toBe(true);
    });
  });

  describe('globFiles', () => {
    it('should return sorted absolute matches', async () => {
      fs.mkdirSync(path.join(tempDir, 'migrations'));
      fs.writeFileSync(path.join(tempDir, 'migrations', '0002_b.sql'), '');
      fs.writeFileSync(path.join(tempDir, 'migrations', '0001_a.sql'), '');
      fs.writeFileSync(path.join(tempDir, 'migrations', 'readme.md'), '');

      const files = await globFiles('migrations/*.sql', { cwd: tempDir });

      expect(files).toEqual([
        path.join(tempDir, 'migrations', '0001_a.sql'),
        path.join(tempDir, 'migrations', '0002_b.sql'),
      ]);
    });

    it('should return relative paths when asked', async () => {
      fs.writeFileSync(path.join(tempDir, 'config.yaml'), '');

      expect(await globFiles('*.yaml', { cwd: tempDir, absolute: false })).toEqual(['config.yaml']);
    });

    it('should skip node_modules by default', async () => {
      fs.mkdirSync(path.join(tempDir, 'node_modules'));
      fs.writeFileSync(path.join(tempDir, 'node_modules', 'x.sql'), '');

      expect(await globFiles('**/*.sql', { cwd: tempDir })).toEqual([]);
    });
  });

  describe('listDirectories', () => {
    it('should list immediate subdirectories in order', async () => {
      fs.mkdirSync(path.join(tempDir, 'tasks', 'nested'), { recursive: true });
      fs.mkdirSync(path.join(tempDir, 'crm'));
      fs.writeFileSync(path.join(tempDir, 'file.txt'), '');

      expect(await listDirectories(tempDir)).toEqual(['crm', 'tasks']);
    });

    it('should return nothing for a missing directory', async () => {
      expect(await listDirectories(path.join(tempDir, 'missing'))).toEqual([]);
    });
  });
});
