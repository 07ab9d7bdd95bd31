/**
 * Tests for file system helpers.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  appendFile,
  fileExists,
  globFiles,
  isDirectory,
  isFile,
  writeFile,
  writeFileAtomic,
} from '../../../src/utils/file-system.js';

describe('file-system', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'integrity-fs-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('fileExists', () => {
    it('should be true for files and directories', async () => {
      await fs.writeFile(path.join(tempDir, 'a.txt'), 'a');

      expect(await fileExists(path.join(tempDir, 'a.txt'))).toBe(true);
      expect(await fileExists(tempDir)).toBe(true);
    });

    it('should be false for missing paths', async () => {
      expect(await fileExists(path.join(tempDir, 'missing'))).toBe(false);
    });
  });

  describe('isDirectory', () => {
    it('should distinguish files from directories', async () => {
      await fs.writeFile(path.join(tempDir, 'a.txt'), 'a');

      expect(await isDirectory(tempDir)).toBe(true);
      expect(await isDirectory(path.join(tempDir, 'a.txt'))).toBe(false);
      expect(await isDirectory(path.join(tempDir, 'missing'))).toBe(false);
    });
  });

  describe('isFile', () => {
    it('should follow symbolic links to regular files', async () => {
      await fs.writeFile(path.join(tempDir, 'a.txt'), 'a');
      await fs.symlink(path.join(tempDir, 'a.txt'), path.join(tempDir, 'link.txt'));
      await fs.symlink(path.join(tempDir, 'missing'), path.join(tempDir, 'dangling'));

      expect(await isFile(path.join(tempDir, 'a.txt'))).toBe(true);
      expect(await isFile(path.join(tempDir, 'link.txt'))).toBe(true);
      expect(await isFile(path.join(tempDir, 'dangling'))).toBe(false);
      expect(await isFile(tempDir)).toBe(false);
    });
  });

  describe('appendFile', () => {
    it('should create missing parents and append without truncating', async () => {
      const file = path.join(tempDir, 'nested', 'log.txt');

      await appendFile(file, 'one\n');
      await appendFile(file, 'two\n');

      expect(await fs.readFile(file, 'utf-8')).toBe('one\ntwo\n');
    });
  });

  describe('writeFile', () => {
    it('should replace the content', async () => {
      const file = path.join(tempDir, 'out.txt');
      await fs.writeFile(file, 'old content');

      await writeFile(file, 'new');

      expect(await fs.readFile(file, 'utf-8')).toBe('new');
    });
  });

  describe('writeFileAtomic', () => {
    it('should replace the content and leave no temporary file', async () => {
      const file = path.join(tempDir, 'manifest.jsonl');
      await fs.writeFile(file, 'old\n');

      await writeFileAtomic(file, 'new\n');

      expect(await fs.readFile(file, 'utf-8')).toBe('new\n');
      expect(await fs.readdir(tempDir)).toEqual(['manifest.jsonl']);
    });

    it('should create the file when missing', async () => {
      const file = path.join(tempDir, 'fresh.jsonl');

      await writeFileAtomic(file, '');

      expect(await fs.readFile(file, 'utf-8')).toBe('');
    });
  });

  describe('globFiles', () => {
    beforeEach(async () => {
      await fs.mkdir(path.join(tempDir, 'sub'), { recursive: true });
      await fs.writeFile(path.join(tempDir, 'a.txt'), 'a');
      await fs.writeFile(path.join(tempDir, 'sub', 'b.txt'), 'b');
      await fs.writeFile(path.join(tempDir, '.hidden'), 'h');
    });

    it('should list regular files relative to cwd, skipping dot files', async () => {
      const files = await globFiles('**/*', { cwd: tempDir });
      expect(files.sort()).toEqual(['a.txt', 'sub/b.txt']);
    });

    it('should include dot files on request', async () => {
      const files = await globFiles('**/*', { cwd: tempDir, dot: true });
      expect(files.sort()).toEqual(['.hidden', 'a.txt', 'sub/b.txt']);
    });

    it('should honour ignore patterns', async () => {
      const files = await globFiles('**/*', { cwd: tempDir, ignore: ['sub/**'] });
      expect(files).toEqual(['a.txt']);
    });

    it('should include directories when onlyFiles is off', async () => {
      const files = await globFiles('**/*', { cwd: tempDir, onlyFiles: false });
      expect(files.sort()).toEqual(['a.txt', 'sub', 'sub/b.txt']);
    });
  });
});
