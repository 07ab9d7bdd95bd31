/**
 * Tests for the cleanup pipeline.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { runCleanup } from '../../../../src/core/cleanup/compactor.js';
import { ManifestError } from '../../../../src/utils/errors.js';

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), success: vi.fn() };
}

function line(file: string, md5: string, size: number): string {
  return JSON.stringify({ file, md5, size });
}

describe('runCleanup', () => {
  let tempDir: string;
  let output: string;
  let fileA: string;
  let fileB: string;
  let logger: ReturnType<typeof createLogger>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'integrity-cleanup-'));
    output = path.join(tempDir, 'manifest.jsonl');
    fileA = path.join(tempDir, 'a.txt');
    fileB = path.join(tempDir, 'b.txt');
    logger = createLogger();
    await fs.writeFile(fileA, 'alpha');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should drop records of deleted files', async () => {
    await fs.writeFile(output, [line(fileA, 'ha', 5), line(fileB, 'hb', 4)].join('\n') + '\n');

    const summary = await runCleanup({ output, logger });

    expect(summary).toEqual({ read: 2, kept: 1, removed: 1, duplicates: 0 });
    expect(await fs.readFile(output, 'utf-8')).toBe(`${line(fileA, 'ha', 5)}\n`);
    expect(logger.info).toHaveBeenCalledWith(`Entry removed for deleted file ${fileB}`);
  });

  it('should keep only the last record of a duplicated path', async () => {
    await fs.writeFile(output, [line(fileA, 'h1', 4), line(fileA, 'h2', 5)].join('\n') + '\n');

    const summary = await runCleanup({ output, logger });

    expect(summary).toEqual({ read: 2, kept: 1, removed: 0, duplicates: 1 });
    expect(await fs.readFile(output, 'utf-8')).toBe(`${line(fileA, 'h2', 5)}\n`);
    expect(logger.info).toHaveBeenCalledWith(`Duplicate entry resolved for ${fileA}`);
  });

  it('should order output by first appearance of each path', async () => {
    await fs.writeFile(fileB, 'beta');
    await fs.writeFile(
      output,
      [line(fileB, 'b1', 4), line(fileA, 'a1', 5), line(fileB, 'b2', 4)].join('\n') + '\n'
    );

    await runCleanup({ output, logger });

    expect(await fs.readFile(output, 'utf-8')).toBe(`${line(fileB, 'b2', 4)}\n${line(fileA, 'a1', 5)}\n`);
  });

  it('should log a removal for every record of a deleted path', async () => {
    await fs.writeFile(output, [line(fileB, 'h1', 1), line(fileB, 'h2', 2)].join('\n') + '\n');

    const summary = await runCleanup({ output, logger });

    expect(summary).toEqual({ read: 2, kept: 0, removed: 2, duplicates: 0 });
    expect(logger.info).toHaveBeenCalledTimes(2);
    expect(await fs.readFile(output, 'utf-8')).toBe('');
  });

  it('should keep records whose path is now a directory', async () => {
    await fs.mkdir(fileB);
    await fs.writeFile(output, `${line(fileB, 'hb', 4)}\n`);

    const summary = await runCleanup({ output, logger });

    expect(summary.kept).toBe(1);
  });

  it('should leave a compact manifest unchanged', async () => {
    const content = `${line(fileA, 'ha', 5)}\n`;
    await fs.writeFile(output, content);

    await runCleanup({ output, logger });

    expect(await fs.readFile(output, 'utf-8')).toBe(content);
  });

  it('should rewrite in place when atomic is off', async () => {
    await fs.writeFile(output, [line(fileA, 'h1', 4), line(fileA, 'h2', 5)].join('\n') + '\n');

    await runCleanup({ output, atomic: false, logger });

    expect(await fs.readFile(output, 'utf-8')).toBe(`${line(fileA, 'h2', 5)}\n`);
  });

  it('should fail with ENOENT for a missing manifest without creating it', async () => {
    await expect(runCleanup({ output, logger })).rejects.toMatchObject({ code: 'ENOENT' });

    expect(logger.success).not.toHaveBeenCalled();
    await expect(fs.access(output)).rejects.toThrow();
  });

  it('should fail on a blank line instead of dropping it', async () => {
    const content = `${line(fileA, 'ha', 5)}\n\n`;
    await fs.writeFile(output, content);

    await expect(runCleanup({ output, logger })).rejects.toThrow(/Malformed manifest entry at line 2/);
    expect(await fs.readFile(output, 'utf-8')).toBe(content);
  });

  it('should fail on a malformed line and keep the manifest as it was', async () => {
    const content = `${line(fileA, 'ha', 5)}\n{broken\n`;
    await fs.writeFile(output, content);

    await expect(runCleanup({ output, logger })).rejects.toThrow(ManifestError);
    expect(await fs.readFile(output, 'utf-8')).toBe(content);
  });

  it('should report a summary', async () => {
    await fs.writeFile(output, [line(fileA, 'h1', 4), line(fileA, 'h2', 5), line(fileB, 'hb', 4)].join('\n') + '\n');

    await runCleanup({ output, logger });

    expect(logger.success).toHaveBeenCalledWith('Kept 1 entry, removed 1, resolved 1 duplicate');
  });
});
