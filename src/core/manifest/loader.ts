/**
 * Reads a manifest file line by line.
 */
import * as fs from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { fileExists } from '../../utils/file-system.js';
import { parseRecord } from './record.js';
import type { ManifestRecord, ManifestState } from './types.js';

export async function manifestExists(manifestPath: string): Promise<boolean> {
  return fileExists(manifestPath);
}

/**
 * Yield every record of the manifest in file order.
 * Every line must be a record: a blank or malformed line throws ManifestError.
 * A missing file rejects with the filesystem error (ENOENT).
 */
export async function* readManifestRecords(manifestPath: string): AsyncGenerator<ManifestRecord> {
  const handle = await fs.open(manifestPath, 'r');
  const input = handle.createReadStream({ encoding: 'utf-8' });
  const lines = createInterface({ input, crlfDelay: Infinity });

  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      yield parseRecord(line, lineNumber);
    }
  } finally {
    lines.close();
    // Closes the file handle too (autoClose).
    input.destroy();
  }
}

/**
 * Fold the manifest into path -> latest entry.
 * A missing manifest is an empty one.
 */
export async function loadManifest(manifestPath: string): Promise<ManifestState> {
  const state: ManifestState = new Map();
  if (!(await manifestExists(manifestPath))) {
    return state;
  }

  for await (const record of readManifestRecords(manifestPath)) {
    state.set(record.file, { contentHash: record.contentHash, size: record.size });
  }
  return state;
}
