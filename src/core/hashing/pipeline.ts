/**
 * Hashing pipeline: scan a directory and append a record for every file
 * that is new or whose size changed since the last recorded entry.
 *
 * Size is the only change signal. A file rewritten with different content
 * of the same length keeps its old record.
 */
import { computeFileChecksum } from '../../utils/checksum.js';
import { getStats } from '../../utils/file-system.js';
import { logger as defaultLogger, type PipelineLogger } from '../../utils/logger.js';
import { pluralize } from '../../utils/format.js';
import { loadManifest, appendRecord } from '../manifest/index.js';
import type { ManifestState } from '../manifest/index.js';
import { listFiles, type ScanOptions } from './scanner.js';

export interface HashingOptions {
  /** Directory to scan */
  directory: string;
  /** Manifest file to append to */
  output: string;
  scan?: ScanOptions;
  logger?: PipelineLogger;
}

export interface HashingSummary {
  /** Regular files found under the directory */
  scanned: number;
  /** Files hashed and appended */
  hashed: number;
  /** Files skipped because their size matched the manifest */
  skipped: number;
}

/**
 * True when `file` has no entry or its recorded size differs.
 */
export function needsHashing(state: ManifestState, file: string, size: number): boolean {
  const entry = state.get(file);
  return entry === undefined || entry.size !== size;
}

export async function runHashing(options: HashingOptions): Promise<HashingSummary> {
  const log = options.logger ?? defaultLogger;
  const state = await loadManifest(options.output);
  log.debug(`Loaded ${pluralize(state.size, 'entry', 'entries')} from ${options.output}`);

  const files = await listFiles(options.directory, options.scan);
  const summary: HashingSummary = { scanned: files.length, hashed: 0, skipped: 0 };

  for (const file of files) {
    const { size } = await getStats(file);
    if (!needsHashing(state, file, size)) {
      summary.skipped++;
      continue;
    }

    log.info(`Processing ${file}...`);
    const contentHash = await computeFileChecksum(file);
    await appendRecord(options.output, { file, contentHash, size });
    state.set(file, { contentHash, size });
    summary.hashed++;
  }

  log.success(
    `Hashed ${pluralize(summary.hashed, 'file')}, skipped ${summary.skipped} unchanged (${summary.scanned} scanned)`
  );
  return summary;
}
