/**
 * Cleanup pipeline: drop records of deleted files, keep the last record of
 * every surviving path, and rewrite the manifest.
 */
import { fileExists } from '../../utils/file-system.js';
import { logger as defaultLogger, type PipelineLogger } from '../../utils/logger.js';
import { pluralize } from '../../utils/format.js';
import { readManifestRecords, rewriteManifest } from '../manifest/index.js';
import type { ManifestState } from '../manifest/index.js';

export interface CleanupOptions {
  /** Manifest file to compact */
  output: string;
  /** Rewrite through a temporary file and rename (default: true) */
  atomic?: boolean;
  logger?: PipelineLogger;
}

export interface CleanupSummary {
  /** Records read from the manifest */
  read: number;
  /** Records written back, one per surviving path */
  kept: number;
  /** Records dropped because their file no longer exists */
  removed: number;
  /** Records superseded by a later record for the same path */
  duplicates: number;
}

/**
 * Compact the manifest at `options.output`. A missing manifest rejects with
 * ENOENT and nothing is created.
 */
export async function runCleanup(options: CleanupOptions): Promise<CleanupSummary> {
  const log = options.logger ?? defaultLogger;
  const summary: CleanupSummary = { read: 0, kept: 0, removed: 0, duplicates: 0 };

  const kept: ManifestState = new Map();
  for await (const record of readManifestRecords(options.output)) {
    summary.read++;

    if (!(await fileExists(record.file))) {
      log.info(`Entry removed for deleted file ${record.file}`);
      summary.removed++;
      continue;
    }

    if (kept.has(record.file)) {
      log.info(`Duplicate entry resolved for ${record.file}`);
      summary.duplicates++;
    }
    kept.set(record.file, { contentHash: record.contentHash, size: record.size });
  }

  await rewriteManifest(options.output, kept, { atomic: options.atomic ?? true });
  summary.kept = kept.size;

  log.success(
    `Kept ${pluralize(summary.kept, 'entry', 'entries')}, removed ${summary.removed}, resolved ${pluralize(summary.duplicates, 'duplicate')}`
  );
  return summary;
}
