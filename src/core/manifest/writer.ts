/**
 * Writes manifest lines: single appends during hashing, full rewrites during cleanup.
 */
import { appendFile, writeFile, writeFileAtomic } from '../../utils/file-system.js';
import { serializeRecord } from './record.js';
import type { ManifestRecord, ManifestState } from './types.js';

export interface RewriteOptions {
  /** Write to a temporary sibling and rename it over the manifest (default: true) */
  atomic?: boolean;
}

/**
 * Append one record. Creates the manifest when missing, never truncates it.
 */
export async function appendRecord(manifestPath: string, record: ManifestRecord): Promise<void> {
  await appendFile(manifestPath, `${serializeRecord(record)}\n`);
}

/**
 * Render a state as manifest content, one line per path in map order.
 */
export function renderManifest(state: ManifestState): string {
  let content = '';
  for (const [file, entry] of state) {
    content += `${serializeRecord({ file, ...entry })}\n`;
  }
  return content;
}

/**
 * Replace the manifest with exactly the entries of `state`.
 */
export async function rewriteManifest(
  manifestPath: string,
  state: ManifestState,
  options: RewriteOptions = {}
): Promise<void> {
  const content = renderManifest(state);
  if (options.atomic ?? true) {
    await writeFileAtomic(manifestPath, content);
  } else {
    await writeFile(manifestPath, content);
  }
}
