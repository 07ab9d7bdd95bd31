/**
 * Type definitions for the integrity manifest.
 */

/**
 * One file's observed state, as stored on a manifest line.
 */
export interface ManifestRecord {
  /** Path as produced by the scan (directory argument joined with the relative path) */
  file: string;
  /** Lowercase hex MD5 digest of the file contents */
  contentHash: string;
  /** Size in bytes */
  size: number;
}

/**
 * The latest known state of one path.
 */
export type ManifestEntry = Pick<ManifestRecord, 'contentHash' | 'size'>;

/**
 * In-memory reduction of a manifest: path to its latest entry.
 * Iteration order is the order in which each path was first seen.
 */
export type ManifestState = Map<string, ManifestEntry>;
