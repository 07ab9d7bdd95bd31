/**
 * Manifest line format: one JSON object per line,
 * `{"file": "...", "md5": "...", "size": 123}`.
 */
import { z } from 'zod';
import { ManifestError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/format.js';
import type { ManifestRecord } from './types.js';

export const ManifestLineSchema = z.object({
  file: z.string().min(1),
  md5: z.string(),
  size: z.number().int().nonnegative(),
});

export type ManifestLine = z.infer<typeof ManifestLineSchema>;

export function serializeRecord(record: ManifestRecord): string {
  const line: ManifestLine = {
    file: record.file,
    md5: record.contentHash,
    size: record.size,
  };
  return JSON.stringify(line);
}

/**
 * Parse one manifest line. Throws ManifestError on invalid JSON or a wrong shape.
 */
export function parseRecord(line: string, lineNumber?: number): ManifestRecord {
  const where = lineNumber !== undefined ? ` at line ${lineNumber}` : '';

  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new ManifestError(
      ErrorCodes.MANIFEST_PARSE_ERROR,
      `Malformed manifest entry${where}: ${error instanceof Error ? error.message : String(error)}`,
      { line, lineNumber }
    );
  }

  const result = ManifestLineSchema.safeParse(raw);
  if (!result.success) {
    throw new ManifestError(
      ErrorCodes.MANIFEST_PARSE_ERROR,
      `Invalid manifest entry${where}: ${formatZodError(result.error)}`,
      { line, lineNumber, errors: result.error.issues }
    );
  }

  return {
    file: result.data.file,
    contentHash: result.data.md5,
    size: result.data.size,
  };
}
