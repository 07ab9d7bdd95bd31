/**
 * MD5 checksums of file contents.
 */
import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

export const CHECKSUM_ALGORITHM = 'md5';

/**
 * Hex digest of in-memory content.
 */
export function computeChecksum(content: string | Buffer): string {
  return createHash(CHECKSUM_ALGORITHM).update(content).digest('hex');
}

/**
 * Hex digest of a file's full contents, streamed from disk.
 */
export async function computeFileChecksum(filePath: string): Promise<string> {
  const hash = createHash(CHECKSUM_ALGORITHM);
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
