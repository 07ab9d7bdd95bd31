/**
 * Directory scanner - lists the regular files below a directory.
 */
import { globFiles, isDirectory, isFile } from '../../utils/file-system.js';
import { ScanError, ErrorCodes } from '../../utils/errors.js';

export interface ScanOptions {
  /** Include names starting with a dot (default: false) */
  includeHidden?: boolean;
  /** Descend into symlinked directories (default: false) */
  followSymlinks?: boolean;
  /** Glob patterns relative to the directory to leave out */
  exclude?: string[];
}

/**
 * Recursively list regular files under `directory`, including symbolic links
 * that resolve to one.
 *
 * Each path is `directory` as given, a `/`, then the path relative to it, so
 * `./data` yields `./data/a.txt`. Only trailing separators of `directory` are
 * dropped. Results are sorted.
 */
export async function listFiles(directory: string, options: ScanOptions = {}): Promise<string[]> {
  if (!(await isDirectory(directory))) {
    throw new ScanError(
      ErrorCodes.DIRECTORY_NOT_FOUND,
      `Directory not found: ${directory}`,
      { directory }
    );
  }

  // Symlink entries come back as they are; stat decides what they point to.
  const entries = await globFiles('**/*', {
    cwd: directory,
    ignore: options.exclude ?? [],
    absolute: false,
    dot: options.includeHidden ?? false,
    followSymbolicLinks: options.followSymlinks ?? false,
    onlyFiles: false,
  });

  const base = directory.replace(/[\\/]+$/, '');
  const files: string[] = [];
  for (const entry of entries) {
    const file = `${base}/${entry}`;
    if (await isFile(file)) {
      files.push(file);
    }
  }

  return files.sort();
}
