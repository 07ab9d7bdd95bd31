/**
 * Detailed help text, printed for -h/--help and after every usage error.
 */

export const PROGRAM_NAME = 'integrity-manifest';

export function getDetailedHelp(): string {
  return `Usage: ${PROGRAM_NAME} [options]

This tool offers two distinct modes: hashing and cleanup.

Hashing mode: Files in a given directory are processed by calculating their MD5 hash and size.
The results are appended to the output file in JSON Lines format.
If the file size has not changed since a previous run, the hash calculation is skipped.

Cleanup mode: Rewrite the output file, removing entries of files that have been deleted
and keeping only the latest entry for files that appear more than once.

  -d, --directory DIRECTORY       Directory to process. (Hashing mode only)
  -o, --output FILE               Output (manifest) file.
  -m, --mode MODE                 Mode: "hashing" or "cleanup".
  -c, --config FILE               Optional YAML configuration file.
  -q, --quiet                     Only print errors.
      --verbose                   Print debug output.
  -V, --version                   Print the version.
  -h, --help                      Print this help.

Example usage:

  ${PROGRAM_NAME} -d /path/to/your/directory -o /path/to/your/manifest.jsonl -m hashing
  ${PROGRAM_NAME} -o /path/to/your/manifest.jsonl -m cleanup
`;
}
