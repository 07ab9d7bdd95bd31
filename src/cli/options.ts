/**
 * Turns raw command-line options into a validated run request.
 */
import { UsageError, ErrorCodes } from '../utils/errors.js';
import type { LogLevel } from '../utils/logger.js';
import type { Config } from '../core/config/schema.js';

/** Options as commander hands them to the action. */
export interface RawCliOptions {
  directory?: string;
  output?: string;
  mode?: string;
  config?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export type Mode = 'hashing' | 'cleanup';

export type RunRequest =
  | { mode: 'hashing'; directory: string; output: string }
  | { mode: 'cleanup'; output: string };

function toMode(value: string | undefined): Mode | null {
  const mode = value?.toLowerCase();
  return mode === 'hashing' || mode === 'cleanup' ? mode : null;
}

/**
 * Validate the mode, then the output, then the directory (hashing only).
 */
export function parseCliOptions(raw: RawCliOptions): RunRequest {
  const mode = toMode(raw.mode);
  if (!mode) {
    throw new UsageError(
      ErrorCodes.INVALID_MODE,
      "The mode must be specified as either 'hashing' or 'cleanup'.",
      { mode: raw.mode }
    );
  }

  if (!raw.output) {
    throw new UsageError(ErrorCodes.MISSING_OUTPUT, 'The output file must be specified.');
  }

  if (mode === 'cleanup') {
    return { mode, output: raw.output };
  }

  if (!raw.directory) {
    throw new UsageError(
      ErrorCodes.MISSING_DIRECTORY,
      'In hashing mode, the directory must be specified.'
    );
  }
  return { mode, directory: raw.directory, output: raw.output };
}

/**
 * --quiet and --verbose win over the configured level.
 */
export function resolveLogLevel(raw: RawCliOptions, config: Config): LogLevel {
  if (raw.quiet) return 'error';
  if (raw.verbose) return 'debug';
  return config.log_level;
}
