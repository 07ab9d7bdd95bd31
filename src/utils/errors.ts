/**
 * Error types and codes for integrity-manifest.
 * Every error raised on purpose extends IntegrityError; node filesystem errors
 * propagate as they are.
 */

/**
 * Base error class carrying a stable code.
 */
export class IntegrityError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IntegrityError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Invalid command-line usage. The CLI prints the help text after the message.
 */
export class UsageError extends IntegrityError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'UsageError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends IntegrityError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * A manifest line that is not a valid record.
 */
export class ManifestError extends IntegrityError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ManifestError';
  }
}

/**
 * Problems with the directory handed to the scanner.
 */
export class ScanError extends IntegrityError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ScanError';
  }
}

export const ErrorCodes = {
  // Usage
  INVALID_MODE: 'U001',
  MISSING_OUTPUT: 'U002',
  MISSING_DIRECTORY: 'U003',

  // Configuration
  CONFIG_NOT_FOUND: 'C001',
  CONFIG_LOAD_ERROR: 'C002',
  CONFIG_INVALID: 'C003',

  // Manifest
  MANIFEST_PARSE_ERROR: 'M001',

  // Scanning
  DIRECTORY_NOT_FOUND: 'D001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
