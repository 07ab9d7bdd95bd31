import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't apply the inner defaults of an object schema,
 * so undefined (and null) are replaced by {} before parsing.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Directory scan settings for hashing mode. */
export const ScanConfigSchema = z.object({
  /** Include files and directories whose name starts with a dot */
  include_hidden: z.boolean().default(false),
  /** Descend into symlinked directories (symlinked files are always hashed) */
  follow_symlinks: z.boolean().default(false),
  /** Glob patterns, relative to the scanned directory, to leave out */
  exclude: z.array(z.string()).default([]),
});

/** Cleanup mode settings. */
export const CleanupConfigSchema = z.object({
  /** Rewrite through a temporary file and rename */
  atomic_rewrite: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  log_level: LogLevelSchema.default('info'),
  scan: withDefaults(ScanConfigSchema),
  cleanup: withDefaults(CleanupConfigSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type CleanupConfig = z.infer<typeof CleanupConfigSchema>;
