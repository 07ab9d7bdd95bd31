/**
 * integrity-manifest - size-and-MD5 manifests for directory trees.
 * Library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Manifest records, loading and writing
export * from './core/manifest/index.js';

// Pipelines
export * from './core/hashing/index.js';
export * from './core/cleanup/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli, runCommand } from './cli/index.js';
export { parseCliOptions, type RunRequest, type RawCliOptions } from './cli/options.js';
