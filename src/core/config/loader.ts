import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

/**
 * Default configuration values.
 * Used when no config file is given.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a YAML file.
 * Without a path the defaults apply; a path that does not exist is an error.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  if (!configPath) {
    return getDefaultConfig();
  }

  const fullPath = path.resolve(configPath);
  if (!(await fileExists(fullPath))) {
    throw new ConfigError(
      ErrorCodes.CONFIG_NOT_FOUND,
      `Config file not found: ${fullPath}`,
      { path: fullPath }
    );
  }

  // An empty YAML document has no value; treat it as "all defaults".
  const config = await loadYamlWithSchema(fullPath, ConfigSchema.nullish());
  return config ?? getDefaultConfig();
}
