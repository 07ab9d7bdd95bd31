import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { loadConfig } from '../core/config/loader.js';
import { runHashing } from '../core/hashing/pipeline.js';
import { runCleanup } from '../core/cleanup/compactor.js';
import { UsageError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { getDetailedHelp, PROGRAM_NAME } from './help.js';
import { parseCliOptions, resolveLogLevel, type RawCliOptions } from './options.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))).version;

/**
 * Run one invocation and return the process exit code.
 */
export async function runCommand(options: RawCliOptions): Promise<number> {
  try {
    const request = parseCliOptions(options);
    const config = await loadConfig(options.config);
    logger.setLevel(resolveLogLevel(options, config));

    if (request.mode === 'hashing') {
      await runHashing({
        directory: request.directory,
        output: request.output,
        scan: {
          includeHidden: config.scan.include_hidden,
          followSymlinks: config.scan.follow_symlinks,
          exclude: config.scan.exclude,
        },
        logger,
      });
    } else {
      await runCleanup({
        output: request.output,
        atomic: config.cleanup.atomic_rewrite,
        logger,
      });
    }
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.log(error.message);
      console.log(getDetailedHelp());
      return 1;
    }
    logger.error(
      `${options.mode?.toLowerCase() ?? 'run'} failed`,
      error instanceof Error ? error : { error: String(error) }
    );
    return 1;
  }
}

/** Create the CLI program. */
export function createCli(): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description('Maintain a size-and-MD5 manifest for the files of a directory tree')
    .version(VERSION)
    .option('-d, --directory <directory>', 'Directory to process (hashing mode only)')
    .option('-o, --output <file>', 'Output (manifest) file')
    .option('-m, --mode <mode>', 'Mode: "hashing" or "cleanup"')
    .option('-c, --config <file>', 'YAML configuration file')
    .option('-q, --quiet', 'Only print errors')
    .option('--verbose', 'Print debug output')
    .helpOption('-h, --help', 'Print this help')
    .configureHelp({
      formatHelp: () => getDetailedHelp(),
    })
    .action(async (options: RawCliOptions) => {
      const exitCode = await runCommand(options);
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}
