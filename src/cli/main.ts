#!/usr/bin/env node
import { createCli } from './index.js';
import { logger } from '../utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Unexpected failure', error instanceof Error ? error : { error: String(error) });
    process.exit(1);
  });
