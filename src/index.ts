#!/usr/bin/env node
import { binary, run } from 'cmd-ts';
import { cli } from './app.js';
import { errorMessage } from './errors/custom-errors.js';
import { installProcessHandlers } from './process-handlers.js';
import { logger } from './utils/logger.js';

/**
 * podcatch - mirror podcast feeds into local directories
 */

installProcessHandlers();

run(binary(cli), process.argv).catch((error: unknown) => {
  logger.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
