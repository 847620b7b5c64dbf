import { errorMessage } from './errors/custom-errors.js';
import { logger } from './utils/logger.js';

/**
 * Log anything that escapes the command handlers and exit with 1
 */
export function installProcessHandlers(): void {
  process.on('uncaughtException', (error) => {
    logger.error(`Uncaught exception: ${error.message}`);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
    process.exit(1);
  });
}
