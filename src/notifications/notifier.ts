import type { LogLevel } from '../utils/logger.js';

/**
 * Sink for user-facing messages of the update pipeline
 */
export type Notifier = {
  /**
   * Send a message at the given level
   */
  notify(level: LogLevel, message: string): void;

  /**
   * Update progress on the same line (overwrites previous output)
   */
  progress(message: string): void;

  /**
   * Finalize progress (add newline after last progress update)
   */
  endProgress(): void;
};
