import { type Logger, LogLevel, logger as defaultLogger } from '../utils/logger.js';
import type { Notifier } from './notifier.js';

type ProgressStream = { write(chunk: string): boolean };

/**
 * Console notifier: messages go through the logger, progress rewrites one terminal line
 */
export class ConsoleNotifier implements Notifier {
  private lastProgressLength = 0;

  constructor(
    private readonly log: Logger = defaultLogger,
    private readonly out: ProgressStream = process.stdout,
  ) {}

  notify(level: LogLevel, message: string): void {
    // An active progress line would otherwise be glued to the log output
    this.clearProgress();

    switch (level) {
      case LogLevel.DEBUG:
        this.log.debug(message);
        break;
      case LogLevel.INFO:
        this.log.info(message);
        break;
      case LogLevel.SUCCESS:
        this.log.success(message);
        break;
      case LogLevel.WARNING:
        this.log.warning(message);
        break;
      case LogLevel.ERROR:
        this.log.error(message);
        break;
      case LogLevel.HIGHLIGHT:
        this.log.highlight(message);
        break;
    }
  }

  progress(message: string): void {
    if (this.lastProgressLength > 0) {
      this.out.write(`\r${' '.repeat(this.lastProgressLength)}\r`);
    }

    this.out.write(`\r${message}`);
    this.lastProgressLength = message.length;
  }

  endProgress(): void {
    if (this.lastProgressLength > 0) {
      this.out.write('\n');
      this.lastProgressLength = 0;
    }
  }

  private clearProgress(): void {
    if (this.lastProgressLength > 0) {
      this.out.write(`\r${' '.repeat(this.lastProgressLength)}\r`);
      this.lastProgressLength = 0;
    }
  }
}
