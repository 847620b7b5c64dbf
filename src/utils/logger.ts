import { createEnum } from './create-enum.js';

const logLevel = createEnum(['debug', 'info', 'success', 'warning', 'error', 'highlight'] as const);

export const LogLevel = logLevel.object;

export type LogLevel = typeof logLevel.type;

export const LogLevelSchema = logLevel.schema;

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
};

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

const EMOJI: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️',
  success: '✅',
  warning: '⚠️',
  error: '❌',
  highlight: '🌟',
};

/**
 * Logger class with colored console output
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? true,
    };
  }

  /**
   * Format date to human readable string (MM-DD HH:mm:ss)
   */
  private formatDate(date: Date): string {
    const month = (date.getMonth() + 1).toString().padStart(2, '0');
    const day = date.getDate().toString().padStart(2, '0');
    const hour = date.getHours().toString().padStart(2, '0');
    const min = date.getMinutes().toString().padStart(2, '0');
    const sec = date.getSeconds().toString().padStart(2, '0');
    return `${month}-${day} ${hour}:${min}:${sec}`;
  }

  private format(level: LogLevel, message: string): string {
    return `${this.formatDate(new Date())} ${EMOJI[level]} ${message}`;
  }

  private colorize(text: string, color: string): string {
    if (!this.config.useColors) return text;
    return `${color}${text}${colors.reset}`;
  }

  debug(message: string): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.format(LogLevel.DEBUG, this.colorize(message, colors.dim)));
    }
  }

  info(message: string): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.format(LogLevel.INFO, this.colorize(message, colors.blue)));
    }
  }

  success(message: string): void {
    if (this.shouldLog(LogLevel.SUCCESS)) {
      console.log(this.format(LogLevel.SUCCESS, this.colorize(message, colors.green)));
    }
  }

  warning(message: string): void {
    if (this.shouldLog(LogLevel.WARNING)) {
      console.log(this.format(LogLevel.WARNING, this.colorize(message, colors.yellow)));
    }
  }

  error(message: string): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.format(LogLevel.ERROR, this.colorize(message, colors.red)));
    }
  }

  highlight(message: string): void {
    if (this.shouldLog(LogLevel.HIGHLIGHT)) {
      console.log(this.format(LogLevel.HIGHLIGHT, this.colorize(message, colors.bright + colors.magenta)));
    }
  }

  /**
   * Check if message should be logged based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return logLevel.values.indexOf(level) >= logLevel.values.indexOf(this.config.level);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  setColors(useColors: boolean): void {
    this.config.useColors = useColors;
  }
}

// Default logger instance
export const logger: Logger = new Logger();
