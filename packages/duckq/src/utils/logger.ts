/**
 * Logging for CLI output.
 *
 * Components never reach for a global logger; the CLI builds one from config
 * and passes it down, so tests can swap in a capturing sink.
 */

/**
 * Log levels for filtering output.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * All accepted log level names, in increasing severity.
 */
export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Prefix every line with `YYYY-MM-DD HH:mm:ss - LEVEL - `.
   * @default false
   */
  timestamps?: boolean;

  /**
   * Clock used for timestamps.
   * @default () => new Date()
   */
  now?: () => Date;

  /**
   * Custom output function for info/debug messages.
   * @default console.log
   */
  stdout?: (...args: unknown[]) => void;

  /**
   * Custom output function for error/warning messages.
   * @default console.error
   */
  stderr?: (...args: unknown[]) => void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a date as local `YYYY-MM-DD HH:mm:ss`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Logger instance for CLI output.
 */
export class Logger {
  readonly level: LogLevel;
  private readonly timestamps: boolean;
  private readonly now: () => Date;
  private readonly stdout: (...args: unknown[]) => void;
  private readonly stderr: (...args: unknown[]) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.timestamps = options.timestamps ?? false;
    this.now = options.now ?? (() => new Date());
    this.stdout = options.stdout ?? console.log;
    this.stderr = options.stderr ?? console.error;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * With timestamps on, the level name replaces the plain-text prefix.
   */
  private format(level: Exclude<LogLevel, 'silent'>, plainPrefix: string, message: string): string {
    if (this.timestamps) {
      return `${formatTimestamp(this.now())} - ${level.toUpperCase()} - ${message}`;
    }
    return `${plainPrefix}${message}`;
  }

  /**
   * Logs a debug message.
   */
  debug(message: string): void {
    if (this.shouldLog('debug')) {
      this.stdout(this.format('debug', '[DEBUG] ', message));
    }
  }

  /**
   * Logs an info message.
   */
  info(message: string): void {
    if (this.shouldLog('info')) {
      this.stdout(this.format('info', '', message));
    }
  }

  /**
   * Logs a warning message.
   */
  warn(message: string): void {
    if (this.shouldLog('warn')) {
      this.stderr(this.format('warn', 'Warning: ', message));
    }
  }

  /**
   * Logs an error message.
   */
  error(message: string): void {
    if (this.shouldLog('error')) {
      this.stderr(this.format('error', 'Error: ', message));
    }
  }

  /**
   * Logs a list of items with bullet points.
   */
  list(items: readonly string[], indent = 2): void {
    if (this.shouldLog('info')) {
      const prefix = ' '.repeat(indent) + '- ';
      items.forEach(item => this.stdout(`${prefix}${item}`));
    }
  }

  /**
   * Logs a section header.
   */
  section(title: string): void {
    if (this.shouldLog('info')) {
      this.stdout(`\n${title}:`);
    }
  }
}

/**
 * Creates a new logger instance with custom options.
 *
 * @param options - Logger configuration
 * @returns New Logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
