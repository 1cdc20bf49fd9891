/**
 * Structured logging utility with log levels
 *
 * Usage:
 *   import { createLogger } from '@/lib/logger';
 *   const log = createLogger('Compositor');
 *   log.debug('Window added', { id });
 *   log.info('Backend ready');
 *   log.warn('Frame over budget');
 *   log.error('Handler failed', error);
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

interface LoggerConfig {
  level: LogLevel;
  prefix: string;
}

/**
 * Resolve a level name ("debug", "WARN", ...) to a LogLevel.
 * Unknown names resolve to undefined.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

/**
 * Level from `WM_LOG_LEVEL`, else DEBUG in development and WARN otherwise.
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const fromEnv = parseLogLevel(env.WM_LOG_LEVEL);
  if (fromEnv !== undefined) return fromEnv;
  return env.NODE_ENV === 'development' ? LogLevel.DEBUG : LogLevel.WARN;
}

export class Logger {
  private config: LoggerConfig;
  private readonly parent: Logger | null;

  constructor(config?: Partial<LoggerConfig>, parent: Logger | null = null) {
    this.config = {
      level: resolveLogLevel(),
      prefix: '',
      ...config,
    };
    this.parent = parent;
  }

  private get level(): LogLevel {
    // Children follow the root level unless one was set on them directly
    return this.parent ? Math.max(this.parent.level, this.config.level) : this.config.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.level;
  }

  private formatMessage(message: string): string {
    return this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger with a specific prefix
   */
  child(prefix: string): Logger {
    return new Logger(
      {
        level: LogLevel.DEBUG,
        prefix: this.config.prefix ? `${this.config.prefix}:${prefix}` : prefix,
      },
      this
    );
  }

  /**
   * Set the log level at runtime
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

// Root logger instance
const logger = new Logger();

/**
 * Factory for creating module-specific loggers
 *
 * @example
 * const log = createLogger('GestureManager');
 * log.debug('Recognizer registered');
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}

/**
 * Change the level of every logger created through createLogger.
 */
export function setRootLogLevel(level: LogLevel): void {
  logger.setLevel(level);
}
