/**
 * Structured logging utility for Charter Tracker
 *
 * Provides structured logging with levels, timestamps, and contextual metadata.
 * Console-based; JSON lines when `json` is set (or NODE_ENV=production),
 * single-line pretty output otherwise.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

interface LoggerSettings {
  level: LogLevel;
  json: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const getLogLevel = (): LogLevel => {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

// Shared by every logger so the CLI can switch verbosity after modules load
const settings: LoggerSettings = {
  level: getLogLevel(),
  json: process.env.NODE_ENV === 'production',
};

/**
 * Apply CLI-level logging options (--verbose, --json)
 */
export function configureLogging(options: Partial<LoggerSettings>): void {
  if (options.level !== undefined) settings.level = options.level;
  if (options.json !== undefined) settings.json = options.json;
}

export class Logger {
  constructor(private readonly service: string) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[settings.level];
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (!settings.json) {
      const metaStr = hasMetadata ? ` ${JSON.stringify(metadata)}` : '';
      return `[${timestamp}] ${level.toUpperCase()} ${this.service}: ${message}${metaStr}`;
    }

    return JSON.stringify({
      timestamp,
      level,
      service: this.service,
      message,
      ...(hasMetadata ? metadata : {}),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('debug')) return;
    console.debug(this.formatMessage('debug', message, metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('info')) return;
    console.info(this.formatMessage('info', message, metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('warn')) return;
    console.warn(this.formatMessage('warn', message, metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog('error')) return;
    console.error(this.formatMessage('error', message, metadata));
  }
}

// Default logger instance
export const logger = new Logger('charter-tracker');

/**
 * Create a child logger with additional context
 */
export function createLogger(context: { readonly module: string }): Logger {
  return new Logger(`charter-tracker:${context.module}`);
}
