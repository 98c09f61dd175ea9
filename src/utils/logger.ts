/**
 * Structured logging utility for the fsmonitor bridge
 *
 * Provides consistent logging with levels, structured metadata, and
 * environment-based configuration. Everything goes to stderr: stdout carries
 * the protocol and must never see a log line.
 */

import { chalkStderr } from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMetadata {
  [key: string]: LogValue;
}

const LEVEL_COLORS: Record<string, (text: string) => string> = {
  DEBUG: (text) => chalkStderr.gray(text),
  INFO: (text) => chalkStderr.cyan(text),
  WARN: (text) => chalkStderr.yellow(text),
  ERROR: (text) => chalkStderr.red.bold(text),
};

export function parseLogLevel(level: string | undefined, fallback: LogLevel): LogLevel {
  if (!level) return fallback;

  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

export interface FormatOptions {
  timestamp?: Date;
  color?: boolean;
}

/**
 * Render one log line: `[timestamp] [LEVEL] message {meta}`
 */
export function formatLogLine(
  level: string,
  message: string,
  meta?: LogMetadata,
  options: FormatOptions = {}
): string {
  const timestamp = (options.timestamp ?? new Date()).toISOString();
  const colorize = options.color ? LEVEL_COLORS[level] : undefined;
  const levelTag = colorize ? colorize(`[${level}]`) : `[${level}]`;
  const prefix = `[${timestamp}] ${levelTag}`;

  if (meta && Object.keys(meta).length > 0) {
    return `${prefix} ${message} ${JSON.stringify(meta)}`;
  }

  return `${prefix} ${message}`;
}

class Logger {
  private level: LogLevel;
  private quiet: boolean;

  constructor() {
    this.quiet = process.env.FSMONITOR_QUIET === 'true';
    this.level = parseLogLevel(process.env.FSMONITOR_LOG_LEVEL, this.quiet ? LogLevel.ERROR : LogLevel.WARN);
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.level;
  }

  private write(level: string, message: string, meta?: LogMetadata): void {
    const line = formatLogLine(level, message, meta, { color: process.stderr.isTTY === true });
    process.stderr.write(`${line}\n`);
  }

  debug(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    this.write('DEBUG', message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    this.write('INFO', message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    this.write('WARN', message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    const errorMeta = {
      ...meta,
      ...(error instanceof Error
        ? {
            errorMessage: error.message,
            errorStack: error.stack,
            errorName: error.name,
          }
        : error === undefined
          ? {}
          : { error: String(error) }),
    };

    this.write('ERROR', message, errorMeta);
  }

  /**
   * Quiet mode (FSMONITOR_QUIET) keeps everything below ERROR suppressed
   */
  setLevel(level: LogLevel): void {
    this.level = this.quiet && level < LogLevel.ERROR ? LogLevel.ERROR : level;
  }
}

// Export singleton instance
export const logger = new Logger();

export const log = {
  debug: (message: string, meta?: LogMetadata) => logger.debug(message, meta),
  info: (message: string, meta?: LogMetadata) => logger.info(message, meta),
  warn: (message: string, meta?: LogMetadata) => logger.warn(message, meta),
  error: (message: string, error?: unknown, meta?: LogMetadata) =>
    logger.error(message, error, meta),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
