/**
 * Lightweight logging utility.
 * Writes timestamped lines to the console, or to a custom sink.
 */

import { getSettings } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogSink = (level: MessageLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level to output, or a function read on every call */
  level?: LogLevel | (() => LogLevel);
  /** Where formatted lines go, defaults to the console */
  sink?: LogSink;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Format a log entry with timestamp, level and message
 */
export function formatLogEntry(
  level: MessageLevel,
  message: string,
  context?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const levelStr = level.toUpperCase().padEnd(5);
  let entry = `[${now.toISOString()}] [${levelStr}] ${message}`;
  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }
  return entry;
}

function consoleSink(level: MessageLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const levelOption = options.level ?? 'info';
  const threshold = (): LogLevel => (typeof levelOption === 'function' ? levelOption() : levelOption);

  function log(level: MessageLevel, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[threshold()]) {
      return;
    }
    sink(level, formatLogEntry(level, message, context));
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}

const defaultLogger = createLogger({ level: () => getSettings().logLevel });

let sharedLogger: Logger = defaultLogger;

/**
 * The process-wide logger used by steps, pipelines and stores
 */
export function getLogger(): Logger {
  return sharedLogger;
}

/**
 * Replace the process-wide logger; pass nothing to restore the default
 */
export function setLogger(logger?: Logger): void {
  sharedLogger = logger ?? defaultLogger;
}
