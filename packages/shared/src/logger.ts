/**
 * Structured Logging with Correlation IDs
 *
 * One JSON object per line. Correlation and document IDs are pulled from the
 * AsyncLocalStorage context; LOG_LEVEL sets the threshold. Info and debug
 * lines go to stdout unless reserveStdout() has handed stdout to program
 * output, in which case every level goes to stderr.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

const LEVELS = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
} as const;

type LogLevel = keyof typeof LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL || '').toLowerCase();
  if (isLogLevel(raw)) {
    return LEVELS[raw];
  }
  return process.env.NODE_ENV === 'production' ? LEVELS.info : LEVELS.debug;
}

let stdoutReserved = false;

/** Send every log level to stderr, leaving stdout for program output */
export function reserveStdout(reserved = true): void {
  stdoutReserved = reserved;
}

function writeOut(line: string, write: (line: string) => void): void {
  if (stdoutReserved) {
    console.error(line);
  } else {
    write(line);
  }
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVELS[level] >= threshold();
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    documentId: reqContext?.documentId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export function describeError(error: unknown): { message: string; name?: string; stack?: string } | string {
  return error instanceof Error
    ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      }
    : String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) writeOut(formatLog('INFO', message, context), (line) => console.log(line));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error: describeError(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) writeOut(formatLog('DEBUG', message, context), (line) => console.debug(line));
  },
};
