/**
 * Structured Logging with Correlation IDs
 *
 * JSON lines on stdout/stderr. Every entry carries the correlation ID and
 * document from the AsyncLocalStorage context. LOG_LEVEL picks the floor
 * (debug | info | warn | error | silent).
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type Level = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<Level | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function threshold(): number {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  if (configured === 'debug' || configured === 'info' || configured === 'warn' ||
      configured === 'error' || configured === 'silent') {
    return LEVEL_ORDER[configured];
  }
  return process.env.NODE_ENV === 'production' ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

function enabled(level: Level): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

function formatLog(level: Level, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    correlationId: getCorrelationId(),
    documentId: reqContext?.documentId,
    documentType: reqContext?.documentType,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) console.log(formatLog('info', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLog('warn', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('error', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (enabled('debug')) console.debug(formatLog('debug', message, context));
  },
};
