/**
 * Logger Utility
 * Provides structured logging with pino
 */

import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment variable
 */
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'info';
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development';
}

/**
 * Pretty printing in development, JSON otherwise
 */
function getTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }
  return undefined;
}

export const logger = pino({
  level: getLogLevel(),
  transport: getTransport(),
});

/**
 * Create a child logger with a specific component name
 */
export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export const clientLogger = createLogger('client');
export const storeLogger = createLogger('store');
export const configLogger = createLogger('config');
