/**
 * Structured logger for stop-departures-proxy
 *
 * Components never reach for a global logger; they receive the narrow
 * Logger interface below and the process entry point creates the winston
 * instance once at startup.
 */

import winston from 'winston';

/**
 * Logger interface for dependency injection
 */
export interface Logger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  serviceName: string;
  level?: LogLevel;
  environment?: string;
}

// Accepts both winston level names and the WARNING spelling used by
// older deployments of this service.
const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Resolve a log level from free-form configuration text.
 * Unknown or missing values fall back to DEFAULT_LOG_LEVEL.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return DEFAULT_LOG_LEVEL;
  }
  return LOG_LEVEL_ALIASES[value.trim().toLowerCase()] ?? DEFAULT_LOG_LEVEL;
}

export function createLogger(options: LoggerOptions): Logger {
  const logger = winston.createLogger({
    level: options.level ?? DEFAULT_LOG_LEVEL,
    defaultMeta: {
      service: options.serviceName,
      environment: options.environment ?? 'development',
    },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [new winston.transports.Console()],
  });

  return {
    info: (message, meta) => logger.info(message, meta),
    error: (message, meta) => logger.error(message, meta),
    warn: (message, meta) => logger.warn(message, meta),
    debug: (message, meta) => logger.debug(message, meta),
  };
}
