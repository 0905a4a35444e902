/**
 * Service configuration
 *
 * Read once at startup from environment variables. Every setting has a
 * default; malformed numeric values fail startup with ConfigError.
 */

import { type LogLevel, parseLogLevel } from './utils/logger.js';

export const DEFAULT_TRANSIT_API_URL =
  'https://api.digitransit.fi/routing/v1/routers/hsl/index/graphql';

export interface ServiceConfig {
  port: number;
  serviceName: string;
  environment: string;
  logLevel: LogLevel;
  transitApi: {
    url: string;
    timeoutMs: number;
    apiKey?: string;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function readPositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Invalid value for environment variable ${name}: ${raw}`);
  }
  return value;
}

/**
 * Build the service configuration from environment variables
 *
 * LOG_LEVEL takes precedence over HSLPROXY_LOG_LEVEL.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const apiKey = env.TRANSIT_API_KEY?.trim();

  return {
    port: readPositiveInt(env, 'PORT', 3000),
    serviceName: env.SERVICE_NAME || 'stop-departures-proxy',
    environment: env.NODE_ENV || 'development',
    logLevel: parseLogLevel(env.LOG_LEVEL || env.HSLPROXY_LOG_LEVEL),
    transitApi: {
      url: env.TRANSIT_API_URL || DEFAULT_TRANSIT_API_URL,
      timeoutMs: readPositiveInt(env, 'TRANSIT_API_TIMEOUT_MS', 5000),
      ...(apiKey ? { apiKey } : {}),
    },
  };
}
