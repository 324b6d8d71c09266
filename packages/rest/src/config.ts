/**
 * Application Configuration
 * Read from the environment, falling back to a local development setup.
 */

import { CONNECTION_DEFAULTS, ValidationError, validateConnectionConfig } from '@batchline/core';
import { withSurrealDefaults } from '@batchline/surrealdb';

import type { ConnectionConfig, LogLevel } from '@batchline/core';

export interface AppConfig {
  /** SurrealDB connection settings */
  database: ConnectionConfig;

  /** HTTP listener */
  server: {
    host: string;
    port: number;
  };

  logLevel: LogLevel;
}

export const APP_DEFAULTS = {
  HOST: '127.0.0.1',
  PORT: 8080,
  LOG_LEVEL: 'info',
} as const;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Define configuration helper
 */
export function defineConfig(config: AppConfig): AppConfig {
  return config;
}

function parsePort(value: string | undefined, field: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }

  const port = Number(value);
  if (
    !Number.isInteger(port) ||
    port < CONNECTION_DEFAULTS.MIN_PORT ||
    port > CONNECTION_DEFAULTS.MAX_PORT
  ) {
    throw new ValidationError(`${field} must be a port number, got '${value}'`, field);
  }
  return port;
}

function parseBoolean(value: string | undefined, field: string): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }

  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ValidationError(`${field} must be true or false, got '${value}'`, field);
  }
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value === '') {
    return APP_DEFAULTS.LOG_LEVEL;
  }

  const level = LOG_LEVELS.find((candidate) => candidate === value.toLowerCase());
  if (!level) {
    throw new ValidationError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${value}'`,
      'LOG_LEVEL',
    );
  }
  return level;
}

function optional(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * Load configuration from environment variables.
 * @throws ValidationError on a malformed value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const database = withSurrealDefaults({
    host: optional(env['SURREAL_HOST']),
    port: parsePort(env['SURREAL_PORT'], 'SURREAL_PORT'),
    user: optional(env['SURREAL_USER']),
    password: optional(env['SURREAL_PASS']),
    namespace: optional(env['SURREAL_NS']),
    database: optional(env['SURREAL_DB']),
    ssl: parseBoolean(env['SURREAL_SSL'], 'SURREAL_SSL'),
  });
  validateConnectionConfig(database);

  return defineConfig({
    database,
    server: {
      host: optional(env['APP_HOST']) ?? APP_DEFAULTS.HOST,
      port: parsePort(env['APP_PORT'], 'APP_PORT') ?? APP_DEFAULTS.PORT,
    },
    logLevel: parseLogLevel(env['LOG_LEVEL']),
  });
}
