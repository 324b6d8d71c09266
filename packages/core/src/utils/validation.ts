import { CONNECTION_DEFAULTS } from '../constants';
import { ValidationError } from '../errors';
import type { ConnectionConfig } from '../types';

export function validateConnectionConfig(config: ConnectionConfig): void {
  if (!config) {
    throw new ValidationError('Connection configuration is required');
  }

  if (!config.host) {
    throw new ValidationError('Host is required', 'host');
  }

  if (!config.namespace) {
    throw new ValidationError('Namespace is required', 'namespace');
  }

  if (!config.database) {
    throw new ValidationError('Database name is required', 'database');
  }

  if (
    config.port !== undefined &&
    (typeof config.port !== 'number' ||
      !Number.isInteger(config.port) ||
      config.port < CONNECTION_DEFAULTS.MIN_PORT ||
      config.port > CONNECTION_DEFAULTS.MAX_PORT)
  ) {
    throw new ValidationError('Port must be a number between 1 and 65535', 'port');
  }

  if (config.user !== undefined && config.password === undefined) {
    throw new ValidationError('Password is required when a user is given', 'password');
  }

  if (
    config.connectionTimeout &&
    (typeof config.connectionTimeout !== 'number' || config.connectionTimeout < 0)
  ) {
    throw new ValidationError('Connection timeout must be a non-negative number', 'connectionTimeout');
  }
}

export function validateScript(script: string): void {
  if (!script || typeof script !== 'string') {
    throw new ValidationError('Script must be a non-empty string');
  }

  if (script.trim().length === 0) {
    throw new ValidationError('Script cannot be empty');
  }
}
