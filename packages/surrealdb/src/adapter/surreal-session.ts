import { RecordId, Surreal } from 'surrealdb';
import {
  BaseSession,
  CONNECTION_DEFAULTS,
  ConnectionError,
  withTimeout,
} from '@batchline/core';

import type { BaseSessionOptions, ConnectionConfig, ResultSet, ResultSlot } from '@batchline/core';

/** Root credentials of a fresh local engine */
export const SURREAL_DEFAULTS = {
  USER: 'surreal',
  PASSWORD: 'password',
} as const;

export interface SurrealSessionOptions extends BaseSessionOptions {
  /** RPC path appended to the endpoint */
  rpcPath?: string;
}

/**
 * Fill in the local engine defaults for anything the caller left out.
 */
export function withSurrealDefaults(config: ConnectionConfig = {}): ConnectionConfig {
  return {
    ...config,
    host: config.host ?? CONNECTION_DEFAULTS.HOST,
    port: config.port ?? CONNECTION_DEFAULTS.PORT,
    user: config.user ?? SURREAL_DEFAULTS.USER,
    password: config.password ?? SURREAL_DEFAULTS.PASSWORD,
    namespace: config.namespace ?? CONNECTION_DEFAULTS.NAMESPACE,
    database: config.database ?? CONNECTION_DEFAULTS.DATABASE,
    ssl: config.ssl ?? false,
    connectionTimeout: config.connectionTimeout ?? CONNECTION_DEFAULTS.CONNECTION_TIMEOUT,
  };
}

export function endpointFor(config: ConnectionConfig, rpcPath = '/rpc'): string {
  const scheme = config.ssl ? 'wss' : 'ws';
  return `${scheme}://${config.host ?? CONNECTION_DEFAULTS.HOST}:${config.port ?? CONNECTION_DEFAULTS.PORT}${rpcPath}`;
}

/**
 * Record ids come back as objects; sessions report them as `table:key`.
 */
export function normalizeValue(value: unknown): unknown {
  if (value instanceof RecordId) {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(normalizeValue);
  }
  if (typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, normalizeValue(item)]));
  }
  return value;
}

export class SurrealSession extends BaseSession {
  readonly name = 'SurrealDB';

  private client?: Surreal;
  private readonly rpcPath: string;

  constructor(options: SurrealSessionOptions = {}) {
    super(options);
    this.rpcPath = options.rpcPath ?? '/rpc';
  }

  /**
   * Connect over WebSocket RPC, signing in as the configured root user.
   */
  override async connect(config: ConnectionConfig = {}): Promise<void> {
    return super.connect(withSurrealDefaults(config));
  }

  protected async doConnect(config: ConnectionConfig): Promise<void> {
    const endpoint = endpointFor(config, this.rpcPath);
    const client = new Surreal();

    const connecting = client.connect(endpoint, {
      namespace: config.namespace,
      database: config.database,
      auth:
        config.user !== undefined && config.password !== undefined
          ? { username: config.user, password: config.password }
          : undefined,
    });

    await (config.connectionTimeout
      ? withTimeout(connecting, config.connectionTimeout, `Connection to ${endpoint} timed out`)
      : connecting);

    this.client = client;
    this.logger?.debug('Opened SurrealDB connection', { endpoint });
  }

  protected async doDisconnect(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = undefined;
    }
  }

  protected async doSubmit(script: string, bindings?: Record<string, unknown>): Promise<ResultSet> {
    if (!this.client) {
      throw new ConnectionError('SurrealDB client not initialized');
    }

    const responses = await this.client.query_raw(script, bindings);

    const slots = responses.map((response): ResultSlot => {
      if (response.status === 'OK') {
        return { status: 'OK', time: response.time, result: normalizeValue(response.result) };
      }
      return { status: 'ERR', time: response.time, detail: String(response.result) };
    });

    return { slots };
  }
}
