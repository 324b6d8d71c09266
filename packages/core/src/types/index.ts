/**
 * Database connection configuration
 * @example
 * ```typescript
 * const config: ConnectionConfig = {
 *   host: 'localhost',
 *   port: 8000,
 *   user: 'root',
 *   password: 'password',
 *   namespace: 'app',
 *   database: 'app',
 * };
 * ```
 */
export interface ConnectionConfig {
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  namespace?: string;
  database?: string;
  /** Use a TLS transport (wss) instead of plain ws */
  ssl?: boolean;
  connectionTimeout?: number;
}

/**
 * Outcome of one statement inside a submitted script.
 * The engine reports one slot per statement, in submission order.
 */
export type ResultSlot<T = unknown> = ResultSlotOk<T> | ResultSlotErr;

export interface ResultSlotOk<T = unknown> {
  status: 'OK';
  time: string;
  result: T;
}

export interface ResultSlotErr {
  status: 'ERR';
  time: string;
  detail: string;
}

export interface ResultSet<T = unknown> {
  slots: ResultSlot<T>[];
  duration?: number;
}

export interface SubmitOptions {
  /** Abort the round-trip; an in-flight abort yields an indeterminate outcome */
  signal?: AbortSignal;
  /** Milliseconds to wait for the engine before giving up */
  timeout?: number;
  bindings?: Record<string, unknown>;
}

/**
 * An established channel to the remote engine.
 *
 * Submit-and-wait: one script in, one positional result set out.
 * A session serves one transactional unit of work at a time.
 */
export interface Session {
  readonly name: string;
  readonly isConnected: boolean;
  submit(script: string, options?: SubmitOptions): Promise<ResultSet>;
}

export type TransactionState = 'open' | 'committed' | 'rolled_back' | 'failed';

export interface TransactionOptions {
  logger?: Logger;
  /** Applied to begin, commit and rollback round-trips */
  timeout?: number;
  signal?: AbortSignal;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
