import { EventEmitter } from 'eventemitter3';

import {
  ConnectionError,
  DatabaseError,
  IndeterminateOutcomeError,
  SessionError,
  TimeoutError,
  toError,
} from './errors';
import { MiddlewareChain } from './middleware';
import { Transaction } from './transaction';
import { AbortedError, validateConnectionConfig, validateScript, withAbort, withTimeout } from './utils';

import type { SubmitMiddleware } from './middleware';
import type {
  ConnectionConfig,
  Logger,
  ResultSet,
  Session,
  SubmitOptions,
  TransactionOptions,
} from './types';

export interface BaseSessionOptions {
  logger?: Logger;
  middleware?: SubmitMiddleware[];
  /** Timeout for every submit that does not set its own */
  defaultTimeout?: number;
}

export interface SessionEvents {
  connect: (event: { config: ConnectionConfig }) => void;
  disconnect: () => void;
  submit: (event: { script: string; duration: number; slots: number }) => void;
  submitError: (event: { script: string; error: Error; duration: number }) => void;
}

export abstract class BaseSession extends EventEmitter<SessionEvents> implements Session {
  protected config?: ConnectionConfig;
  protected logger?: Logger;
  protected defaultTimeout?: number;
  protected readonly middleware = new MiddlewareChain();
  protected _isConnected = false;

  abstract readonly name: string;

  get isConnected(): boolean {
    return this._isConnected;
  }

  constructor(options: BaseSessionOptions = {}) {
    super();
    if (options.logger) {
      this.logger = options.logger;
    }
    if (options.defaultTimeout !== undefined) {
      this.defaultTimeout = options.defaultTimeout;
    }
    for (const middleware of options.middleware ?? []) {
      this.middleware.use(middleware);
    }
  }

  async connect(config: ConnectionConfig): Promise<void> {
    validateConnectionConfig(config);
    this.config = config;

    try {
      await this.doConnect(config);
      this._isConnected = true;
      this.emit('connect', { config });
      this.logger?.info(`Connected to ${this.name}`, {
        namespace: config.namespace,
        database: config.database,
      });
    } catch (error) {
      throw new ConnectionError(`Failed to connect to ${this.name}`, toError(error));
    }
  }

  async disconnect(): Promise<void> {
    if (!this._isConnected) {
      return;
    }

    try {
      await this.doDisconnect();
      this._isConnected = false;
      this.emit('disconnect');
      this.logger?.info(`Disconnected from ${this.name}`);
    } catch (error) {
      throw new ConnectionError(`Failed to disconnect from ${this.name}`, toError(error));
    }
  }

  /**
   * Send one script and wait for its result set.
   *
   * A signal that is already aborted fails without sending anything.
   * Aborting or timing out after the script was sent raises
   * IndeterminateOutcomeError: the engine may still apply it.
   */
  async submit(script: string, options: SubmitOptions = {}): Promise<ResultSet> {
    validateScript(script);

    if (!this._isConnected) {
      throw new ConnectionError(`Not connected to ${this.name}`);
    }

    if (options.signal?.aborted) {
      throw new SessionError('Submission aborted before it was sent', script);
    }

    const startTime = Date.now();
    const context = MiddlewareChain.createContext(script, options);

    try {
      const { resultSet } = await this.middleware.execute(context, async (ctx) => {
        const submitOptions = ctx.options ?? {};
        const timeout = submitOptions.timeout ?? this.defaultTimeout;

        let pending = this.doSubmit(ctx.script, submitOptions.bindings);
        if (timeout) {
          pending = withTimeout(pending, timeout, `Script timed out after ${timeout}ms`);
        }

        const result = await withAbort(pending, submitOptions.signal);
        return { resultSet: result, duration: Date.now() - ctx.startTime };
      });

      resultSet.duration = Date.now() - startTime;
      this.emit('submit', { script, duration: resultSet.duration, slots: resultSet.slots.length });
      return resultSet;
    } catch (error) {
      const failure = this.normalizeError(error, script);
      this.emit('submitError', { script, error: failure, duration: Date.now() - startTime });
      throw failure;
    }
  }

  /**
   * Open an explicit transaction on this session.
   */
  async beginTransaction(options?: TransactionOptions): Promise<Transaction> {
    return Transaction.begin(this, { logger: this.logger, ...options });
  }

  async ping(): Promise<boolean> {
    try {
      await this.submit('RETURN true;');
      return true;
    } catch (error) {
      this.logger?.debug(`Ping to ${this.name} failed`, { error });
      return false;
    }
  }

  protected abstract doConnect(config: ConnectionConfig): Promise<void>;
  protected abstract doDisconnect(): Promise<void>;
  protected abstract doSubmit(script: string, bindings?: Record<string, unknown>): Promise<ResultSet>;

  private normalizeError(error: unknown, script: string): DatabaseError {
    if (error instanceof AbortedError || error instanceof TimeoutError) {
      return new IndeterminateOutcomeError(
        `Script outcome is unknown: ${error.message}`,
        'submit',
        undefined,
        error,
      );
    }

    if (error instanceof DatabaseError) {
      return error;
    }

    const cause = toError(error);
    return new SessionError(`Submit failed: ${cause.message}`, script, cause);
  }
}
