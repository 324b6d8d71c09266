/**
 * Transaction
 *
 * Explicitly scoped unit of work on a borrowed session. A handle only
 * exists once the engine has accepted the begin marker; it is open until
 * a commit or rollback, after which it is spent. Each begin yields a new
 * handle.
 *
 * Boundaries are never retried: a retried commit could apply twice.
 *
 * @example
 * ```typescript
 * const tx = await Transaction.begin(session);
 * try {
 *   await tx.query("CREATE person:tobie CONTENT { name: 'Tobie' }");
 *   await tx.commit();
 * } catch (error) {
 *   if (tx.isOpen) {
 *     await tx.rollback();
 *   }
 *   throw error;
 * }
 * ```
 */

import { randomUUID } from 'node:crypto';

import { TRANSACTION_MARKERS } from '../constants';
import {
  ExecutionError,
  IndeterminateOutcomeError,
  ParseError,
  StateViolationError,
  TransactionError,
  toError,
} from '../errors';
import { isTransactionControl, parseScript, printStatement } from '../surql';
import { describeFailure, failedSlots } from '../utils';

import type { ResultSet, Session, SubmitOptions, TransactionOptions, TransactionState } from '../types';

type Boundary = 'begin' | 'commit' | 'rollback';

export class Transaction {
  readonly id: string;
  private _state: TransactionState = 'open';

  private constructor(
    private readonly session: Session,
    private readonly options: TransactionOptions,
  ) {
    this.id = randomUUID();
  }

  /**
   * Open a transaction on `session`. No handle is produced when the
   * engine rejects the begin marker.
   */
  static async begin(session: Session, options: TransactionOptions = {}): Promise<Transaction> {
    const transaction = new Transaction(session, options);
    await transaction.submitBoundary('begin', TRANSACTION_MARKERS.BEGIN);
    options.logger?.debug('Transaction started', { id: transaction.id, session: session.name });
    return transaction;
  }

  get state(): TransactionState {
    return this._state;
  }

  get isOpen(): boolean {
    return this._state === 'open';
  }

  /**
   * The session this handle borrows. It outlives the handle.
   */
  getSession(): Session {
    return this.session;
  }

  async commit(): Promise<void> {
    this.ensureOpen('commit');

    try {
      await this.submitBoundary('commit', TRANSACTION_MARKERS.COMMIT);
      this._state = 'committed';
      this.options.logger?.debug('Transaction committed', { id: this.id });
    } catch (error) {
      this._state = 'failed';
      this.options.logger?.error('Transaction commit failed; outcome must be checked by the caller', {
        id: this.id,
        error,
      });
      throw error;
    }
  }

  async rollback(): Promise<void> {
    this.ensureOpen('rollback');

    try {
      await this.submitBoundary('rollback', TRANSACTION_MARKERS.CANCEL);
      this._state = 'rolled_back';
      this.options.logger?.debug('Transaction rolled back', { id: this.id });
    } catch (error) {
      this._state = 'failed';
      this.options.logger?.error('Transaction rollback failed', { id: this.id, error });
      throw error;
    }
  }

  /**
   * Run statements inside the transaction. Failed statements raise an
   * ExecutionError and leave the transaction open for the caller to
   * roll back.
   */
  async query(text: string, options: SubmitOptions = {}): Promise<ResultSet> {
    this.ensureOpen('query');

    const statements = parseScript(text);
    if (statements.length === 0) {
      throw new ParseError('Statement is empty', text);
    }
    if (statements.some(isTransactionControl)) {
      throw new ParseError('Transaction boundaries are managed by the handle', text);
    }

    const script = statements.map((statement) => `${printStatement(statement)};`).join('\n');
    let resultSet: ResultSet;

    try {
      resultSet = await this.session.submit(script, options);
    } catch (error) {
      if (error instanceof IndeterminateOutcomeError) {
        throw new IndeterminateOutcomeError(error.message, 'query', this.id, error);
      }
      throw new ExecutionError(
        `Query failed in transaction: ${toError(error).message}`,
        script,
        undefined,
        toError(error),
      );
    }

    if (failedSlots(resultSet).length > 0) {
      throw new ExecutionError(
        `Query failed in transaction: ${describeFailure(resultSet) ?? 'unknown error'}`,
        script,
        resultSet,
      );
    }

    return resultSet;
  }

  /**
   * Alias for query()
   */
  async execute(text: string, options?: SubmitOptions): Promise<ResultSet> {
    return this.query(text, options);
  }

  // ============ Helpers ============

  private ensureOpen(operation: string): void {
    if (this._state !== 'open') {
      throw new StateViolationError(operation, this._state, this.id);
    }
  }

  private async submitBoundary(boundary: Boundary, marker: string): Promise<void> {
    let resultSet: ResultSet;

    try {
      resultSet = await this.session.submit(marker, {
        timeout: this.options.timeout,
        signal: this.options.signal,
      });
    } catch (error) {
      throw this.wrapFailure(boundary, error);
    }

    if (failedSlots(resultSet).length > 0) {
      throw new TransactionError(
        `Failed to ${boundary} transaction: ${describeFailure(resultSet) ?? 'unknown error'}`,
        this.id,
      );
    }
  }

  private wrapFailure(boundary: Boundary, error: unknown): TransactionError {
    if (error instanceof IndeterminateOutcomeError) {
      return new IndeterminateOutcomeError(
        `Outcome of transaction ${boundary} is unknown: ${error.message}`,
        boundary,
        this.id,
        error,
      );
    }

    const cause = toError(error);
    return new TransactionError(`Failed to ${boundary} transaction: ${cause.message}`, this.id, cause);
  }
}

/**
 * Open a transaction on `session`.
 */
export function beginTransaction(
  session: Session,
  options?: TransactionOptions,
): Promise<Transaction> {
  return Transaction.begin(session, options);
}
