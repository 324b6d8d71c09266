import type { ResultSet, TransactionState } from '../types';

export class DatabaseError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'DatabaseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConnectionError extends DatabaseError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

/**
 * The session could not deliver a script or the driver failed while doing so.
 */
export class SessionError extends DatabaseError {
  constructor(message: string, public script?: string, cause?: Error) {
    super(message, 'SESSION_ERROR', cause);
    this.name = 'SessionError';
  }
}

export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

/**
 * A statement did not parse. Never reaches the network.
 */
export class ParseError extends DatabaseError {
  constructor(
    message: string,
    public statement: string,
    public position?: SourcePosition,
  ) {
    super(
      position ? `${message} at line ${position.line}, column ${position.column}` : message,
      'PARSE_ERROR',
    );
    this.name = 'ParseError';
  }
}

/**
 * The engine rejected or failed a submitted script.
 * `resultSet` is set when the engine answered with failed slots.
 */
export class ExecutionError extends DatabaseError {
  constructor(
    message: string,
    public script: string,
    public resultSet?: ResultSet,
    cause?: Error,
  ) {
    super(message, 'EXECUTION_ERROR', cause);
    this.name = 'ExecutionError';
  }
}

export class TransactionError extends DatabaseError {
  constructor(message: string, public transactionId?: string, cause?: Error) {
    super(message, 'TRANSACTION_ERROR', cause);
    this.name = 'TransactionError';
  }
}

/**
 * A round-trip was interrupted after the script left the client.
 * Whether the engine applied it is unknown; re-read state before retrying.
 */
export class IndeterminateOutcomeError extends TransactionError {
  constructor(
    message: string,
    public operation: string,
    transactionId?: string,
    cause?: Error,
  ) {
    super(message, transactionId, cause);
    this.code = 'INDETERMINATE_OUTCOME';
    this.name = 'IndeterminateOutcomeError';
  }
}

/**
 * A transaction handle was used outside the open state. Programmer error.
 */
export class StateViolationError extends DatabaseError {
  constructor(
    public operation: string,
    public state: TransactionState,
    public transactionId?: string,
  ) {
    super(`Cannot ${operation}: transaction is ${state.replace('_', ' ')}`, 'STATE_VIOLATION');
    this.name = 'StateViolationError';
  }
}

export class TimeoutError extends DatabaseError {
  constructor(message: string, public timeout?: number, cause?: Error) {
    super(message, 'TIMEOUT_ERROR', cause);
    this.name = 'TimeoutError';
  }
}

export class ValidationError extends DatabaseError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
