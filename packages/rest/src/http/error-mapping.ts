import {
  ConnectionError,
  ExecutionError,
  IndeterminateOutcomeError,
  ParseError,
  SessionError,
  StateViolationError,
  TransactionError,
  ValidationError,
} from '@batchline/core';

import type { ErrorBody, RestResponse } from './types';

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

function respond(status: number, error: string, code?: string): RestResponse {
  const body: ErrorBody = code ? { error, code } : { error };
  return { status, body };
}

/**
 * Translate a failure into a response. Order matters: the indeterminate
 * outcome is a TransactionError too.
 */
export function mapErrorToResponse(error: unknown): RestResponse {
  if (error instanceof NotFoundError) {
    return respond(404, error.message);
  }

  if (error instanceof ValidationError || error instanceof ParseError) {
    return respond(400, error.message, error.code);
  }

  if (error instanceof IndeterminateOutcomeError) {
    return respond(503, error.message, error.code);
  }

  if (error instanceof StateViolationError) {
    return respond(500, error.message, error.code);
  }

  if (
    error instanceof ExecutionError ||
    error instanceof TransactionError ||
    error instanceof SessionError ||
    error instanceof ConnectionError
  ) {
    return respond(502, error.message, error.code);
  }

  return respond(500, 'Internal server error');
}
