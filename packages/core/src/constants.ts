/**
 * Constants
 *
 * Centralized configuration constants to eliminate magic numbers.
 * All timing values are in milliseconds unless otherwise noted.
 */

// ============ Transaction Markers ============

export const TRANSACTION_MARKERS = {
  BEGIN: 'BEGIN TRANSACTION;',
  COMMIT: 'COMMIT TRANSACTION;',
  CANCEL: 'CANCEL TRANSACTION;',
} as const;

/** Terminates every statement in a composite script */
export const STATEMENT_TERMINATOR = ';';

// ============ Connection Defaults ============

export const CONNECTION_DEFAULTS = {
  HOST: 'localhost',
  /** Default SurrealDB port */
  PORT: 8000,
  NAMESPACE: 'namespace',
  DATABASE: 'database',
  /** Default connection timeout (10 seconds) */
  CONNECTION_TIMEOUT: 10_000,
  /** Maximum port number */
  MAX_PORT: 65_535,
  /** Minimum port number */
  MIN_PORT: 1,
} as const;

// ============ Submit Defaults ============

export const SUBMIT_DEFAULTS = {
  /** Slow script threshold (1 second) */
  SLOW_SCRIPT_THRESHOLD: 1000,
  /** Longest script excerpt written to logs */
  LOG_EXCERPT_LENGTH: 200,
} as const;
