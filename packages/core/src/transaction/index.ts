/**
 * Transaction Module
 *
 * Explicit begin/commit/rollback handles over a session.
 *
 * @module transaction
 */

export { Transaction, beginTransaction } from './transaction';
