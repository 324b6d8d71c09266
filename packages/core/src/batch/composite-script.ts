import { STATEMENT_TERMINATOR, TRANSACTION_MARKERS } from '../constants';

/**
 * Wrap statements between the begin and commit markers, one per line,
 * each terminated. Order is preserved.
 */
export function renderCompositeScript(statements: readonly string[]): string {
  return [
    TRANSACTION_MARKERS.BEGIN,
    ...statements.map((statement) => `${statement}${STATEMENT_TERMINATOR}`),
    TRANSACTION_MARKERS.COMMIT,
  ].join('\n');
}
