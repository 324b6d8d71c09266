/**
 * Statement Grammar Module
 *
 * Lexer, parser and canonical printer for the SurrealQL subset accepted by
 * the batching layer.
 *
 * @module surql
 */

import { parseStatement } from './parser';
import { printStatement } from './printer';

export * from './ast';
export { tokenize, positionAt, type Token, type TokenType } from './lexer';
export { parseScript, parseStatement } from './parser';
export { printStatement, printExpression, printRecordId, quoteString } from './printer';

/**
 * Parse one statement and return its canonical text.
 */
export function canonicalize(text: string): string {
  return printStatement(parseStatement(text));
}
