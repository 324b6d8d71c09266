/**
 * Statement Lexer
 *
 * Splits statement text into tokens. Keywords are not distinguished from
 * identifiers here; the parser matches them case-insensitively.
 */

import { ParseError } from '../errors';

import type { SourcePosition } from '../errors';

export type TokenType =
  | 'ident'
  | 'number'
  | 'string'
  | 'param'
  | 'escaped'
  | 'punct'
  | 'op'
  | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  start: number;
  end: number;
}

const PUNCTUATION = new Set(['(', ')', '{', '}', '[', ']', ',', ';', '.', '*']);

// Longest first
const OPERATORS = ['::', '->', '==', '!=', '<=', '>=', '+=', '-=', '&&', '||', '=', '<', '>', '+', '-', '/', '!', ':'];

const ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  '0': '\0',
  '/': '/',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

const HEX4 = /^[\dA-Fa-f]{4}$/;

const isIdentStart = (ch: string): boolean => /[A-Z_a-z]/.test(ch);
const isIdentPart = (ch: string): boolean => /\w/.test(ch);
const isDigit = (ch: string): boolean => ch >= '0' && ch <= '9';

export function positionAt(text: string, offset: number): SourcePosition {
  let line = 1;
  let column = 1;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === '\n') {
      line++;
      column = 1;
    } else {
      column++;
    }
  }
  return { offset, line, column };
}

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const fail = (message: string, at: number): never => {
    throw new ParseError(message, text, positionAt(text, at));
  };

  while (i < text.length) {
    const ch = text.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    // Line comments: --, //, #
    if (ch === '#' || (ch === '-' && text[i + 1] === '-') || (ch === '/' && text[i + 1] === '/')) {
      while (i < text.length && text[i] !== '\n') {
        i++;
      }
      continue;
    }

    const start = i;

    if (isIdentStart(ch)) {
      while (i < text.length && isIdentPart(text.charAt(i))) {
        i++;
      }
      tokens.push({ type: 'ident', value: text.slice(start, i), start, end: i });
      continue;
    }

    if (isDigit(ch)) {
      while (i < text.length && isDigit(text.charAt(i))) {
        i++;
      }
      if (text[i] === '.' && isDigit(text.charAt(i + 1))) {
        i++;
        while (i < text.length && isDigit(text.charAt(i))) {
          i++;
        }
      }
      if (isIdentStart(text.charAt(i))) {
        fail(`Invalid number '${text.slice(start, i + 1)}'`, start);
      }
      tokens.push({ type: 'number', value: text.slice(start, i), start, end: i });
      continue;
    }

    if (ch === "'" || ch === '"') {
      i++;
      let value = '';
      let closed = false;
      while (i < text.length) {
        const c = text.charAt(i);
        if (c === '\\') {
          const next = text.charAt(i + 1);
          if (next === 'u') {
            const hex = text.slice(i + 2, i + 6);
            if (!HEX4.test(hex)) {
              fail('Expected four hex digits after \\u', i);
            }
            value += String.fromCharCode(Number.parseInt(hex, 16));
            i += 6;
            continue;
          }
          value += ESCAPES[next] ?? fail(`Unknown escape sequence '\\${next}'`, i);
          i += 2;
          continue;
        }
        if (c === ch) {
          closed = true;
          i++;
          break;
        }
        value += c;
        i++;
      }
      if (!closed) {
        fail('Unterminated string', start);
      }
      tokens.push({ type: 'string', value, start, end: i });
      continue;
    }

    if (ch === '$') {
      i++;
      if (!isIdentStart(text.charAt(i))) {
        fail('Expected a parameter name after $', start);
      }
      while (i < text.length && isIdentPart(text.charAt(i))) {
        i++;
      }
      tokens.push({ type: 'param', value: text.slice(start + 1, i), start, end: i });
      continue;
    }

    if (ch === '⟨' || ch === '`') {
      const close = ch === '⟨' ? '⟩' : '`';
      let value = '';
      let closed = false;
      i++;
      while (i < text.length) {
        const c = text.charAt(i);
        const next = text.charAt(i + 1);
        if (c === '\\' && (next === close || next === '\\')) {
          value += next;
          i += 2;
          continue;
        }
        i++;
        if (c === close) {
          closed = true;
          break;
        }
        value += c;
      }
      if (!closed) {
        fail('Unterminated escaped identifier', start);
      }
      tokens.push({ type: 'escaped', value, start, end: i });
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      i++;
      tokens.push({ type: 'punct', value: ch, start, end: i });
      continue;
    }

    const operator = OPERATORS.find((op) => text.startsWith(op, i));
    if (operator) {
      i += operator.length;
      tokens.push({ type: 'op', value: operator, start, end: i });
      continue;
    }

    fail(`Unexpected character '${ch}'`, start);
  }

  tokens.push({ type: 'eof', value: '', start: text.length, end: text.length });
  return tokens;
}
