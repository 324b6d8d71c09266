/**
 * Expression evaluation for the in-memory engine.
 */

import { randomUUID } from 'node:crypto';

import type { Expression, RecordId } from '../surql';

export type Row = Record<string, unknown>;

/**
 * Raised for statement-level failures; becomes an ERR result slot.
 */
export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

export interface Scope {
  row?: Row;
  params: Map<string, unknown>;
}

const PLAIN_KEY = /^[A-Z_a-z]\w*$/;

/**
 * Resolve a record id to `table` and the key text used for storage.
 * Generator keys are filled in here.
 */
export function resolveRecordId(record: RecordId): { table: string; key: string; id: string } {
  const { key } = record;
  let keyText: string;

  switch (key.kind) {
    case 'ident':
      keyText = key.value;
      break;
    case 'number':
      keyText = key.raw;
      break;
    case 'escaped':
      keyText = PLAIN_KEY.test(key.value) ? key.value : `⟨${key.value}⟩`;
      break;
    case 'generator':
      keyText = `⟨${randomUUID()}⟩`;
      break;
  }

  return { table: record.table, key: keyText, id: `${record.table}:${keyText}` };
}

/** Split a stored id such as `person:tobie` */
export function splitRecordId(value: unknown): { table: string; key: string } | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const index = value.indexOf(':');
  if (index <= 0 || index === value.length - 1) {
    return undefined;
  }
  return { table: value.slice(0, index), key: value.slice(index + 1) };
}

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getPath(source: unknown, parts: readonly string[]): unknown {
  let current = source;
  for (const part of parts) {
    if (!isRow(current)) {
      return null;
    }
    current = current[part];
  }
  return current ?? null;
}

export function setPath(target: Row, parts: readonly string[], value: unknown): void {
  const [head, ...rest] = parts;
  if (head === undefined) {
    return;
  }
  if (rest.length === 0) {
    target[head] = value;
    return;
  }
  const child = target[head];
  const next: Row = isRow(child) ? child : {};
  target[head] = next;
  setPath(next, rest, value);
}

function equals(left: unknown, right: unknown): boolean {
  if (typeof left === 'object' || typeof right === 'object') {
    return JSON.stringify(left) === JSON.stringify(right);
  }
  return left === right;
}

function truthy(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isRow(value)) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}

function compare(left: unknown, right: unknown): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  return String(left).localeCompare(String(right));
}

function numeric(value: unknown, operator: string): number {
  if (typeof value !== 'number') {
    throw new EngineError(`Cannot apply '${operator}' to ${JSON.stringify(value)}`);
  }
  return value;
}

function contains(haystack: unknown, needle: unknown): boolean {
  if (Array.isArray(haystack)) {
    return haystack.some((item) => equals(item, needle));
  }
  if (typeof haystack === 'string' && typeof needle === 'string') {
    return haystack.includes(needle);
  }
  return false;
}

function callFunction(name: string, args: unknown[]): unknown {
  const [first, second] = args;

  switch (name.toLowerCase()) {
    case 'uuid':
    case 'rand::uuid':
      return randomUUID();
    case 'time::now':
      return new Date().toISOString();
    case 'count':
      return args.length === 0 ? 1 : Array.isArray(first) ? first.length : truthy(first) ? 1 : 0;
    case 'array::len':
      return Array.isArray(first) ? first.length : 0;
    case 'string::uppercase':
      return String(first).toUpperCase();
    case 'string::lowercase':
      return String(first).toLowerCase();
    case 'string::len':
      return String(first).length;
    case 'type::thing':
      return `${String(first)}:${String(second)}`;
    default:
      throw new EngineError(`Unknown function '${name}()'`);
  }
}

export function evaluate(expression: Expression, scope: Scope): unknown {
  switch (expression.kind) {
    case 'literal':
      return expression.value ?? null;
    case 'string':
      return expression.value;
    case 'number':
      return expression.value;
    case 'object': {
      const result: Row = {};
      for (const entry of expression.entries) {
        result[entry.key] = evaluate(entry.value, scope);
      }
      return result;
    }
    case 'array':
      return expression.items.map((item) => evaluate(item, scope));
    case 'param':
      return scope.params.get(expression.name) ?? null;
    case 'idiom':
      return getPath(scope.row, expression.parts);
    case 'record':
      return resolveRecordId(expression).id;
    case 'call':
      return callFunction(
        expression.name,
        expression.args.map((arg) => evaluate(arg, scope)),
      );
    case 'unary': {
      const operand = evaluate(expression.operand, scope);
      return expression.operator === '!' ? !truthy(operand) : -numeric(operand, '-');
    }
    case 'group':
      return evaluate(expression.inner, scope);
    case 'binary': {
      const { operator } = expression;

      if (operator === 'AND') {
        return truthy(evaluate(expression.left, scope)) && truthy(evaluate(expression.right, scope));
      }
      if (operator === 'OR') {
        return truthy(evaluate(expression.left, scope)) || truthy(evaluate(expression.right, scope));
      }

      const left = evaluate(expression.left, scope);
      const right = evaluate(expression.right, scope);

      switch (operator) {
        case '=':
        case '==':
          return equals(left, right);
        case '!=':
          return !equals(left, right);
        case '<':
          return compare(left, right) < 0;
        case '<=':
          return compare(left, right) <= 0;
        case '>':
          return compare(left, right) > 0;
        case '>=':
          return compare(left, right) >= 0;
        case '+':
          if (typeof left === 'string' || typeof right === 'string') {
            return `${String(left)}${String(right)}`;
          }
          return numeric(left, '+') + numeric(right, '+');
        case '-':
          return numeric(left, '-') - numeric(right, '-');
        case '*':
          return numeric(left, '*') * numeric(right, '*');
        case '/':
          return numeric(left, '/') / numeric(right, '/');
        case 'CONTAINS':
          return contains(left, right);
        case 'INSIDE':
        case 'IN':
          return contains(right, left);
      }
    }
  }
}

export function matches(where: Expression | undefined, scope: Scope): boolean {
  return where ? truthy(evaluate(where, scope)) : true;
}
