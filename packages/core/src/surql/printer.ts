/**
 * Canonical Printer
 *
 * Renders an AST back to statement text. Parsing the printed text yields
 * an equal AST, so printing is the canonical form stored by the batch.
 */

import type { Data, Expression, Idiom, Output, RecordId, Statement, Target } from './ast';

const PLAIN_KEY = /^[A-Z_a-z]\w*$/;

const STRING_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  "'": "\\'",
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
  '\0': '\\0',
};

// eslint-disable-next-line no-control-regex
const NEEDS_ESCAPE = /[\\'\u0000-\u001f]/g;

/**
 * Single-quote `value`, escaping it so the lexer reads back the same string.
 */
export function quoteString(value: string): string {
  const body = value.replace(
    NEEDS_ESCAPE,
    (ch) => STRING_ESCAPES[ch] ?? `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
  return `'${body}'`;
}

function printIdiom(idiom: Idiom): string {
  return idiom.parts.join('.');
}

export function printRecordId(record: RecordId): string {
  const { key } = record;
  switch (key.kind) {
    case 'ident':
      return `${record.table}:${key.value}`;
    case 'number':
      return `${record.table}:${key.raw}`;
    case 'generator':
      return `${record.table}:${key.fn}()`;
    case 'escaped':
      return `${record.table}:⟨${key.value.replaceAll('\\', '\\\\').replaceAll('⟩', '\\⟩')}⟩`;
  }
}

export function printExpression(expression: Expression): string {
  switch (expression.kind) {
    case 'literal':
      if (expression.value === undefined) {
        return 'NONE';
      }
      return expression.value === null ? 'NULL' : String(expression.value);
    case 'string':
      return quoteString(expression.value);
    case 'number':
      return expression.raw;
    case 'object':
      if (expression.entries.length === 0) {
        return '{}';
      }
      return `{ ${expression.entries
        .map(({ key, value }) => `${PLAIN_KEY.test(key) ? key : quoteString(key)}: ${printExpression(value)}`)
        .join(', ')} }`;
    case 'array':
      return `[${expression.items.map(printExpression).join(', ')}]`;
    case 'param':
      return `$${expression.name}`;
    case 'idiom':
      return printIdiom(expression);
    case 'record':
      return printRecordId(expression);
    case 'call':
      return `${expression.name}(${expression.args.map(printExpression).join(', ')})`;
    case 'unary': {
      const operand = printExpression(expression.operand);
      // `--` would open a comment
      const gap = expression.operator === '-' && operand.startsWith('-') ? ' ' : '';
      return `${expression.operator}${gap}${operand}`;
    }
    case 'binary':
      return `${printExpression(expression.left)} ${expression.operator} ${printExpression(expression.right)}`;
    case 'group':
      return `(${printExpression(expression.inner)})`;
  }
}

function printTarget(target: Target): string {
  switch (target.kind) {
    case 'table':
      return target.name;
    case 'param':
      return `$${target.name}`;
    case 'record':
      return printRecordId(target);
  }
}

function printData(data?: Data): string {
  if (!data) {
    return '';
  }
  switch (data.kind) {
    case 'content':
      return ` CONTENT ${printExpression(data.value)}`;
    case 'merge':
      return ` MERGE ${printExpression(data.value)}`;
    case 'set':
      return ` SET ${data.assignments
        .map((a) => `${printIdiom(a.field)} ${a.operator} ${printExpression(a.value)}`)
        .join(', ')}`;
  }
}

function printOutput(output?: Output): string {
  if (!output) {
    return '';
  }
  if (output.kind === 'fields') {
    return ` RETURN ${output.fields.map(printIdiom).join(', ')}`;
  }
  return ` RETURN ${output.kind.toUpperCase()}`;
}

function printWhere(where?: Expression): string {
  return where ? ` WHERE ${printExpression(where)}` : '';
}

export function printStatement(statement: Statement): string {
  switch (statement.type) {
    case 'create':
      return `CREATE ${statement.targets.map(printTarget).join(', ')}${printData(statement.data)}${printOutput(statement.output)}`;

    case 'select': {
      let what = '*';
      if (statement.value) {
        what = `VALUE ${printExpression(statement.value)}`;
      } else if (statement.projections) {
        what = statement.projections
          .map((p) => (p.alias ? `${printExpression(p.expression)} AS ${p.alias}` : printExpression(p.expression)))
          .join(', ');
      }

      let sql = `SELECT ${what} FROM ${statement.from.map(printTarget).join(', ')}${printWhere(statement.where)}`;
      if (statement.order) {
        sql += ` ORDER BY ${statement.order.map((o) => `${printIdiom(o.field)} ${o.direction}`).join(', ')}`;
      }
      if (statement.limit) {
        sql += ` LIMIT ${printExpression(statement.limit)}`;
      }
      if (statement.start) {
        sql += ` START ${printExpression(statement.start)}`;
      }
      return sql;
    }

    case 'update':
    case 'upsert':
      return `${statement.type.toUpperCase()} ${statement.targets.map(printTarget).join(', ')}${printData(statement.data)}${printWhere(statement.where)}${printOutput(statement.output)}`;

    case 'delete':
      return `DELETE ${statement.targets.map(printTarget).join(', ')}${printWhere(statement.where)}${printOutput(statement.output)}`;

    case 'insert':
      return `INSERT INTO ${statement.table} ${printExpression(statement.values)}`;

    case 'relate':
      return `RELATE ${printTarget(statement.from)}->${statement.edge}->${printTarget(statement.to)}${printData(statement.data)}${printOutput(statement.output)}`;

    case 'let':
      return `LET $${statement.name} = ${printExpression(statement.value)}`;

    case 'return':
      return `RETURN ${printExpression(statement.value)}`;

    case 'begin':
    case 'commit':
    case 'cancel':
      return `${statement.type.toUpperCase()} TRANSACTION`;
  }
}
