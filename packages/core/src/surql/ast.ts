/**
 * Statement AST
 *
 * Node shapes produced by the parser, consumed by the printer and the
 * in-memory engine.
 */

export type Expression =
  | Literal
  | StringLiteral
  | NumberLiteral
  | ObjectLiteral
  | ArrayLiteral
  | Param
  | Idiom
  | RecordId
  | FunctionCall
  | Unary
  | Binary
  | Group;

export interface Literal {
  kind: 'literal';
  value: boolean | null | undefined;
}

export interface StringLiteral {
  kind: 'string';
  value: string;
}

export interface NumberLiteral {
  kind: 'number';
  /** Source text, kept so `1.0` and `1` stay distinct */
  raw: string;
  value: number;
}

export interface ObjectLiteral {
  kind: 'object';
  entries: ObjectEntry[];
}

export interface ObjectEntry {
  key: string;
  value: Expression;
}

export interface ArrayLiteral {
  kind: 'array';
  items: Expression[];
}

export interface Param {
  kind: 'param';
  name: string;
}

/** Field path such as `name` or `address.city` */
export interface Idiom {
  kind: 'idiom';
  parts: string[];
}

export type RecordKey =
  | { kind: 'ident'; value: string }
  | { kind: 'number'; raw: string }
  | { kind: 'generator'; fn: 'uuid' | 'ulid' | 'rand' }
  | { kind: 'escaped'; value: string };

export interface RecordId {
  kind: 'record';
  table: string;
  key: RecordKey;
}

export interface FunctionCall {
  kind: 'call';
  name: string;
  args: Expression[];
}

export interface Unary {
  kind: 'unary';
  operator: '!' | '-';
  operand: Expression;
}

export type BinaryOperator =
  | '='
  | '!='
  | '=='
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | 'AND'
  | 'OR'
  | 'CONTAINS'
  | 'INSIDE'
  | 'IN';

export interface Binary {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface Group {
  kind: 'group';
  inner: Expression;
}

/** Where a statement reads from or writes to */
export type Target = { kind: 'table'; name: string } | RecordId | Param;

export interface Assignment {
  field: Idiom;
  operator: '=' | '+=' | '-=';
  value: Expression;
}

export type Data =
  | { kind: 'content'; value: Expression }
  | { kind: 'merge'; value: Expression }
  | { kind: 'set'; assignments: Assignment[] };

export type Output =
  | { kind: 'none' }
  | { kind: 'before' }
  | { kind: 'after' }
  | { kind: 'diff' }
  | { kind: 'fields'; fields: Idiom[] };

export interface Projection {
  expression: Expression;
  alias?: string;
}

export interface OrderTerm {
  field: Idiom;
  direction: 'ASC' | 'DESC';
}

export interface CreateStatement {
  type: 'create';
  targets: Target[];
  data?: Data;
  output?: Output;
}

export interface SelectStatement {
  type: 'select';
  /** Absent for `SELECT *` */
  projections?: Projection[];
  /** `SELECT VALUE expr` */
  value?: Expression;
  from: Target[];
  where?: Expression;
  order?: OrderTerm[];
  limit?: Expression;
  start?: Expression;
}

export interface UpdateStatement {
  type: 'update' | 'upsert';
  targets: Target[];
  data?: Data;
  where?: Expression;
  output?: Output;
}

export interface DeleteStatement {
  type: 'delete';
  targets: Target[];
  where?: Expression;
  output?: Output;
}

export interface InsertStatement {
  type: 'insert';
  table: string;
  /** A single object or an array of objects */
  values: Expression;
}

export interface RelateStatement {
  type: 'relate';
  from: Target;
  edge: string;
  to: Target;
  data?: Data;
  output?: Output;
}

export interface LetStatement {
  type: 'let';
  name: string;
  value: Expression;
}

export interface ReturnStatement {
  type: 'return';
  value: Expression;
}

export interface TransactionControlStatement {
  type: 'begin' | 'commit' | 'cancel';
}

export type Statement =
  | CreateStatement
  | SelectStatement
  | UpdateStatement
  | DeleteStatement
  | InsertStatement
  | RelateStatement
  | LetStatement
  | ReturnStatement
  | TransactionControlStatement;

export function isTransactionControl(
  statement: Statement,
): statement is TransactionControlStatement {
  return statement.type === 'begin' || statement.type === 'commit' || statement.type === 'cancel';
}
