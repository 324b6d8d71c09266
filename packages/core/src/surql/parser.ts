/**
 * Statement Parser
 *
 * Recursive-descent parser for the SurrealQL subset the batching layer
 * accepts. Produces the AST in `./ast`; errors are raised as ParseError
 * carrying the offending text and position.
 */

import { ParseError } from '../errors';
import { positionAt, tokenize } from './lexer';

import type { Token } from './lexer';
import type {
  Assignment,
  BinaryOperator,
  Data,
  Expression,
  Idiom,
  ObjectEntry,
  OrderTerm,
  Output,
  Projection,
  RecordId,
  RecordKey,
  SelectStatement,
  Statement,
  Target,
} from './ast';

const RECORD_GENERATORS = ['uuid', 'ulid', 'rand'] as const;

const TRANSACTION_CONTROL: Record<string, 'begin' | 'commit' | 'cancel'> = {
  BEGIN: 'begin',
  COMMIT: 'commit',
  CANCEL: 'cancel',
};

const ASSIGNMENT_OPERATORS: Record<string, Assignment['operator']> = {
  '=': '=',
  '+=': '+=',
  '-=': '-=',
};

const COMPARISON_OPERATORS: Record<string, BinaryOperator> = {
  '=': '=',
  '!=': '!=',
  '==': '==',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
};

const COMPARISON_KEYWORDS: Record<string, BinaryOperator> = {
  CONTAINS: 'CONTAINS',
  INSIDE: 'INSIDE',
  IN: 'IN',
};

class Parser {
  private index = 0;

  constructor(
    private readonly text: string,
    private readonly tokens: Token[],
  ) {}

  parseScript(): Statement[] {
    const statements: Statement[] = [];

    while (!this.atEnd()) {
      if (this.matchPunct(';')) {
        continue;
      }
      statements.push(this.parseStatement());
      if (!this.atEnd() && !this.matchPunct(';')) {
        this.unexpected();
      }
    }

    return statements;
  }

  // ============ Statements ============

  private parseStatement(): Statement {
    const token = this.peek();
    if (token.type !== 'ident') {
      return this.unexpected();
    }

    switch (token.value.toUpperCase()) {
      case 'CREATE': {
        this.advance();
        const targets = this.parseTargets();
        const data = this.parseData();
        const output = this.parseOutput();
        return { type: 'create', targets, data, output };
      }
      case 'SELECT':
        this.advance();
        return this.parseSelect();
      case 'UPDATE':
      case 'UPSERT': {
        this.advance();
        const type = token.value.toUpperCase() === 'UPDATE' ? 'update' : 'upsert';
        const targets = this.parseTargets();
        const data = this.parseData();
        const where = this.parseWhere();
        const output = this.parseOutput();
        return { type, targets, data, where, output };
      }
      case 'DELETE': {
        this.advance();
        this.matchKeyword('FROM');
        const targets = this.parseTargets();
        const where = this.parseWhere();
        const output = this.parseOutput();
        return { type: 'delete', targets, where, output };
      }
      case 'INSERT': {
        this.advance();
        this.expectKeyword('INTO');
        const table = this.expectIdent();
        const values = this.parseExpression();
        if (values.kind !== 'object' && values.kind !== 'array' && values.kind !== 'param') {
          this.fail('INSERT expects an object or an array of objects', this.previous());
        }
        return { type: 'insert', table, values };
      }
      case 'RELATE': {
        this.advance();
        const from = this.parseTarget();
        this.expectOp('->');
        const edge = this.expectIdent();
        this.expectOp('->');
        const to = this.parseTarget();
        const data = this.parseData();
        const output = this.parseOutput();
        return { type: 'relate', from, edge, to, data, output };
      }
      case 'LET': {
        this.advance();
        const param = this.advance();
        if (param.type !== 'param') {
          this.fail('Expected a parameter after LET', param);
        }
        this.expectOp('=');
        return { type: 'let', name: param.value, value: this.parseExpression() };
      }
      case 'RETURN':
        this.advance();
        return { type: 'return', value: this.parseExpression() };
      case 'BEGIN':
      case 'COMMIT':
      case 'CANCEL': {
        this.advance();
        this.matchKeyword('TRANSACTION');
        return { type: TRANSACTION_CONTROL[token.value.toUpperCase()] ?? 'begin' };
      }
      default:
        return this.fail(`Unknown statement '${token.value}'`, token);
    }
  }

  private parseSelect(): SelectStatement {
    const statement: SelectStatement = { type: 'select', from: [] };

    if (this.matchPunct('*')) {
      // SELECT *
    } else if (this.matchKeyword('VALUE')) {
      statement.value = this.parseExpression();
    } else {
      const projections: Projection[] = [];
      do {
        const expression = this.parseExpression();
        const alias = this.matchKeyword('AS') ? this.expectIdent() : undefined;
        projections.push(alias ? { expression, alias } : { expression });
      } while (this.matchPunct(','));
      statement.projections = projections;
    }

    this.expectKeyword('FROM');
    statement.from = this.parseTargets();
    statement.where = this.parseWhere();

    if (this.matchKeyword('ORDER')) {
      this.matchKeyword('BY');
      const order: OrderTerm[] = [];
      do {
        const field = this.parseIdiom();
        let direction: OrderTerm['direction'] = 'ASC';
        if (this.matchKeyword('DESC')) {
          direction = 'DESC';
        } else {
          this.matchKeyword('ASC');
        }
        order.push({ field, direction });
      } while (this.matchPunct(','));
      statement.order = order;
    }

    if (this.matchKeyword('LIMIT')) {
      this.matchKeyword('BY');
      statement.limit = this.parseExpression();
    }

    if (this.matchKeyword('START')) {
      this.matchKeyword('AT');
      statement.start = this.parseExpression();
    }

    return statement;
  }

  // ============ Clauses ============

  private parseTargets(): Target[] {
    const targets: Target[] = [];
    do {
      targets.push(this.parseTarget());
    } while (this.matchPunct(','));
    return targets;
  }

  private parseTarget(): Target {
    const token = this.peek();

    if (token.type === 'param') {
      this.advance();
      return { kind: 'param', name: token.value };
    }

    if (token.type === 'ident') {
      this.advance();
      if (this.adjacentColon()) {
        return this.parseRecordId(token.value);
      }
      return { kind: 'table', name: token.value };
    }

    return this.unexpected();
  }

  private parseData(): Data | undefined {
    if (this.matchKeyword('CONTENT')) {
      return { kind: 'content', value: this.parseExpression() };
    }

    if (this.matchKeyword('MERGE')) {
      return { kind: 'merge', value: this.parseExpression() };
    }

    if (this.matchKeyword('SET')) {
      const assignments: Assignment[] = [];
      do {
        const field = this.parseIdiom();
        const token = this.advance();
        const operator = token.type === 'op' ? ASSIGNMENT_OPERATORS[token.value] : undefined;
        if (!operator) {
          return this.fail("Expected '=', '+=' or '-='", token);
        }
        assignments.push({ field, operator, value: this.parseExpression() });
      } while (this.matchPunct(','));
      return { kind: 'set', assignments };
    }

    return undefined;
  }

  private parseWhere(): Expression | undefined {
    return this.matchKeyword('WHERE') ? this.parseExpression() : undefined;
  }

  private parseOutput(): Output | undefined {
    if (!this.matchKeyword('RETURN')) {
      return undefined;
    }

    for (const kind of ['none', 'before', 'after', 'diff'] as const) {
      if (this.matchKeyword(kind.toUpperCase())) {
        return { kind };
      }
    }

    const fields: Idiom[] = [];
    do {
      fields.push(this.parseIdiom());
    } while (this.matchPunct(','));
    return { kind: 'fields', fields };
  }

  private parseIdiom(): Idiom {
    const parts = [this.expectIdent()];
    while (this.matchPunct('.')) {
      parts.push(this.expectIdent());
    }
    return { kind: 'idiom', parts };
  }

  private parseRecordId(table: string): RecordId {
    const token = this.advance();
    let key: RecordKey;

    if (token.type === 'ident') {
      const generator = RECORD_GENERATORS.find((fn) => fn === token.value);
      if (generator && this.peekIs('punct', '(')) {
        this.advance();
        this.expectPunct(')');
        key = { kind: 'generator', fn: generator };
      } else {
        key = { kind: 'ident', value: token.value };
      }
    } else if (token.type === 'number') {
      key = { kind: 'number', raw: token.value };
    } else if (token.type === 'escaped') {
      key = { kind: 'escaped', value: token.value };
    } else {
      return this.fail(`Invalid record key for '${table}'`, token);
    }

    return { kind: 'record', table, key };
  }

  // ============ Expressions ============

  private parseExpression(): Expression {
    return this.parseOr();
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.matchKeyword('OR') || this.matchOp('||')) {
      left = { kind: 'binary', operator: 'OR', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseComparison();
    while (this.matchKeyword('AND') || this.matchOp('&&')) {
      left = { kind: 'binary', operator: 'AND', left, right: this.parseComparison() };
    }
    return left;
  }

  private parseComparison(): Expression {
    let left = this.parseAdditive();

    for (;;) {
      const token = this.peek();
      const operator =
        token.type === 'op'
          ? COMPARISON_OPERATORS[token.value]
          : token.type === 'ident'
            ? COMPARISON_KEYWORDS[token.value.toUpperCase()]
            : undefined;

      if (!operator) {
        return left;
      }

      this.advance();
      left = { kind: 'binary', operator, left, right: this.parseAdditive() };
    }
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    for (;;) {
      if (this.matchOp('+')) {
        left = { kind: 'binary', operator: '+', left, right: this.parseMultiplicative() };
      } else if (this.matchOp('-')) {
        left = { kind: 'binary', operator: '-', left, right: this.parseMultiplicative() };
      } else {
        return left;
      }
    }
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    for (;;) {
      if (this.matchPunct('*')) {
        left = { kind: 'binary', operator: '*', left, right: this.parseUnary() };
      } else if (this.matchOp('/')) {
        left = { kind: 'binary', operator: '/', left, right: this.parseUnary() };
      } else {
        return left;
      }
    }
  }

  private parseUnary(): Expression {
    if (this.matchOp('!')) {
      return { kind: 'unary', operator: '!', operand: this.parseUnary() };
    }

    if (this.matchOp('-')) {
      const next = this.peek();
      if (next.type === 'number') {
        this.advance();
        return { kind: 'number', raw: `-${next.value}`, value: -Number(next.value) };
      }
      return { kind: 'unary', operator: '-', operand: this.parseUnary() };
    }

    return this.parsePrimary();
  }

  private parsePrimary(): Expression {
    const token = this.advance();

    switch (token.type) {
      case 'string':
        return { kind: 'string', value: token.value };
      case 'number':
        return { kind: 'number', raw: token.value, value: Number(token.value) };
      case 'param':
        return { kind: 'param', name: token.value };
      case 'punct':
        if (token.value === '(') {
          const inner = this.parseExpression();
          this.expectPunct(')');
          return { kind: 'group', inner };
        }
        if (token.value === '{') {
          return this.parseObject();
        }
        if (token.value === '[') {
          const items = this.parseList(']');
          return { kind: 'array', items };
        }
        return this.fail(`Unexpected '${token.value}'`, token);
      case 'ident':
        return this.parseIdentExpression(token);
      case 'eof':
        return this.fail('Unexpected end of statement', token);
      default:
        return this.fail(`Unexpected '${token.value}'`, token);
    }
  }

  private parseIdentExpression(token: Token): Expression {
    switch (token.value.toUpperCase()) {
      case 'TRUE':
        return { kind: 'literal', value: true };
      case 'FALSE':
        return { kind: 'literal', value: false };
      case 'NULL':
        return { kind: 'literal', value: null };
      case 'NONE':
        return { kind: 'literal', value: undefined };
    }

    if (this.adjacentColon()) {
      return this.parseRecordId(token.value);
    }

    if (this.peekIs('op', '::')) {
      let name = token.value;
      while (this.matchOp('::')) {
        name += `::${this.expectIdent()}`;
      }
      this.expectPunct('(');
      return { kind: 'call', name, args: this.parseList(')') };
    }

    if (this.peekIs('punct', '(')) {
      this.advance();
      return { kind: 'call', name: token.value, args: this.parseList(')') };
    }

    const parts = [token.value];
    while (this.matchPunct('.')) {
      parts.push(this.expectIdent());
    }
    return { kind: 'idiom', parts };
  }

  private parseObject(): Expression {
    const entries: ObjectEntry[] = [];

    while (!this.matchPunct('}')) {
      const keyToken = this.advance();
      if (keyToken.type !== 'ident' && keyToken.type !== 'string') {
        return this.fail('Expected an object key', keyToken);
      }
      this.expectOp(':');
      entries.push({ key: keyToken.value, value: this.parseExpression() });

      if (!this.matchPunct(',')) {
        this.expectPunct('}');
        break;
      }
    }

    return { kind: 'object', entries };
  }

  /** Comma-separated expressions up to `close`, trailing comma allowed */
  private parseList(close: ')' | ']'): Expression[] {
    const items: Expression[] = [];

    while (!this.matchPunct(close)) {
      items.push(this.parseExpression());
      if (!this.matchPunct(',')) {
        this.expectPunct(close);
        break;
      }
    }

    return items;
  }

  // ============ Token Helpers ============

  private peek(offset = 0): Token {
    const token = this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
    if (!token) {
      throw new ParseError('Empty token stream', this.text);
    }
    return token;
  }

  private previous(): Token {
    return this.tokens[Math.max(this.index - 1, 0)] ?? this.peek();
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') {
      this.index++;
    }
    return token;
  }

  private atEnd(): boolean {
    return this.peek().type === 'eof';
  }

  private peekIs(type: Token['type'], value: string): boolean {
    const token = this.peek();
    return token.type === type && token.value === value;
  }

  private matchPunct(value: string): boolean {
    if (this.peekIs('punct', value)) {
      this.advance();
      return true;
    }
    return false;
  }

  private matchOp(value: string): boolean {
    if (this.peekIs('op', value)) {
      this.advance();
      return true;
    }
    return false;
  }

  private matchKeyword(keyword: string): boolean {
    const token = this.peek();
    if (token.type === 'ident' && token.value.toUpperCase() === keyword) {
      this.advance();
      return true;
    }
    return false;
  }

  /** A `:` glued to the previous identifier starts a record key */
  private adjacentColon(): boolean {
    const token = this.peek();
    const next = this.peek(1);
    if (token.type === 'op' && token.value === ':' && token.start === this.previous().end && next.start === token.end) {
      this.advance();
      return true;
    }
    return false;
  }

  private expectPunct(value: string): void {
    if (!this.matchPunct(value)) {
      this.fail(`Expected '${value}'`, this.peek());
    }
  }

  private expectOp(value: string): void {
    if (!this.matchOp(value)) {
      this.fail(`Expected '${value}'`, this.peek());
    }
  }

  private expectKeyword(keyword: string): void {
    if (!this.matchKeyword(keyword)) {
      this.fail(`Expected '${keyword}'`, this.peek());
    }
  }

  private expectIdent(): string {
    const token = this.advance();
    if (token.type !== 'ident') {
      return this.fail('Expected an identifier', token);
    }
    return token.value;
  }

  private unexpected(): never {
    const token = this.peek();
    return this.fail(
      token.type === 'eof' ? 'Unexpected end of statement' : `Unexpected '${token.value}'`,
      token,
    );
  }

  private fail(message: string, token: Token): never {
    throw new ParseError(message, this.text, positionAt(this.text, token.start));
  }
}

/**
 * Parse a script of `;`-separated statements. Empty statements are skipped.
 */
export function parseScript(text: string): Statement[] {
  return new Parser(text, tokenize(text)).parseScript();
}

/**
 * Parse exactly one statement; a trailing `;` is allowed.
 */
export function parseStatement(text: string): Statement {
  const [statement, ...rest] = parseScript(text);

  if (!statement) {
    throw new ParseError('Statement is empty', text);
  }

  if (rest.length > 0) {
    throw new ParseError(`Expected a single statement, found ${rest.length + 1}`, text);
  }

  return statement;
}
