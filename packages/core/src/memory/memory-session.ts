/**
 * Memory Session
 *
 * In-process engine behind the Session interface. Interprets the statement
 * grammar over in-memory tables with these transaction rules:
 *
 * - `BEGIN` … `COMMIT` inside one script applies all or nothing; when a
 *   statement fails, every slot of the block reports a failure, as the
 *   SurrealDB engine does.
 * - A `BEGIN` left open at the end of a script stays open across
 *   submissions until `COMMIT` or `CANCEL`. This is the contract of the
 *   `Transaction` handle. SurrealDB itself ends an open transaction when
 *   each query call returns, so this part is not a model of the server.
 * - Transaction markers produce no result slot unless they fail.
 *
 * Meant for tests and local development; nothing is persisted.
 */

import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';

import { BaseSession } from '../base-session';
import { isTransactionControl, parseScript } from '../surql';
import {
  EngineError,
  evaluate,
  getPath,
  isRow,
  matches,
  resolveRecordId,
  setPath,
  splitRecordId,
} from './evaluator';

import type { BaseSessionOptions } from '../base-session';
import type {
  CreateStatement,
  Data,
  DeleteStatement,
  Output,
  RelateStatement,
  SelectStatement,
  Statement,
  Target,
  UpdateStatement,
} from '../surql';
import type { ConnectionConfig, ResultSet, ResultSlot } from '../types';
import type { Row, Scope } from './evaluator';

export const FAILED_TRANSACTION_DETAIL = 'The query was not executed due to a failed transaction';
export const CANCELLED_TRANSACTION_DETAIL = 'The query was not executed due to a cancelled transaction';

type Tables = Map<string, Map<string, Row>>;

interface OpenTransaction {
  snapshot: Tables;
  /** Submission in which the transaction began */
  submission: number;
  /** Slot indexes written by this transaction in its own submission */
  slots: number[];
  failed: boolean;
}

export interface MemorySessionOptions extends BaseSessionOptions {
  /** Delay before each script is answered, in milliseconds */
  latency?: number;
}

export class MemorySession extends BaseSession {
  readonly name = 'MemorySession';

  private tables: Tables = new Map();
  private readonly variables = new Map<string, unknown>();
  private readonly submitted: string[] = [];
  private transaction?: OpenTransaction;
  private readonly latency: number;

  constructor(options: MemorySessionOptions = {}) {
    super(options);
    this.latency = options.latency ?? 0;
  }

  /**
   * Create a connected session.
   */
  static async open(options?: MemorySessionOptions): Promise<MemorySession> {
    const session = new MemorySession(options);
    await session.connect({ host: 'memory', namespace: 'test', database: 'test' });
    return session;
  }

  /** Scripts received so far, in order */
  get scripts(): readonly string[] {
    return [...this.submitted];
  }

  get inTransaction(): boolean {
    return this.transaction !== undefined;
  }

  /** Copy of the rows currently stored in `name` */
  rows(name: string): Row[] {
    return Array.from(this.tables.get(name)?.values() ?? [], (row) => structuredClone(row));
  }

  protected async doConnect(_config: ConnectionConfig): Promise<void> {
    this.tables = new Map();
  }

  protected async doDisconnect(): Promise<void> {
    this.transaction = undefined;
  }

  protected async doSubmit(script: string, bindings?: Record<string, unknown>): Promise<ResultSet> {
    this.submitted.push(script);
    const submission = this.submitted.length;

    if (this.latency > 0) {
      await sleep(this.latency);
    }

    const statements = parseScript(script);
    const slots: ResultSlot[] = [];
    const params = new Map<string, unknown>([...this.variables, ...Object.entries(bindings ?? {})]);

    for (const statement of statements) {
      if (isTransactionControl(statement)) {
        const failure = this.control(statement.type, submission, slots);
        if (failure) {
          slots.push(failure);
        }
        continue;
      }

      const started = Date.now();
      const tx = this.transaction;

      if (tx?.failed) {
        this.record(slots, { status: 'ERR', time: '0ms', detail: FAILED_TRANSACTION_DETAIL });
        continue;
      }

      try {
        const result = this.run(statement, { params });
        this.record(slots, { status: 'OK', time: `${Date.now() - started}ms`, result });
      } catch (error) {
        if (!(error instanceof EngineError)) {
          throw error;
        }
        this.record(slots, { status: 'ERR', time: `${Date.now() - started}ms`, detail: error.message });
        if (tx) {
          tx.failed = true;
        }
      }

      if (statement.type === 'let') {
        this.variables.set(statement.name, params.get(statement.name));
      }
    }

    return { slots };
  }

  // ============ Transactions ============

  private control(
    type: 'begin' | 'commit' | 'cancel',
    submission: number,
    slots: ResultSlot[],
  ): ResultSlot | undefined {
    const tx = this.transaction;

    if (type === 'begin') {
      if (tx) {
        return { status: 'ERR', time: '0ms', detail: 'There is already an open transaction' };
      }
      this.transaction = { snapshot: structuredClone(this.tables), submission, slots: [], failed: false };
      return undefined;
    }

    if (!tx) {
      return { status: 'ERR', time: '0ms', detail: 'There is no open transaction' };
    }

    this.transaction = undefined;

    if (type === 'commit' && !tx.failed) {
      return undefined;
    }

    this.tables = tx.snapshot;
    const detail = type === 'cancel' ? CANCELLED_TRANSACTION_DETAIL : FAILED_TRANSACTION_DETAIL;

    if (tx.submission !== submission) {
      // Earlier answers cannot be amended; report the discard on the marker itself
      return type === 'commit'
        ? { status: 'ERR', time: '0ms', detail: 'The transaction failed and was not committed' }
        : undefined;
    }

    for (const index of tx.slots) {
      const slot = slots[index];
      if (slot && (slot.status === 'OK' || type === 'cancel')) {
        slots[index] = { status: 'ERR', time: slot.time, detail };
      }
    }
    return undefined;
  }

  private record(slots: ResultSlot[], slot: ResultSlot): void {
    const tx = this.transaction;
    if (tx && tx.submission === this.submitted.length) {
      tx.slots.push(slots.length);
    }
    slots.push(slot);
  }

  // ============ Statements ============

  private run(statement: Statement, scope: Scope): unknown {
    switch (statement.type) {
      case 'create':
        return this.create(statement, scope);
      case 'select':
        return this.select(statement, scope);
      case 'update':
      case 'upsert':
        return this.update(statement, scope);
      case 'delete':
        return this.remove(statement, scope);
      case 'insert': {
        const values = evaluate(statement.values, scope);
        const rows = Array.isArray(values) ? values : [values];
        return rows.map((value) => {
          if (!isRow(value)) {
            throw new EngineError(`Cannot insert ${JSON.stringify(value)} into '${statement.table}'`);
          }
          return this.insert(statement.table, this.keyFor(statement.table, value['id']), value);
        });
      }
      case 'relate':
        return this.relate(statement, scope);
      case 'let':
        scope.params.set(statement.name, evaluate(statement.value, scope));
        return null;
      case 'return':
        return evaluate(statement.value, scope);
      default:
        throw new EngineError(`Unexpected '${statement.type}' statement`);
    }
  }

  private create(statement: CreateStatement, scope: Scope): unknown[] {
    const created: Row[] = [];

    for (const target of statement.targets) {
      let table: string;
      let key: string;

      if (target.kind === 'record') {
        ({ table, key } = resolveRecordId(target));
      } else if (target.kind === 'table') {
        table = target.name;
        key = `⟨${randomUUID()}⟩`;
      } else {
        const id = splitRecordId(scope.params.get(target.name));
        if (!id) {
          throw new EngineError(`Cannot create from $${target.name}`);
        }
        ({ table, key } = id);
      }

      created.push(this.insert(table, key, this.applyData({}, statement.data, scope)));
    }

    return this.output(statement.output, created.map(() => null), created);
  }

  private select(statement: SelectStatement, scope: Scope): unknown[] {
    let rows = this.resolveTargets(statement.from, scope).filter((row) =>
      matches(statement.where, { ...scope, row }),
    );

    if (statement.order) {
      const order = statement.order;
      rows = [...rows].sort((a, b) => {
        for (const term of order) {
          const left = getPath(a, term.field.parts);
          const right = getPath(b, term.field.parts);
          const cmp =
            typeof left === 'number' && typeof right === 'number'
              ? left - right
              : String(left).localeCompare(String(right));
          if (cmp !== 0) {
            return term.direction === 'ASC' ? cmp : -cmp;
          }
        }
        return 0;
      });
    }

    const start = statement.start ? Number(evaluate(statement.start, scope)) : 0;
    const limit = statement.limit ? Number(evaluate(statement.limit, scope)) : undefined;
    rows = rows.slice(start, limit === undefined ? undefined : start + limit);

    const valueExpression = statement.value;
    if (valueExpression) {
      return rows.map((row) => evaluate(valueExpression, { ...scope, row }));
    }

    const projections = statement.projections;
    if (!projections) {
      return rows.map((row) => structuredClone(row));
    }

    return rows.map((row) => {
      const projected: Row = {};
      for (const projection of projections) {
        const name =
          projection.alias ??
          (projection.expression.kind === 'idiom'
            ? projection.expression.parts.join('.')
            : 'value');
        projected[name] = evaluate(projection.expression, { ...scope, row });
      }
      return projected;
    });
  }

  private update(statement: UpdateStatement, scope: Scope): unknown[] {
    const before: Row[] = [];
    const after: Row[] = [];

    for (const target of statement.targets) {
      const found = this.resolveTargets([target], scope);

      if (found.length === 0 && statement.type === 'upsert' && target.kind === 'record') {
        const { table, key } = resolveRecordId(target);
        const row = this.insert(table, key, this.applyData({}, statement.data, scope));
        before.push({});
        after.push(row);
        continue;
      }

      for (const row of found) {
        if (!matches(statement.where, { ...scope, row })) {
          continue;
        }
        before.push(structuredClone(row));
        const updated = this.applyData(row, statement.data, scope);
        const id = splitRecordId(row['id']);
        if (id) {
          this.table(id.table).set(id.key, { ...updated, id: row['id'] });
        }
        after.push({ ...updated, id: row['id'] });
      }
    }

    return this.output(statement.output, before, after);
  }

  private remove(statement: DeleteStatement, scope: Scope): unknown[] {
    const removed: Row[] = [];

    for (const row of this.resolveTargets(statement.targets, scope)) {
      if (!matches(statement.where, { ...scope, row })) {
        continue;
      }
      const id = splitRecordId(row['id']);
      if (id) {
        this.table(id.table).delete(id.key);
        removed.push(row);
      }
    }

    // DELETE answers with nothing unless asked
    return this.output(statement.output ?? { kind: 'none' }, removed, removed.map(() => null));
  }

  private relate(statement: RelateStatement, scope: Scope): unknown[] {
    const [from] = this.resolveTargets([statement.from], scope);
    const [to] = this.resolveTargets([statement.to], scope);

    if (!from || !to) {
      throw new EngineError(`Cannot relate missing records through '${statement.edge}'`);
    }

    const content = this.applyData({}, statement.data, scope);
    const row = this.insert(statement.edge, `⟨${randomUUID()}⟩`, {
      ...content,
      in: from['id'],
      out: to['id'],
    });
    return this.output(statement.output, [null], [row]);
  }

  // ============ Storage ============

  private table(name: string): Map<string, Row> {
    let table = this.tables.get(name);
    if (!table) {
      table = new Map();
      this.tables.set(name, table);
    }
    return table;
  }

  private insert(tableName: string, key: string, content: Row): Row {
    const table = this.table(tableName);
    const id = `${tableName}:${key}`;

    if (table.has(key)) {
      throw new EngineError(`Database record \`${id}\` already exists`);
    }

    const row: Row = { ...content, id };
    table.set(key, row);
    return structuredClone(row);
  }

  private keyFor(table: string, id: unknown): string {
    if (id === undefined || id === null) {
      return `⟨${randomUUID()}⟩`;
    }
    const parsed = splitRecordId(id);
    if (parsed && parsed.table === table) {
      return parsed.key;
    }
    return String(id);
  }

  private resolveTargets(targets: Target[], scope: Scope): Row[] {
    const rows: Row[] = [];

    for (const target of targets) {
      if (target.kind === 'table') {
        rows.push(...(this.tables.get(target.name)?.values() ?? []));
        continue;
      }

      const id =
        target.kind === 'record'
          ? resolveRecordId(target)
          : splitRecordId(scope.params.get(target.name));
      const row = id ? this.tables.get(id.table)?.get(id.key) : undefined;
      if (row) {
        rows.push(row);
      }
    }

    return rows;
  }

  private applyData(row: Row, data: Data | undefined, scope: Scope): Row {
    if (!data) {
      return { ...row };
    }

    const rowScope: Scope = { ...scope, row };

    switch (data.kind) {
      case 'content': {
        const content = evaluate(data.value, rowScope);
        if (!isRow(content)) {
          throw new EngineError('CONTENT expects an object');
        }
        return { ...content };
      }
      case 'merge': {
        const patch = evaluate(data.value, rowScope);
        if (!isRow(patch)) {
          throw new EngineError('MERGE expects an object');
        }
        return { ...row, ...patch };
      }
      case 'set': {
        const next = structuredClone(row);
        for (const assignment of data.assignments) {
          const value = evaluate(assignment.value, rowScope);
          const current = getPath(next, assignment.field.parts);

          if (assignment.operator === '=') {
            setPath(next, assignment.field.parts, value);
          } else if (Array.isArray(current)) {
            setPath(
              next,
              assignment.field.parts,
              assignment.operator === '+='
                ? [...current, value]
                : current.filter((item) => JSON.stringify(item) !== JSON.stringify(value)),
            );
          } else {
            const base = typeof current === 'number' ? current : 0;
            const delta = typeof value === 'number' ? value : 0;
            setPath(next, assignment.field.parts, assignment.operator === '+=' ? base + delta : base - delta);
          }
        }
        return next;
      }
    }
  }

  private output(output: Output | undefined, before: unknown[], after: (Row | null)[]): unknown[] {
    switch (output?.kind) {
      case 'none':
        return [];
      case 'before':
        return before;
      case 'diff':
        return after.map((row, index) => ({ before: before[index] ?? null, after: row }));
      case 'fields': {
        const fields = output.fields;
        return after.map((row) => {
          const projected: Row = {};
          for (const field of fields) {
            projected[field.parts.join('.')] = getPath(row, field.parts);
          }
          return projected;
        });
      }
      default:
        return after;
    }
  }
}
