/**
 * Statement Batch
 *
 * Accumulates validated statements and submits them as one composite
 * script, so the engine applies them atomically.
 *
 * Statements are parsed on `add` and stored in canonical form; a bad
 * statement never enters the batch. A successful `execute` drains the
 * statements it sent, a failed one leaves the batch untouched for
 * inspection or retry. Statements added while a round-trip is in flight
 * stay for the next `execute`.
 *
 * @example
 * ```typescript
 * const batch = new StatementBatch()
 *   .add("CREATE person:uuid() CONTENT { name: 'a' }")
 *   .add("CREATE person:uuid() CONTENT { name: 'b' }");
 *
 * const resultSet = await batch.execute(session);
 * ```
 */

import { ExecutionError, IndeterminateOutcomeError, ParseError, toError } from '../errors';
import { isTransactionControl, parseStatement, printStatement } from '../surql';
import { describeFailure, failedSlots } from '../utils';
import { renderCompositeScript } from './composite-script';

import type { Logger, ResultSet, Session, SubmitOptions } from '../types';

export interface StatementBatchOptions {
  logger?: Logger;
}

export class StatementBatch {
  private readonly items: string[] = [];
  private readonly logger?: Logger;
  /** Bumped by `clear` and by every drain; a late `execute` never drains newer statements */
  private epoch = 0;

  constructor(options: StatementBatchOptions = {}) {
    this.logger = options.logger;
  }

  get statements(): readonly string[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Parse `text` and append its canonical form.
   * @throws ParseError when the text is not exactly one batchable statement
   */
  add(text: string): this {
    this.items.push(this.canonical(text));
    return this;
  }

  /**
   * Add several statements; if any fails to parse none are added.
   */
  addAll(texts: Iterable<string>): this {
    const accepted = Array.from(texts, (text) => this.canonical(text));
    this.items.push(...accepted);
    return this;
  }

  render(): string {
    return renderCompositeScript(this.items);
  }

  /**
   * Submit the batch as one composite script.
   *
   * An empty batch resolves to an empty result set without a round-trip.
   * @throws ExecutionError when the session fails or any statement fails
   * @throws IndeterminateOutcomeError when the round-trip was interrupted
   */
  async execute(session: Session, options?: SubmitOptions): Promise<ResultSet> {
    if (this.items.length === 0) {
      return { slots: [] };
    }

    const submitted = [...this.items];
    const epoch = this.epoch;
    const count = submitted.length;
    const script = renderCompositeScript(submitted);
    let resultSet: ResultSet;

    try {
      resultSet = await session.submit(script, options);
    } catch (error) {
      if (error instanceof IndeterminateOutcomeError) {
        throw new IndeterminateOutcomeError(
          `Outcome of batch of ${count} statements is unknown: ${error.message}`,
          'execute',
          undefined,
          error,
        );
      }
      throw new ExecutionError(
        `Batch of ${count} statements failed: ${toError(error).message}`,
        script,
        undefined,
        toError(error),
      );
    }

    const failed = failedSlots(resultSet);
    if (failed.length > 0) {
      this.logger?.warn('Batch rejected by engine', { statements: count, failed: failed.length });
      throw new ExecutionError(
        `Batch of ${count} statements failed: ${describeFailure(resultSet) ?? 'unknown error'}`,
        script,
        resultSet,
      );
    }

    if (resultSet.slots.length !== count) {
      throw new ExecutionError(
        `Batch of ${count} statements returned ${resultSet.slots.length} results`,
        script,
        resultSet,
      );
    }

    if (this.epoch === epoch) {
      this.items.splice(0, count);
      this.epoch++;
    }
    this.logger?.debug('Batch executed', { statements: count, duration: resultSet.duration });
    return resultSet;
  }

  clear(): void {
    this.items.length = 0;
    this.epoch++;
  }

  private canonical(text: string): string {
    const statement = parseStatement(text);

    if (isTransactionControl(statement)) {
      throw new ParseError('Transaction boundaries cannot be added to a batch', text);
    }

    return printStatement(statement);
  }
}
