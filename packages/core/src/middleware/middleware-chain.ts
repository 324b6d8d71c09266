/**
 * Middleware Chain
 *
 * Wraps script submission in an ordered list of middleware. The first
 * middleware added is the outermost: it sees the script first and the
 * result set last, and may answer without calling `next`.
 *
 * @example
 * ```typescript
 * const chain = new MiddlewareChain()
 *   .use(createLoggingMiddleware({ logger }));
 *
 * const { resultSet } = await chain.execute(
 *   MiddlewareChain.createContext(script),
 *   async (ctx) => ({ resultSet: await send(ctx.script) }),
 * );
 * ```
 */

import type { SubmitOptions } from '../types';
import type {
  NextMiddleware,
  SubmitMiddleware,
  SubmitMiddlewareContext,
  SubmitMiddlewareResult,
} from './types';

export class MiddlewareChain<T = unknown> {
  private readonly stack: SubmitMiddleware<T>[] = [];

  use(middleware: SubmitMiddleware<T>): this {
    this.stack.push(middleware);
    return this;
  }

  /** Drop the first registration of `middleware`, if any */
  remove(middleware: SubmitMiddleware<T>): this {
    const position = this.stack.indexOf(middleware);
    if (position >= 0) {
      this.stack.splice(position, 1);
    }
    return this;
  }

  clear(): this {
    this.stack.length = 0;
    return this;
  }

  get length(): number {
    return this.stack.length;
  }

  /**
   * Run `context` through every middleware, ending in `submit`.
   */
  async execute(
    context: SubmitMiddlewareContext,
    submit: NextMiddleware<T>,
  ): Promise<SubmitMiddlewareResult<T>> {
    const run = this.stack.reduceRight<NextMiddleware<T>>(
      (inner, middleware) => (ctx) => middleware(ctx, inner),
      submit,
    );
    return run(context);
  }

  static createContext(script: string, options?: SubmitOptions): SubmitMiddlewareContext {
    return { script, options, startTime: Date.now(), metadata: {} };
  }
}
