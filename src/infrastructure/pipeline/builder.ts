/**
 * @fileoverview Pipeline Builder - Middleware Composition Utilities
 *
 * @packageDocumentation
 * @module gatehouse/infrastructure/pipeline
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A pipeline is an ordered list of middlewares ending in a terminal handler:
 *
 * ```
 * Request  →  [Logging]  →  [Method check]  →  [Router]  →  Handler
 * ```
 *
 * Middlewares follow the onion model. Each one may act before calling
 * `next()`, after it returns, or instead of it:
 *
 * ```
 * MW1 Before  →  MW2 Before  →  MW3 Before  →  Handler
 *     ↓              ↓              ↓              ↓
 * MW1 After   ←  MW2 After   ←  MW3 After   ←  Result
 * ```
 *
 * ## Short-circuiting
 *
 * A middleware that returns a `Failure` (or any result) without calling
 * `next()` ends the chain there; later stages and the handler never run.
 *
 * ## Cancellation and deadline guard
 *
 * Before entering each stage (every middleware and the handler) the chain
 * checks the request context:
 *
 * - cancelled → `Failure(Cancelled)`
 * - past its deadline → `Failure(Timeout)`
 *
 * The checks sit between stages only; a stage already running is not
 * interrupted.
 *
 * @example
 * ```typescript
 * const handler = createPipeline()
 *   .use(new LoggingMiddleware(logger))
 *   .use(new MethodCheckMiddleware(['GET', 'POST']))
 *   .use(router)
 *   .toHandler(notFoundHandler);
 *
 * const result = await handler(ctx);
 * ```
 *
 * @version 1.0.0
 */

import { Errors, failure } from '../../domain/result/Result';
import {
  Handler,
  HandlerResult,
  IGatehouseMiddleware,
  MiddlewareContext,
  MiddlewareFunction,
  NextFunction,
  createMiddleware,
  isMiddleware,
} from '../platform/middleware';

export interface ChainOptions {
  /** Clock used for the deadline check */
  now?: () => number;
}

/**
 * Failure to return instead of entering the next stage, if any
 */
function guard<TServices>(ctx: MiddlewareContext<TServices>, now: () => number): HandlerResult | null {
  if (ctx.context.isCancelled()) {
    return failure(Errors.cancelled(ctx.request.path));
  }
  if (ctx.context.isPastDeadline(now())) {
    return failure(Errors.timeout(ctx.request.path));
  }
  return null;
}

/**
 * Fold middlewares around a terminal handler. `middlewares[0]` runs first.
 */
export function chain<TServices>(
  middlewares: readonly IGatehouseMiddleware<TServices>[],
  terminal: Handler<TServices>,
  options: ChainOptions = {},
): Handler<TServices> {
  const now = options.now ?? Date.now;

  return (ctx) => {
    const stage = (index: number): Promise<HandlerResult> => {
      const stopped = guard(ctx, now);
      if (stopped) {
        return Promise.resolve(stopped);
      }
      if (index === middlewares.length) {
        return terminal(ctx);
      }
      const next: NextFunction = () => stage(index + 1);
      return middlewares[index].invoke(ctx, next);
    };
    return stage(0);
  };
}

/**
 * Pipeline builder for composing middlewares with fluent API
 */
export class PipelineBuilder<TServices = unknown> {
  private middlewares: IGatehouseMiddleware<TServices>[] = [];

  constructor(private readonly options: ChainOptions = {}) {}

  /**
   * Add middleware to the end of the pipeline
   */
  use(middleware: IGatehouseMiddleware<TServices> | MiddlewareFunction<TServices>): this {
    this.middlewares.push(isMiddleware(middleware) ? middleware : createMiddleware(middleware));
    return this;
  }

  /**
   * Add middleware only if the condition is true
   */
  useIf(condition: boolean, middleware: IGatehouseMiddleware<TServices> | MiddlewareFunction<TServices>): this {
    if (condition) {
      this.use(middleware);
    }
    return this;
  }

  /**
   * Add middleware to the start of the pipeline
   */
  prepend(middleware: IGatehouseMiddleware<TServices> | MiddlewareFunction<TServices>): this {
    this.middlewares.unshift(isMiddleware(middleware) ? middleware : createMiddleware(middleware));
    return this;
  }

  /**
   * Insert middleware at a position (clamped to the current length)
   */
  insertAt(index: number, middleware: IGatehouseMiddleware<TServices> | MiddlewareFunction<TServices>): this {
    const position = Math.max(0, Math.min(index, this.middlewares.length));
    this.middlewares.splice(position, 0, isMiddleware(middleware) ? middleware : createMiddleware(middleware));
    return this;
  }

  /**
   * Snapshot of the middlewares in execution order
   */
  build(): IGatehouseMiddleware<TServices>[] {
    return [...this.middlewares];
  }

  /**
   * Close the pipeline with a terminal handler
   */
  toHandler(terminal: Handler<TServices>): Handler<TServices> {
    return chain(this.build(), terminal, this.options);
  }

  /**
   * Compose the pipeline into a single middleware whose `next` is the
   * continuation of the outer chain
   */
  compose(): IGatehouseMiddleware<TServices> {
    const middlewares = this.build();
    const options = this.options;
    return createMiddleware<TServices>((ctx, next) => chain(middlewares, () => next(), options)(ctx));
  }

  get length(): number {
    return this.middlewares.length;
  }

  clear(): this {
    this.middlewares = [];
    return this;
  }
}

/**
 * Create a new pipeline builder
 */
export function createPipeline<TServices = unknown>(options?: ChainOptions): PipelineBuilder<TServices> {
  return new PipelineBuilder<TServices>(options);
}

/**
 * Compose multiple middlewares into one
 */
export function compose<TServices = unknown>(
  ...middlewares: Array<IGatehouseMiddleware<TServices> | MiddlewareFunction<TServices>>
): IGatehouseMiddleware<TServices> {
  const builder = createPipeline<TServices>();
  for (const middleware of middlewares) {
    builder.use(middleware);
  }
  return builder.compose();
}

/**
 * Run `onTrue` when the predicate holds, otherwise `onFalse` (or just `next`)
 */
export function branch<TServices = unknown>(
  predicate: (ctx: MiddlewareContext<TServices>) => boolean,
  onTrue: IGatehouseMiddleware<TServices>,
  onFalse?: IGatehouseMiddleware<TServices>,
): IGatehouseMiddleware<TServices> {
  return createMiddleware<TServices>(async (ctx, next) => {
    if (predicate(ctx)) {
      return onTrue.invoke(ctx, next);
    }
    return onFalse ? onFalse.invoke(ctx, next) : next();
  });
}

/**
 * Apply a middleware only for the given HTTP methods
 */
export function forMethods<TServices = unknown>(
  methods: readonly string[],
  middleware: IGatehouseMiddleware<TServices>,
): IGatehouseMiddleware<TServices> {
  const set = new Set(methods.map((method) => method.toUpperCase()));
  return branch((ctx) => set.has(ctx.request.method.toUpperCase()), middleware);
}

/**
 * Apply a middleware only for paths matching a prefix or pattern
 */
export function forPaths<TServices = unknown>(
  patterns: ReadonlyArray<string | RegExp>,
  middleware: IGatehouseMiddleware<TServices>,
): IGatehouseMiddleware<TServices> {
  return branch(
    (ctx) =>
      patterns.some((pattern) =>
        typeof pattern === 'string' ? ctx.request.path.startsWith(pattern) : pattern.test(ctx.request.path),
      ),
    middleware,
  );
}
