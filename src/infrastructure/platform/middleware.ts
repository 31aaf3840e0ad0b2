/**
 * Gatehouse - Middleware Interface
 *
 * A middleware receives the request environment and a `next` function that
 * runs the rest of the chain. It either returns what `next` returned, or
 * short-circuits by returning its own result without calling `next`.
 */

import { RequestContext } from '../../domain/context/RequestContext';
import { toHttpError } from '../../domain/exceptions/exceptions';
import { Errors, PipelineResult, failure } from '../../domain/result/Result';
import type { Effect } from '../pipeline/effect';
import type { ILogger } from './logger';
import { GatehouseRequest, HeaderValue, ResponsePayload } from './types';

/**
 * Result every stage of the chain produces
 */
export type HandlerResult = PipelineResult<ResponsePayload>;

/**
 * Runs the remainder of the chain
 */
export type NextFunction = () => Promise<HandlerResult>;

/**
 * Headers stages add to the outgoing response
 */
export interface ResponseHeaders {
  headers: Record<string, HeaderValue>;
}

/**
 * The request environment. One per request, shared by reference by every
 * stage and never replaced mid-chain. `TServices` is whatever the
 * application hands its stages.
 */
export interface MiddlewareContext<TServices = unknown> {
  /** Request context, also reachable through AsyncLocalStorage */
  context: RequestContext;

  /** Parsed request */
  request: GatehouseRequest;

  /** Extra response headers */
  response: ResponseHeaders;

  /** Items bag for passing data between middlewares */
  items: Map<string, unknown>;

  /** Handles into the application's services, resolved from the request scope */
  services: TServices;
}

/**
 * Terminal step of a chain: a route handler
 */
export type Handler<TServices = unknown> = Effect<MiddlewareContext<TServices>, ResponsePayload>;

/**
 * Core middleware interface
 *
 * @example
 * ```typescript
 * class PoweredBy implements IGatehouseMiddleware {
 *   async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<HandlerResult> {
 *     ctx.response.headers['X-Powered-By'] = 'gatehouse';
 *     return next();
 *   }
 * }
 * ```
 */
export interface IGatehouseMiddleware<TServices = unknown> {
  invoke(ctx: MiddlewareContext<TServices>, next: NextFunction): Promise<HandlerResult>;
}

/**
 * Middleware function type for inline middleware
 */
export type MiddlewareFunction<TServices = unknown> = (
  ctx: MiddlewareContext<TServices>,
  next: NextFunction,
) => Promise<HandlerResult>;

/**
 * Tell a middleware object from an inline middleware function
 */
export function isMiddleware<TServices>(
  obj: IGatehouseMiddleware<TServices> | MiddlewareFunction<TServices>,
): obj is IGatehouseMiddleware<TServices> {
  return typeof obj === 'object' && obj !== null && typeof obj.invoke === 'function';
}

/**
 * Convert a function to middleware object
 */
export function createMiddleware<TServices = unknown>(fn: MiddlewareFunction<TServices>): IGatehouseMiddleware<TServices> {
  return {
    invoke: fn,
  };
}

/**
 * Abstract base class for middleware with common utilities
 */
export abstract class GatehouseMiddlewareBase<TServices = unknown> implements IGatehouseMiddleware<TServices> {
  abstract invoke(ctx: MiddlewareContext<TServices>, next: NextFunction): Promise<HandlerResult>;

  protected isCancelled(ctx: MiddlewareContext<TServices>): boolean {
    return ctx.context.isCancelled();
  }
}

// ==================== Built-in Middlewares ====================

export interface LoggingMiddlewareOptions {
  /** Clock used for durations */
  now?: () => number;
}

/**
 * Logging middleware - one start record and exactly one exit record per
 * request: info for a success, warn for a failure, error (with the thrown
 * value) when something further down threw. A throw becomes
 * `Failure(InternalError)`; results pass through untouched.
 */
export class LoggingMiddleware extends GatehouseMiddlewareBase {
  private readonly now: () => number;

  constructor(
    private readonly logger: ILogger,
    options: LoggingMiddlewareOptions = {},
  ) {
    super();
    this.now = options.now ?? Date.now;
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<HandlerResult> {
    const start = this.now();
    const { method, path } = ctx.request;

    this.logger.info(`→ ${method} ${path}`);

    let result: HandlerResult;
    try {
      result = await next();
    } catch (error) {
      const thrown = toHttpError(error, path);
      this.logger.error(
        `✗ ${method} ${path} ${thrown.statusCode} ${thrown.kind}: ${thrown.message} (${this.now() - start}ms)`,
        error,
      );
      return failure(thrown);
    }

    const duration = this.now() - start;
    if (result.ok) {
      this.logger.info(`← ${method} ${path} 200 (${duration}ms)`);
    } else {
      const { statusCode, kind, message } = result.error;
      this.logger.warn(`← ${method} ${path} ${statusCode} ${kind}: ${message} (${duration}ms)`);
    }

    return result;
  }
}

/**
 * Rejects methods outside the allow-list with MethodNotAllowed
 */
export class MethodCheckMiddleware extends GatehouseMiddlewareBase {
  private readonly allowed: ReadonlySet<string>;

  constructor(allowedMethods: readonly string[]) {
    super();
    this.allowed = new Set(allowedMethods.map((method) => method.toUpperCase()));
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<HandlerResult> {
    const method = ctx.request.method.toUpperCase();
    if (!this.allowed.has(method)) {
      return failure(Errors.methodNotAllowed(method, ctx.request.path));
    }
    return next();
  }
}
