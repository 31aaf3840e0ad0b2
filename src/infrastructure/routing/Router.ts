/**
 * Gatehouse - Router
 *
 * Exact (method, path) dispatch. Each route carries its own middlewares
 * (authentication, caching) that run between the global chain and the
 * route handler.
 */

import { Errors, failure } from '../../domain/result/Result';
import { ChainOptions, chain } from '../pipeline/builder';
import { Handler, IGatehouseMiddleware } from '../platform/middleware';

export interface Route<TServices = unknown> {
  method: string;
  path: string;
  handler: Handler<TServices>;
  middlewares: readonly IGatehouseMiddleware<TServices>[];
}

export type RouteMatch<TServices = unknown> =
  | { kind: 'found'; route: Route<TServices> }
  | { kind: 'method-not-allowed'; allowed: string[] }
  | { kind: 'not-found' };

export class DuplicateRouteError extends Error {
  constructor(method: string, path: string) {
    super(`Route ${method} ${path} is already registered`);
    this.name = 'DuplicateRouteError';
    Object.setPrototypeOf(this, DuplicateRouteError.prototype);
  }
}

export class Router<TServices = unknown> {
  /** path → method → route */
  private readonly table = new Map<string, Map<string, Route<TServices>>>();

  /**
   * @throws DuplicateRouteError when (method, path) is taken
   */
  add(
    method: string,
    path: string,
    handler: Handler<TServices>,
    ...middlewares: IGatehouseMiddleware<TServices>[]
  ): this {
    const normalized = method.toUpperCase();
    let byMethod = this.table.get(path);
    if (!byMethod) {
      byMethod = new Map();
      this.table.set(path, byMethod);
    }
    if (byMethod.has(normalized)) {
      throw new DuplicateRouteError(normalized, path);
    }
    byMethod.set(normalized, { method: normalized, path, handler, middlewares });
    return this;
  }

  get(path: string, handler: Handler<TServices>, ...middlewares: IGatehouseMiddleware<TServices>[]): this {
    return this.add('GET', path, handler, ...middlewares);
  }

  post(path: string, handler: Handler<TServices>, ...middlewares: IGatehouseMiddleware<TServices>[]): this {
    return this.add('POST', path, handler, ...middlewares);
  }

  match(method: string, path: string): RouteMatch<TServices> {
    const byMethod = this.table.get(path);
    if (!byMethod) {
      return { kind: 'not-found' };
    }
    const route = byMethod.get(method.toUpperCase());
    if (!route) {
      return { kind: 'method-not-allowed', allowed: [...byMethod.keys()] };
    }
    return { kind: 'found', route };
  }

  routes(): Route<TServices>[] {
    return [...this.table.values()].flatMap((byMethod) => [...byMethod.values()]);
  }

  /**
   * Terminal handler dispatching to the matched route's own chain
   */
  toHandler(options: ChainOptions = {}): Handler<TServices> {
    const compiled = new Map<Route<TServices>, Handler<TServices>>();
    const compile = (route: Route<TServices>): Handler<TServices> => {
      let handler = compiled.get(route);
      if (!handler) {
        handler = chain(route.middlewares, route.handler, options);
        compiled.set(route, handler);
      }
      return handler;
    };

    return async (ctx) => {
      const { method, path } = ctx.request;
      const match = this.match(method, path);

      switch (match.kind) {
        case 'found':
          return compile(match.route)(ctx);
        case 'method-not-allowed':
          ctx.response.headers['Allow'] = match.allowed.join(', ');
          return failure(Errors.methodNotAllowed(method.toUpperCase(), path));
        case 'not-found':
          return failure(Errors.notFound(path));
      }
    };
  }
}
