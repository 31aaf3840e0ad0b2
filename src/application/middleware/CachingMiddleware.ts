/**
 * Gatehouse - Response Caching Middleware
 *
 * Keys are `METHOD:URL`, with `:identity` appended for per-user caching.
 * A fresh entry is returned without running anything further down. Only
 * successful results of requests that were not cancelled are stored.
 */

import { success } from '../../domain/result/Result';
import {
  GatehouseMiddlewareBase,
  HandlerResult,
  NextFunction,
} from '../../infrastructure/platform/middleware';
import type { AppContext, GatehouseServices } from '../services';

export interface CachingMiddlewareOptions {
  /** Entry lifetime; defaults to the configured route cache TTL */
  ttlMs?: number;

  /** Separate entries per authenticated identity */
  perUser?: boolean;
}

export function cacheKey(ctx: AppContext, perUser: boolean): string {
  const base = `${ctx.request.method.toUpperCase()}:${ctx.request.url}`;
  return perUser ? `${base}:${ctx.context.get('identity') ?? 'anonymous'}` : base;
}

export class CachingMiddleware extends GatehouseMiddlewareBase<GatehouseServices> {
  constructor(private readonly options: CachingMiddlewareOptions = {}) {
    super();
  }

  async invoke(ctx: AppContext, next: NextFunction): Promise<HandlerResult> {
    const { cache, config, logger } = ctx.services;
    const key = cacheKey(ctx, this.options.perUser ?? false);

    const cached = await cache.get(key);
    if (cached) {
      logger.debug(`Cache hit: ${key}`);
      ctx.response.headers['X-Cache'] = 'HIT';
      return success(cached);
    }

    logger.debug(`Cache miss: ${key}`);
    const result = await next();

    if (result.ok && !this.isCancelled(ctx)) {
      await cache.set(key, result.value, this.options.ttlMs ?? config.routeCacheTtlMs);
      ctx.response.headers['X-Cache'] = 'MISS';
    }

    return result;
  }
}

export function cached(options?: CachingMiddlewareOptions): CachingMiddleware {
  return new CachingMiddleware(options);
}
