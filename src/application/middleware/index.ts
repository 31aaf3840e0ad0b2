export { AuthMiddleware, readBearerToken, requireAuth, requireRole } from './AuthMiddleware';
export type { AuthMiddlewareOptions } from './AuthMiddleware';
export { CachingMiddleware, cacheKey, cached } from './CachingMiddleware';
export type { CachingMiddlewareOptions } from './CachingMiddleware';
