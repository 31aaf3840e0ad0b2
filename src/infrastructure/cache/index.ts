/**
 * Gatehouse - Cache Module
 */

export { CacheManager, DEFAULT_CACHE_TTL_MS } from './CacheManager';
export type { CacheStats, CacheEntry, CacheManagerOptions } from './CacheManager';
