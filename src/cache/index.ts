export { LruTtlCache } from './lru-cache.js'
export type { CacheLookup, CacheStats, LruTtlCacheOptions } from './lru-cache.js'
