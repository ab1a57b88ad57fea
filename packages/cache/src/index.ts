export { createCache } from "./adapters/memory/create"
export { LfuCache } from "./adapters/memory/lfu-cache"
export { LruCache } from "./adapters/memory/lru-cache"
export { MemoryPolicyCache } from "./adapters/memory/memory-policy-cache"
export { MruCache } from "./adapters/memory/mru-cache"
export { CacheError, type CacheErrorCode } from "./core/errors/cache-error"
export type { Eviction, EvictionMap } from "./core/eviction/eviction-map"
export { LfuMemoryMap } from "./core/eviction/lfu-memory-map"
export { LruMemoryMap } from "./core/eviction/lru-memory-map"
export { MruMemoryMap } from "./core/eviction/mru-memory-map"
export { RecencyList, type Slot } from "./core/eviction/recency-list"
export { assertValidCapacity } from "./core/validation/capacity"
export { isCacheEvictionPolicy } from "./core/validation/policy"
export type { CacheSnapshotEntry } from "./ports/cache-entry"
export type * from "./ports/cache-event"
export {
  type CacheEvictionPolicy,
  cacheEvictionPolicies,
  type LfuCacheEvictionPolicy,
  type LruCacheEvictionPolicy,
  type MruCacheEvictionPolicy,
} from "./ports/cache-eviction-policy"
export type { CacheObserver } from "./ports/cache-observer"
export type { PolicyCacheDeps, PolicyCacheOptions } from "./ports/cache-options"
export type * from "./ports/cache-result"
export type { PolicyCache } from "./ports/policy-cache"
