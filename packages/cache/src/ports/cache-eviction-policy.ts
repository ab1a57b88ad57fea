/**
 * Least Recently Used (LRU) eviction policy.
 *
 * Evicts the entry that has not been read or written for the longest time.
 */
export type LruCacheEvictionPolicy = "lru"

/**
 * Most Recently Used (MRU) eviction policy.
 *
 * Evicts the entry written most recently. Reads do not count as use.
 * Suits cyclic scans where the newest entry is the least likely to be
 * needed again soon.
 */
export type MruCacheEvictionPolicy = "mru"

/**
 * Least Frequently Used (LFU) eviction policy.
 *
 * Evicts the entry with the fewest hits and updates since it was inserted.
 */
export type LfuCacheEvictionPolicy = "lfu"

export type CacheEvictionPolicy =
  | LruCacheEvictionPolicy
  | MruCacheEvictionPolicy
  | LfuCacheEvictionPolicy

export const cacheEvictionPolicies = ["lru", "mru", "lfu"] as const satisfies readonly CacheEvictionPolicy[]
