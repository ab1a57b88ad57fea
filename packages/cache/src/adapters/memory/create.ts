import { CacheError } from "../../core/errors/cache-error"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { PolicyCacheDeps, PolicyCacheOptions } from "../../ports/cache-options"
import type { PolicyCache } from "../../ports/policy-cache"
import { LfuCache } from "./lfu-cache"
import { LruCache } from "./lru-cache"
import { MruCache } from "./mru-cache"

/**
 * Creates the in-memory cache for `policy`. Callers depend only on the
 * returned {@link PolicyCache}.
 */
export function createCache<K, V>(
  policy: CacheEvictionPolicy,
  opts: PolicyCacheOptions,
  deps?: PolicyCacheDeps<K, V>,
): PolicyCache<K, V> {
  switch (policy) {
    case "lru":
      return new LruCache<K, V>(opts, deps)
    case "mru":
      return new MruCache<K, V>(opts, deps)
    case "lfu":
      return new LfuCache<K, V>(opts, deps)
    default:
      throw CacheError.unknownPolicy(policy)
  }
}
