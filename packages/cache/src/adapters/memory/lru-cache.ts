import { LruMemoryMap } from "../../core/eviction/lru-memory-map"
import type { PolicyCacheDeps, PolicyCacheOptions } from "../../ports/cache-options"
import { MemoryPolicyCache } from "./memory-policy-cache"

/**
 * Least Recently Used cache. Hits and writes make a key the most recent;
 * a full cache evicts the least recent key.
 */
export class LruCache<K, V> extends MemoryPolicyCache<K, V> {
  constructor(opts: PolicyCacheOptions, deps?: PolicyCacheDeps<K, V>) {
    super("lru", new LruMemoryMap<K, V>(), opts, deps)
  }
}
