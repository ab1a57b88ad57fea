import { MruMemoryMap } from "../../core/eviction/mru-memory-map"
import type { PolicyCacheDeps, PolicyCacheOptions } from "../../ports/cache-options"
import { MemoryPolicyCache } from "./memory-policy-cache"

/**
 * Most Recently Used cache. A full cache evicts the key written last; hits
 * do not change the order.
 */
export class MruCache<K, V> extends MemoryPolicyCache<K, V> {
  constructor(opts: PolicyCacheOptions, deps?: PolicyCacheDeps<K, V>) {
    super("mru", new MruMemoryMap<K, V>(), opts, deps)
  }
}
