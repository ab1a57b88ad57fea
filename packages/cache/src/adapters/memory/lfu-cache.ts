import { LfuMemoryMap } from "../../core/eviction/lfu-memory-map"
import type { PolicyCacheDeps, PolicyCacheOptions } from "../../ports/cache-options"
import { MemoryPolicyCache } from "./memory-policy-cache"

export class LfuCache<K, V> extends MemoryPolicyCache<K, V> {
  constructor(opts: PolicyCacheOptions, deps?: PolicyCacheDeps<K, V>) {
    super("lfu", new LfuMemoryMap<K, V>(), opts, deps)
  }
}
