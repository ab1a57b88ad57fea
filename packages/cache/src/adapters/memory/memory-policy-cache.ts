import { createNullLogger, type Logger } from "@cachesim/logger"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import { assertValidCapacity } from "../../core/validation/capacity"
import type { CacheSnapshotEntry } from "../../ports/cache-entry"
import type { CacheEvent } from "../../ports/cache-event"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { CacheObserver } from "../../ports/cache-observer"
import type { PolicyCacheDeps, PolicyCacheOptions } from "../../ports/cache-options"
import type {
  CachePutResult,
  CacheResult,
  EvictedEntry,
} from "../../ports/cache-result"
import type { PolicyCache } from "../../ports/policy-cache"

/**
 * Shared capacity and event handling for the in-memory policies. The
 * policy itself lives entirely in the {@link EvictionMap} it is given.
 */
export abstract class MemoryPolicyCache<K, V> implements PolicyCache<K, V> {
  readonly capacity: number

  private readonly logger: Logger
  private readonly observer: CacheObserver<K, V> | undefined

  protected constructor(
    readonly policy: CacheEvictionPolicy,
    private readonly store: EvictionMap<K, V>,
    opts: PolicyCacheOptions,
    deps: PolicyCacheDeps<K, V> = {},
  ) {
    this.capacity = assertValidCapacity(opts.capacity)
    this.observer = deps.observer
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "cache",
      policy,
      capacity: this.capacity,
    })
  }

  get(key: K): CacheResult<V> {
    const result = this.store.get(key)

    if (result.kind === "hit") {
      this.emit({ type: "hit", key, value: result.value })
    } else {
      this.emit({ type: "miss", key })
    }

    return result
  }

  put(key: K, value: V): CachePutResult<K, V> {
    if (this.capacity === 0) {
      this.emit({ type: "drop", key, value })

      return { kind: "dropped" }
    }

    if (this.store.has(key)) {
      this.store.set(key, value)
      this.emit({ type: "update", key, value })

      return { kind: "updated" }
    }

    const evicted = this.makeRoom()

    this.store.set(key, value)
    this.emit({ type: "insert", key, value })

    return evicted ? { kind: "inserted", evicted } : { kind: "inserted" }
  }

  displayCache(): readonly CacheSnapshotEntry<K, V>[] {
    return this.store.entries()
  }

  size(): number {
    return this.store.size()
  }

  /**
   * Evicts until one slot is free. Stale pops do not free a slot, so the
   * loop keeps popping after them.
   */
  private makeRoom(): EvictedEntry<K, V> | undefined {
    let evicted: EvictedEntry<K, V> | undefined

    while (this.store.size() >= this.capacity) {
      const eviction = this.store.evict()

      if (!eviction) break

      if (eviction.kind === "stale") {
        this.emit({ type: "stale-pop", key: eviction.key })
        continue
      }

      evicted = { key: eviction.key, value: eviction.value }
      this.emit({ type: "evict", ...evicted })
    }

    return evicted
  }

  private emit(event: CacheEvent<K, V>): void {
    this.logger.debug(`cache ${event.type}`, { event: event.type, key: event.key })
    this.observer?.onEvent(event)
  }
}
