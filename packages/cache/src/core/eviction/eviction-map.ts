import type { CacheSnapshotEntry } from "../../ports/cache-entry"
import type { CacheResult } from "../../ports/cache-result"

/**
 * Outcome of a single eviction attempt.
 *
 * `stale` means the policy's auxiliary structure named a key that is no
 * longer stored; nothing was removed from the index.
 */
export type Eviction<K, V> =
  | { kind: "evicted"; key: K; value: V }
  | { kind: "stale"; key: K }

/**
 * Internal abstraction pairing the primary key index with the auxiliary
 * structure a policy needs to pick its victim.
 *
 * Capacity is not enforced here; the owning cache decides when to evict.
 */
export interface EvictionMap<K, V> {
  /**
   * Look up `key`. Implementations may update ordering or frequency on a hit.
   */
  get(key: K): CacheResult<V>

  /**
   * Insert or update `key`. Implementations may update ordering or frequency.
   */
  set(key: K, value: V): void

  /**
   * Remove `key` from the index. Returns true if the key was present.
   */
  delete(key: K): boolean

  has(key: K): boolean

  size(): number

  /**
   * The key the next `evict()` will target, or `undefined` if there is
   * nothing to pop. Does not mutate.
   */
  victim(): K | undefined

  /**
   * Remove the victim chosen by the policy. Returns `undefined` when the
   * auxiliary structure is empty.
   */
  evict(): Eviction<K, V> | undefined

  /**
   * All live entries, each exactly once, in the policy's display order.
   */
  entries(): CacheSnapshotEntry<K, V>[]
}
