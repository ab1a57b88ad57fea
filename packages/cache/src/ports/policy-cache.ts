import type { CacheSnapshotEntry } from "./cache-entry"
import type { CacheEvictionPolicy } from "./cache-eviction-policy"
import type { CachePutResult, CacheResult } from "./cache-result"

/**
 * PolicyCache is the contract shared by every eviction policy.
 *
 * @remarks
 * - Operations are synchronous and run to completion.
 * - `get` may update policy bookkeeping (recency, frequency), so it is not a
 *   pure read.
 * - After any call, `size() <= capacity`.
 * - Fullness is never an error: inserting into a full cache evicts exactly
 *   one entry chosen by the policy.
 */
export interface PolicyCache<K, V> {
  readonly policy: CacheEvictionPolicy
  readonly capacity: number

  /**
   * Look up `key`. A miss has no side effects.
   */
  get(key: K): CacheResult<V>

  /**
   * Insert or update `key`.
   */
  put(key: K, value: V): CachePutResult<K, V>

  /**
   * List all live entries in the policy's display order.
   *
   * @remarks
   * - LRU: most recently used first.
   * - MRU: most recently written first.
   * - LFU: first-insertion order, with frequencies.
   */
  displayCache(): readonly CacheSnapshotEntry<K, V>[]

  size(): number
}
