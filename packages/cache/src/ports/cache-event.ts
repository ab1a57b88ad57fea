export type CacheHitEvent<K, V> = { type: "hit"; key: K; value: V }
export type CacheMissEvent<K> = { type: "miss"; key: K }
export type CacheInsertEvent<K, V> = { type: "insert"; key: K; value: V }
export type CacheUpdateEvent<K, V> = { type: "update"; key: K; value: V }
export type CacheEvictEvent<K, V> = { type: "evict"; key: K; value: V }

/** A put on a zero-capacity cache. */
export type CacheDropEvent<K, V> = { type: "drop"; key: K; value: V }

/**
 * An eviction attempt popped a key that was no longer stored (MRU stack).
 */
export type CacheStalePopEvent<K> = { type: "stale-pop"; key: K }

export type CacheEvent<K, V> =
  | CacheHitEvent<K, V>
  | CacheMissEvent<K>
  | CacheInsertEvent<K, V>
  | CacheUpdateEvent<K, V>
  | CacheEvictEvent<K, V>
  | CacheDropEvent<K, V>
  | CacheStalePopEvent<K>

export type CacheEventType = CacheEvent<unknown, unknown>["type"]
