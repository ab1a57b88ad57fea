export type CacheHit<T> = {
  kind: "hit"
  value: T
}

export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss

export type EvictedEntry<K, V> = {
  key: K
  value: V
}

/**
 * A new key was stored. `evicted` is set when an entry had to make room.
 */
export type CacheInserted<K, V> = {
  kind: "inserted"
  evicted?: EvictedEntry<K, V>
}

/**
 * The key was already present and its value replaced.
 */
export type CacheUpdated = {
  kind: "updated"
}

/**
 * Nothing was stored because the cache has zero capacity.
 */
export type CacheDropped = {
  kind: "dropped"
}

export type CachePutResult<K, V> = CacheInserted<K, V> | CacheUpdated | CacheDropped
