/**
 * One live entry as listed by `displayCache()`.
 *
 * `frequency` is only reported by frequency-tracking policies (LFU).
 */
export type CacheSnapshotEntry<K, V> = Readonly<{
  key: K
  value: V
  frequency?: number
}>
