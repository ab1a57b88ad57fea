import type { Logger } from "@cachesim/logger"
import type { CacheObserver } from "./cache-observer"

export type PolicyCacheOptions = {
  /**
   * Maximum number of entries retained. Must be a non-negative integer;
   * 0 yields a cache that never stores anything.
   */
  capacity: number
}

export type PolicyCacheDeps<K, V> = {
  /**
   * Receives one debug entry per cache event. Defaults to a no-op logger.
   */
  logger?: Logger
  observer?: CacheObserver<K, V>
}
