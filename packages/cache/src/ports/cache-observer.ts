import type { CacheEvent } from "./cache-event"

/**
 * Receives every event a cache emits, synchronously and in order.
 *
 * @remarks
 * Observers must not throw; an exception propagates out of the cache call
 * that triggered the event.
 */
export interface CacheObserver<K, V> {
  onEvent(event: CacheEvent<K, V>): void
}
