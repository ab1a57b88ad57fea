import type { CacheEvent, CacheObserver } from "@cachesim/cache"
import type { CacheKey, CacheValue } from "../model/command"

export type SessionStatsSnapshot = Readonly<{
  hits: number
  misses: number
  evictions: number
}>

/**
 * Counts cache events for the `stats` command.
 */
export class SessionStats implements CacheObserver<CacheKey, CacheValue> {
  private hits = 0
  private misses = 0
  private evictions = 0

  onEvent(event: CacheEvent<CacheKey, CacheValue>): void {
    switch (event.type) {
      case "hit":
        this.hits++
        break
      case "miss":
        this.misses++
        break
      case "evict":
        this.evictions++
        break
    }
  }

  snapshot(): SessionStatsSnapshot {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    }
  }
}
