import type { CachePutResult, CacheSnapshotEntry } from "@cachesim/cache"
import type { CacheKey, CacheValue } from "../model/command"
import type { SessionStatsSnapshot } from "./session-stats"

export function formatHit(key: CacheKey, value: CacheValue): string {
  return `Cache Hit: ${key} -> ${value}`
}

export function formatMiss(key: CacheKey): string {
  return `Cache Miss for key: ${key}`
}

export function formatPut(
  key: CacheKey,
  value: CacheValue,
  result: CachePutResult<CacheKey, CacheValue>,
): string[] {
  switch (result.kind) {
    case "dropped":
      return [`Not stored (capacity 0): ${key} -> ${value}`]
    case "updated":
      return [`Inserted/Updated: ${key} -> ${value}`]
    case "inserted":
      return result.evicted
        ? [
            `Evicted: ${result.evicted.key} -> ${result.evicted.value}`,
            `Inserted/Updated: ${key} -> ${value}`,
          ]
        : [`Inserted/Updated: ${key} -> ${value}`]
  }
}

export function formatEntry(entry: CacheSnapshotEntry<CacheKey, CacheValue>): string {
  const base = `${entry.key}:${entry.value}`

  return entry.frequency === undefined ? base : `${base}(f=${entry.frequency})`
}

export function formatCacheState(
  entries: readonly CacheSnapshotEntry<CacheKey, CacheValue>[],
): string {
  return ["Cache State:", ...entries.map(formatEntry)].join(" ")
}

export function formatStats(stats: SessionStatsSnapshot, size: number, capacity: number): string {
  return `Stats: hits=${stats.hits} misses=${stats.misses} evictions=${stats.evictions} size=${size}/${capacity}`
}
