import type { CacheSnapshotEntry } from "../../ports/cache-entry"
import type { CacheResult } from "../../ports/cache-result"
import type { EvictionMap, Eviction } from "./eviction-map"

type StackFrame<K> = { readonly key: K }

/**
 * MRU ordering: a stack of written keys on top of a plain index.
 *
 * Every `set` pushes, including updates, and `delete` leaves the stack
 * alone, so the stack can hold duplicate and stale keys. It is never
 * pruned: `evict()` pops exactly one frame and reports `stale` when that
 * key is gone. Reads do not touch the stack.
 */
export class MruMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly index = new Map<K, { value: V }>()
  private readonly stack: StackFrame<K>[] = []

  get(key: K): CacheResult<V> {
    const entry = this.index.get(key)

    return entry ? { kind: "hit", value: entry.value } : { kind: "miss" }
  }

  set(key: K, value: V): void {
    const entry = this.index.get(key)

    if (entry) {
      entry.value = value
    } else {
      this.index.set(key, { value })
    }

    this.stack.push({ key })
  }

  delete(key: K): boolean {
    return this.index.delete(key)
  }

  has(key: K): boolean {
    return this.index.has(key)
  }

  size(): number {
    return this.index.size
  }

  /** Number of frames on the stack, stale ones included. */
  depth(): number {
    return this.stack.length
  }

  victim(): K | undefined {
    return this.stack.at(-1)?.key
  }

  evict(): Eviction<K, V> | undefined {
    const frame = this.stack.pop()

    if (!frame) return undefined

    const entry = this.index.get(frame.key)

    if (!entry) return { kind: "stale", key: frame.key }

    this.index.delete(frame.key)

    return { kind: "evicted", key: frame.key, value: entry.value }
  }

  entries(): CacheSnapshotEntry<K, V>[] {
    const seen = new Set<K>()
    const out: CacheSnapshotEntry<K, V>[] = []

    for (const frame of [...this.stack].reverse()) {
      if (seen.has(frame.key)) continue
      seen.add(frame.key)

      const entry = this.index.get(frame.key)

      if (entry) out.push({ key: frame.key, value: entry.value })
    }

    return out
  }
}
