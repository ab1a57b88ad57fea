import type { CacheSnapshotEntry } from "../../ports/cache-entry"
import type { CacheResult } from "../../ports/cache-result"
import type { EvictionMap, Eviction } from "./eviction-map"
import { RecencyList, type Slot } from "./recency-list"

type LruNode<K, V> = {
  readonly key: K
  value: V
}

/**
 * LRU ordering: a recency list (front = most recent) plus a key -> slot
 * index. Reads and writes both move the key to the front; the back is the
 * victim.
 */
export class LruMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly index = new Map<K, Slot>()
  private readonly list = new RecencyList<LruNode<K, V>>()

  get(key: K): CacheResult<V> {
    const slot = this.index.get(key)

    if (slot === undefined) return { kind: "miss" }

    this.list.moveToFront(slot)

    return { kind: "hit", value: this.list.at(slot).value }
  }

  set(key: K, value: V): void {
    const slot = this.index.get(key)

    if (slot === undefined) {
      this.index.set(key, this.list.pushFront({ key, value }))

      return
    }

    this.list.at(slot).value = value
    this.list.moveToFront(slot)
  }

  delete(key: K): boolean {
    const slot = this.index.get(key)

    if (slot === undefined) return false

    this.list.remove(slot)
    this.index.delete(key)

    return true
  }

  has(key: K): boolean {
    return this.index.has(key)
  }

  size(): number {
    return this.index.size
  }

  victim(): K | undefined {
    const slot = this.list.back()

    return slot === undefined ? undefined : this.list.at(slot).key
  }

  evict(): Eviction<K, V> | undefined {
    const slot = this.list.back()

    if (slot === undefined) return undefined

    const node = this.list.remove(slot)
    this.index.delete(node.key)

    return { kind: "evicted", key: node.key, value: node.value }
  }

  entries(): CacheSnapshotEntry<K, V>[] {
    return Array.from(this.list, (node) => ({ key: node.key, value: node.value }))
  }
}
