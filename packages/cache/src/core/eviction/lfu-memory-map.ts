import type { CacheSnapshotEntry } from "../../ports/cache-entry"
import type { CacheResult } from "../../ports/cache-result"
import { CacheError } from "../errors/cache-error"
import type { EvictionMap, Eviction } from "./eviction-map"

type LfuEntry<V> = {
  value: V
  frequency: number
}

/**
 * LFU ordering: every key carries a use count, and keys are grouped into
 * buckets by count so the minimum-frequency bucket is known without a scan.
 *
 * A key starts at frequency 1 and gains 1 on every hit and every update.
 * Within a bucket keys keep the order in which they reached that frequency,
 * so ties go to the key that has sat at the minimum the longest.
 */
export class LfuMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly index = new Map<K, LfuEntry<V>>()
  private readonly buckets = new Map<number, Set<K>>()
  private minFrequency = 0

  get(key: K): CacheResult<V> {
    const entry = this.index.get(key)

    if (!entry) return { kind: "miss" }

    this.touch(key, entry)

    return { kind: "hit", value: entry.value }
  }

  set(key: K, value: V): void {
    const entry = this.index.get(key)

    if (entry) {
      entry.value = value
      this.touch(key, entry)

      return
    }

    this.index.set(key, { value, frequency: 1 })
    this.bucket(1).add(key)
    this.minFrequency = 1
  }

  delete(key: K): boolean {
    const entry = this.index.get(key)

    if (!entry) return false

    this.index.delete(key)
    this.leaveBucket(key, entry.frequency)

    return true
  }

  has(key: K): boolean {
    return this.index.has(key)
  }

  size(): number {
    return this.index.size
  }

  frequencyOf(key: K): number | undefined {
    return this.index.get(key)?.frequency
  }

  victim(): K | undefined {
    const first = this.minBucket()?.values().next()

    return first && !first.done ? first.value : undefined
  }

  evict(): Eviction<K, V> | undefined {
    const first = this.minBucket()?.values().next()

    if (!first || first.done) return undefined

    const key = first.value
    const entry = this.index.get(key)

    if (!entry) throw CacheError.corruptState("bucketed key is not indexed", { key })

    this.index.delete(key)
    this.leaveBucket(key, entry.frequency)

    return { kind: "evicted", key, value: entry.value }
  }

  entries(): CacheSnapshotEntry<K, V>[] {
    return Array.from(this.index, ([key, entry]) => ({
      key,
      value: entry.value,
      frequency: entry.frequency,
    }))
  }

  private touch(key: K, entry: LfuEntry<V>): void {
    const from = entry.frequency
    const emptied = this.leaveBucket(key, from)

    entry.frequency = from + 1
    this.bucket(entry.frequency).add(key)

    if (emptied && this.minFrequency === from) this.minFrequency = entry.frequency
  }

  /**
   * Removals may leave `minFrequency` naming an empty bucket. No bucket sits
   * below it, so the next one is looked up on demand.
   */
  private minBucket(): Set<K> | undefined {
    const bucket = this.buckets.get(this.minFrequency)

    if (bucket || this.buckets.size === 0) return bucket

    this.minFrequency = Math.min(...this.buckets.keys())

    return this.buckets.get(this.minFrequency)
  }

  /** Returns true when the bucket became empty and was dropped. */
  private leaveBucket(key: K, frequency: number): boolean {
    const bucket = this.buckets.get(frequency)

    if (!bucket) return false

    bucket.delete(key)

    if (bucket.size > 0) return false

    this.buckets.delete(frequency)

    return true
  }

  private bucket(frequency: number): Set<K> {
    let bucket = this.buckets.get(frequency)

    if (!bucket) {
      bucket = new Set()
      this.buckets.set(frequency, bucket)
    }

    return bucket
  }
}
