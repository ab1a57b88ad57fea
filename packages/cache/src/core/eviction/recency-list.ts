import { CacheError } from "../errors/cache-error"

/**
 * Stable handle of a node inside a {@link RecencyList}.
 */
export type Slot = number

type ArenaNode<T> = {
  item: T | undefined
  prev: Slot
  next: Slot
}

const HEAD: Slot = 0
const TAIL: Slot = 1

/**
 * Doubly-linked list stored in an arena of nodes addressed by integer slots.
 *
 * Links are slot indices rather than object references, so moving or
 * removing a node is O(1) given its slot. Freed slots are reused by later
 * inserts. Slots 0 and 1 are the head and tail sentinels.
 */
export class RecencyList<T extends object> {
  private readonly nodes: ArenaNode<T>[] = [
    { item: undefined, prev: HEAD, next: TAIL },
    { item: undefined, prev: HEAD, next: TAIL },
  ]
  private readonly free: Slot[] = []
  private count = 0

  get length(): number {
    return this.count
  }

  pushFront(item: T): Slot {
    const slot = this.allocate(item)

    this.linkAfterHead(slot)
    this.count++

    return slot
  }

  moveToFront(slot: Slot): void {
    this.live(slot)
    this.unlink(slot)
    this.linkAfterHead(slot)
  }

  remove(slot: Slot): T {
    const node = this.live(slot)
    const item = this.itemOf(slot, node)

    this.unlink(slot)
    node.item = undefined
    this.free.push(slot)
    this.count--

    return item
  }

  at(slot: Slot): T {
    return this.itemOf(slot, this.live(slot))
  }

  /** Slot of the least recently touched node. */
  back(): Slot | undefined {
    const slot = this.node(TAIL).prev

    return slot === HEAD ? undefined : slot
  }

  /** Slot of the most recently touched node. */
  front(): Slot | undefined {
    const slot = this.node(HEAD).next

    return slot === TAIL ? undefined : slot
  }

  /** Items from front (most recent) to back (least recent). */
  *[Symbol.iterator](): Generator<T> {
    let slot = this.node(HEAD).next

    while (slot !== TAIL) {
      const node = this.node(slot)

      yield this.itemOf(slot, node)
      slot = node.next
    }
  }

  private allocate(item: T): Slot {
    const reused = this.free.pop()

    if (reused !== undefined) {
      this.node(reused).item = item

      return reused
    }

    this.nodes.push({ item, prev: HEAD, next: TAIL })

    return this.nodes.length - 1
  }

  private linkAfterHead(slot: Slot): void {
    const head = this.node(HEAD)
    const node = this.node(slot)
    const first = head.next

    node.prev = HEAD
    node.next = first
    this.node(first).prev = slot
    head.next = slot
  }

  private unlink(slot: Slot): void {
    const node = this.node(slot)

    this.node(node.prev).next = node.next
    this.node(node.next).prev = node.prev
  }

  private live(slot: Slot): ArenaNode<T> {
    if (slot === HEAD || slot === TAIL) {
      throw CacheError.corruptState("sentinel slot used as a node", { slot })
    }

    const node = this.node(slot)

    if (node.item === undefined) {
      throw CacheError.corruptState("slot is not in use", { slot })
    }

    return node
  }

  private itemOf(slot: Slot, node: ArenaNode<T>): T {
    if (node.item === undefined) {
      throw CacheError.corruptState("slot is not in use", { slot })
    }

    return node.item
  }

  private node(slot: Slot): ArenaNode<T> {
    const node = this.nodes[slot]

    if (!node) throw CacheError.corruptState("slot out of range", { slot })

    return node
  }
}
