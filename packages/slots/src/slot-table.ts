/**
 * Generational Slot Table
 *
 * Values live in a flat array of slots. Handles are `{ slot, generation }`
 * pairs; a slot's generation is bumped whenever it is vacated, so handles
 * to previous occupants stop resolving. Vacated slots form a free list
 * threaded through the open elements themselves.
 */

import { SlotTableCorruptionError, SlotTableError } from "./errors"
import type {
  Element,
  Index,
  MutableEntry,
  OccupiedElement,
  OpenElement,
  ReadonlySlotTable,
} from "./types"

export class SlotTable<T> implements ReadonlySlotTable<T> {
  private elements: Element<T>[] = []

  /** First slot of the free list */
  private freeHead: number | undefined = undefined

  private occupied = 0

  /**
   * Build a table holding exactly the given entries.
   *
   * Slots missing below the highest one become open at generation 0 and
   * are linked into the free list in ascending order.
   */
  static fromEntries<T>(entries: Iterable<readonly [Index, T]>): SlotTable<T> {
    const table = new SlotTable<T>()
    const bySlot = new Map<number, OccupiedElement<T>>()
    let highest = -1

    for (const [index, value] of entries) {
      if (!isSlotNumber(index.slot) || !isSlotNumber(index.generation)) {
        throw new SlotTableError(`Invalid index {slot: ${index.slot}, generation: ${index.generation}}`)
      }
      if (bySlot.has(index.slot)) {
        throw new SlotTableError(`Duplicate entries for slot ${index.slot}`)
      }
      bySlot.set(index.slot, { kind: "occupied", value, generation: index.generation })
      highest = Math.max(highest, index.slot)
    }

    const elements: Element<T>[] = []
    for (let slot = 0; slot <= highest; slot++) {
      elements.push(bySlot.get(slot) ?? { kind: "open", generation: 0, next: undefined })
    }

    // Walk backwards so the lowest gap ends up at the head
    for (let slot = highest; slot >= 0; slot--) {
      const element = elements[slot]
      if (element?.kind === "open") {
        element.next = table.freeHead
        table.freeHead = slot
      }
    }

    table.elements = elements
    table.occupied = bySlot.size
    return table
  }

  /** Number of live values */
  get size(): number {
    return this.occupied
  }

  /** Number of physical slots, live or open */
  get capacity(): number {
    return this.elements.length
  }

  // ===========================================================================
  // PUBLIC OPERATIONS
  // ===========================================================================

  /**
   * Store a value, reusing the head of the free list when there is one.
   */
  add(value: T): Index {
    const slot = this.freeHead
    if (slot === undefined) {
      this.elements.push({ kind: "occupied", value, generation: 0 })
      this.occupied++
      return { slot: this.elements.length - 1, generation: 0 }
    }

    const element = this.elements[slot]
    if (element?.kind !== "open") {
      throw new SlotTableCorruptionError(`free list head ${slot} is not an open slot`)
    }

    this.freeHead = element.next
    this.elements[slot] = { kind: "occupied", value, generation: element.generation }
    this.occupied++
    return { slot, generation: element.generation }
  }

  get(index: Index): T | undefined {
    return this.occupiedAt(index)?.value
  }

  has(index: Index): boolean {
    return this.occupiedAt(index) !== undefined
  }

  /**
   * Replace the value behind a live handle.
   * @returns false when the handle is stale
   */
  set(index: Index, value: T): boolean {
    const element = this.occupiedAt(index)
    if (!element) return false
    element.value = value
    return true
  }

  update(index: Index, updater: (value: T) => T): boolean {
    const element = this.occupiedAt(index)
    if (!element) return false
    element.value = updater(element.value)
    return true
  }

  /**
   * Take the value out and open the slot at the next generation.
   */
  remove(index: Index): T | undefined {
    const element = this.occupiedAt(index)
    if (!element) return undefined
    this.vacate(index.slot, element.generation + 1)
    return element.value
  }

  clear(): void {
    this.elements = []
    this.freeHead = undefined
    this.occupied = 0
  }

  /**
   * Deep copy, generations and free list included.
   */
  clone(cloneValue: (value: T) => T = (value) => value): SlotTable<T> {
    return this.map(cloneValue)
  }

  /**
   * Copy of the table with every live value transformed. Handles, open
   * slots and the free list carry over unchanged.
   */
  map<U>(fn: (value: T, index: Index) => U): SlotTable<U> {
    const copy = new SlotTable<U>()
    copy.elements = this.elements.map((element, slot): Element<U> => {
      if (element.kind === "open") return { ...element }
      const { generation } = element
      return { kind: "occupied", value: fn(element.value, { slot, generation }), generation }
    })
    copy.freeHead = this.freeHead
    copy.occupied = this.occupied
    return copy
  }

  // ===========================================================================
  // ITERATION
  // ===========================================================================

  *values(): IterableIterator<T> {
    for (const element of this.elements) {
      if (element.kind === "occupied") yield element.value
    }
  }

  *indexes(): IterableIterator<Index> {
    for (let slot = 0; slot < this.elements.length; slot++) {
      const element = this.elements[slot]
      if (element?.kind === "occupied") yield { slot, generation: element.generation }
    }
  }

  *entries(): IterableIterator<[Index, T]> {
    for (let slot = 0; slot < this.elements.length; slot++) {
      const element = this.elements[slot]
      if (element?.kind === "occupied") yield [{ slot, generation: element.generation }, element.value]
    }
  }

  /**
   * Live entries whose `value` writes straight through to the table.
   */
  *entriesMut(): IterableIterator<MutableEntry<Index, T>> {
    for (let slot = 0; slot < this.elements.length; slot++) {
      const element = this.elements[slot]
      if (element?.kind !== "occupied") continue
      const live: OccupiedElement<T> = element
      yield {
        index: { slot, generation: live.generation },
        get value() {
          return live.value
        },
        set value(value: T) {
          live.value = value
        },
      }
    }
  }

  /**
   * Slots on the free list, head first.
   */
  *freeSlots(): IterableIterator<number> {
    let slot = this.freeHead
    let steps = 0
    while (slot !== undefined) {
      if (steps++ > this.elements.length) {
        throw new SlotTableCorruptionError("free list contains a cycle")
      }
      const element = this.elements[slot]
      if (element?.kind !== "open") {
        throw new SlotTableCorruptionError(`free list reaches slot ${slot}, which is not open`)
      }
      yield slot
      slot = element.next
    }
  }

  /**
   * Verify the free list holds every open slot and nothing else.
   * @returns human-readable violations, empty when sound
   */
  checkFreeList(): string[] {
    const reachable = new Set<number>()
    try {
      for (const slot of this.freeSlots()) reachable.add(slot)
    } catch (error) {
      if (error instanceof SlotTableCorruptionError) return [error.message]
      throw error
    }

    const violations: string[] = []
    let live = 0
    this.elements.forEach((element, slot) => {
      if (element.kind === "occupied") {
        live++
      } else if (!reachable.has(slot)) {
        violations.push(`open slot ${slot} is not on the free list`)
      }
    })
    if (live !== this.occupied) {
      violations.push(`size is ${this.occupied} but ${live} slots are occupied`)
    }
    return violations
  }

  // ===========================================================================
  // DIFF REPLAY SUPPORT
  // ===========================================================================

  /**
   * Remove without advancing the generation, so the slot can take the
   * same handle again.
   * @internal
   */
  removePreservingGeneration(index: Index): T | undefined {
    const element = this.occupiedAt(index)
    if (!element) return undefined
    this.vacate(index.slot, element.generation)
    return element.value
  }

  /**
   * Slot is open at exactly `index.generation`. The slot one past the end
   * counts as open at generation 0; anything further out is not open.
   * @internal
   */
  isOpenAtGeneration(index: Index): boolean {
    return this.openGenerationAt(index.slot) === index.generation
  }

  /**
   * Slot is open one generation past `index`, i.e. untouched since the
   * handle's occupant was removed.
   * @internal
   */
  isOpenAtGenerationPlusOne(index: Index): boolean {
    return this.openGenerationAt(index.slot) === index.generation + 1
  }

  /**
   * Write a value into a specific open slot at the handle's generation,
   * taking the slot off the free list, or append it when the handle names
   * the slot one past the end.
   * @internal
   */
  forceWriteOccupied(index: Index, value: T): void {
    if (!isSlotNumber(index.slot) || !isSlotNumber(index.generation)) {
      throw new SlotTableCorruptionError(`cannot write to slot ${index.slot}`)
    }

    if (index.slot > this.elements.length) {
      throw new SlotTableCorruptionError(`slot ${index.slot} is past the end of the table`)
    }

    const element = this.elements[index.slot]
    if (element === undefined) {
      this.elements.push({ kind: "occupied", value, generation: index.generation })
    } else if (element.kind === "open") {
      this.unlink(index.slot, element)
      this.elements[index.slot] = { kind: "occupied", value, generation: index.generation }
    } else {
      throw new SlotTableCorruptionError(`slot ${index.slot} is already occupied`)
    }
    this.occupied++
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private occupiedAt(index: Index): OccupiedElement<T> | undefined {
    const element = this.elements[index.slot]
    if (element?.kind === "occupied" && element.generation === index.generation) {
      return element
    }
    return undefined
  }

  private openGenerationAt(slot: number): number | undefined {
    if (!isSlotNumber(slot) || slot > this.elements.length) return undefined
    const element = this.elements[slot]
    if (element === undefined) return 0
    return element.kind === "open" ? element.generation : undefined
  }

  private vacate(slot: number, generation: number): void {
    this.elements[slot] = { kind: "open", generation, next: this.freeHead }
    this.freeHead = slot
    this.occupied--
  }

  private unlink(slot: number, target: OpenElement): void {
    if (this.freeHead === slot) {
      this.freeHead = target.next
      return
    }

    let current = this.freeHead
    let steps = 0
    while (current !== undefined && steps++ <= this.elements.length) {
      const element = this.elements[current]
      if (element?.kind !== "open") break
      if (element.next === slot) {
        element.next = target.next
        return
      }
      current = element.next
    }
    throw new SlotTableCorruptionError(`open slot ${slot} is not on the free list`)
  }
}

function isSlotNumber(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0
}
