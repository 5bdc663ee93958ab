/**
 * Slot Table Types
 *
 * Handles and storage cells for the generational slot table.
 */

/**
 * Handle to one occupancy of a slot.
 *
 * A slot's generation advances every time it is vacated, so a handle
 * taken before the removal never matches the slot again.
 */
export interface Index {
  /** Physical position in the table */
  readonly slot: number
  /** Occupancy counter of the slot when the handle was issued */
  readonly generation: number
}

/**
 * A slot holding a live value.
 */
export interface OccupiedElement<T> {
  kind: "occupied"
  value: T
  generation: number
}

/**
 * A vacated slot. `next` links to the following free slot.
 */
export interface OpenElement {
  kind: "open"
  generation: number
  next: number | undefined
}

export type Element<T> = OccupiedElement<T> | OpenElement

/**
 * View of a live entry whose value can be reassigned in place.
 */
export interface MutableEntry<I, T> {
  readonly index: I
  value: T
}

/**
 * Read-only surface of a slot table.
 */
export interface ReadonlySlotTable<T> {
  readonly size: number
  readonly capacity: number
  get(index: Index): T | undefined
  has(index: Index): boolean
  values(): IterableIterator<T>
  indexes(): IterableIterator<Index>
  entries(): IterableIterator<[Index, T]>
}
