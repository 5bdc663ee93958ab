/**
 * Generational slot table.
 *
 * Stable `{ slot, generation }` handles over a flat array of values, with
 * O(1) insert and remove and detection of stale handles.
 *
 * @example
 * ```typescript
 * import { SlotTable, formatIndex } from '@revgraph/slots';
 *
 * const table = new SlotTable<string>();
 * const a = table.add('a');
 * table.remove(a);
 * const b = table.add('b');
 *
 * table.get(a); // undefined: the slot was reused at a newer generation
 * formatIndex(b); // "0.1"
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// TABLE
// =============================================================================

export { SlotTable } from "./slot-table"
export type { Index, Element, OccupiedElement, OpenElement, MutableEntry, ReadonlySlotTable } from "./types"

// =============================================================================
// CODECS
// =============================================================================

export {
  formatIndex,
  parseIndex,
  encodeIndex,
  indexesEqual,
  compareIndexes,
  indexSchema,
  compactIndexSchema,
  structuredIndexSchema,
} from "./index-codec"
export type { IndexFormat } from "./index-codec"

export { serializeSlotTable, deserializeSlotTable } from "./serialization"
export type {
  ValueSchema,
  SlotEntrySource,
  SerializedSlotTable,
  CompactSlotTable,
  StructuredSlotEntry,
  SerializeSlotTableOptions,
  DeserializeSlotTableOptions,
} from "./serialization"

// =============================================================================
// ERRORS
// =============================================================================

export { SlotTableError, SlotTableCorruptionError, IndexDecodeError, SlotTableDecodeError } from "./errors"
