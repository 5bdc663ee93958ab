/**
 * Slot Table Serialization
 *
 * Tables are written as a mapping from live handle to value; open slots
 * are left out. Loading rebuilds the free list from the gaps.
 */

import { z, type ZodIssue } from "zod"
import { IndexDecodeError, SlotTableDecodeError } from "./errors"
import { formatIndex, parseIndex, structuredIndexSchema, type IndexFormat } from "./index-codec"
import { SlotTable } from "./slot-table"
import type { Index, ReadonlySlotTable } from "./types"

/**
 * Zod schema for a stored value. Input is left open so schemas with
 * defaults or transforms are accepted.
 */
export type ValueSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

export interface StructuredSlotEntry<T> {
  index: Index
  value: T
}

/** Compact form: `{ "slot.generation": value }` */
export type CompactSlotTable<T> = Record<string, T>

export type SerializedSlotTable<T> = CompactSlotTable<T> | StructuredSlotEntry<T>[]

export interface SerializeSlotTableOptions<T, U> {
  /** Handle format (defaults to structured) */
  format?: IndexFormat
  /** Convert each value before it is written */
  encodeValue?: (value: T) => U
}

export interface DeserializeSlotTableOptions<T> {
  /** Handle format the input was written with (defaults to structured) */
  format?: IndexFormat
  /** Validates and parses each value */
  valueSchema: ValueSchema<T>
}

// =============================================================================
// SERIALIZE
// =============================================================================

/**
 * Anything that lists live entries in slot order.
 */
export type SlotEntrySource<T> = Pick<ReadonlySlotTable<T>, "entries">

export function serializeSlotTable<T>(
  table: SlotEntrySource<T>,
  options?: { format?: IndexFormat },
): SerializedSlotTable<T>
export function serializeSlotTable<T, U>(
  table: SlotEntrySource<T>,
  options: SerializeSlotTableOptions<T, U> & { encodeValue: (value: T) => U },
): SerializedSlotTable<U>
export function serializeSlotTable<T>(
  table: SlotEntrySource<T>,
  options: SerializeSlotTableOptions<T, unknown> = {},
): SerializedSlotTable<unknown> {
  const encode = options.encodeValue ?? ((value: T): unknown => value)

  if (options.format === "compact") {
    const out: CompactSlotTable<unknown> = {}
    for (const [index, value] of table.entries()) {
      out[formatIndex(index)] = encode(value)
    }
    return out
  }

  const out: StructuredSlotEntry<unknown>[] = []
  for (const [index, value] of table.entries()) {
    out.push({ index: { slot: index.slot, generation: index.generation }, value: encode(value) })
  }
  return out
}

// =============================================================================
// DESERIALIZE
// =============================================================================

const compactTableSchema = z.record(z.string(), z.unknown())

const structuredTableSchema = z.array(
  z.object({
    index: structuredIndexSchema,
    value: z.unknown(),
  }),
)

/**
 * Rebuild a table from its serialized form.
 * @throws SlotTableDecodeError on malformed input, bad values or duplicate slots
 */
export function deserializeSlotTable<T>(
  input: unknown,
  options: DeserializeSlotTableOptions<T>,
): SlotTable<T> {
  const raw = readRawEntries(input, options.format ?? "structured")
  const entries: Array<[Index, T]> = []
  const issues: ZodIssue[] = []
  const seen = new Map<number, string>()

  for (const { index, value, path } of raw) {
    const previous = seen.get(index.slot)
    if (previous !== undefined) {
      throw new SlotTableDecodeError(
        `Duplicate entries for slot ${index.slot} (${previous} and ${formatIndex(index)})`,
      )
    }
    seen.set(index.slot, formatIndex(index))

    const parsed = options.valueSchema.safeParse(value)
    if (parsed.success) {
      entries.push([index, parsed.data])
    } else {
      issues.push(...parsed.error.issues.map((issue) => ({ ...issue, path: [...path, ...issue.path] })))
    }
  }

  if (issues.length > 0) {
    const first = issues[0]
    const where = first && first.path.length > 0 ? ` at ${first.path.join(".")}` : ""
    throw new SlotTableDecodeError(`Invalid slot table value${where}: ${first?.message ?? "validation failed"}`, issues)
  }

  return SlotTable.fromEntries(entries)
}

interface RawEntry {
  index: Index
  value: unknown
  path: Array<string | number>
}

function readRawEntries(input: unknown, format: IndexFormat): RawEntry[] {
  if (format === "compact") {
    const parsed = compactTableSchema.safeParse(input)
    if (!parsed.success) {
      throw new SlotTableDecodeError("Slot table must be an object keyed by index", parsed.error.issues)
    }
    return Object.entries(parsed.data).map(([key, value]) => {
      try {
        return { index: parseIndex(key), value, path: [key] }
      } catch (error) {
        if (error instanceof IndexDecodeError) {
          throw new SlotTableDecodeError(`Invalid slot table key: ${error.message}`, [], error)
        }
        throw error
      }
    })
  }

  const parsed = structuredTableSchema.safeParse(input)
  if (!parsed.success) {
    throw new SlotTableDecodeError("Slot table must be an array of { index, value } entries", parsed.error.issues)
  }
  return parsed.data.map(({ index, value }, position) => ({ index, value, path: [position, "value"] }))
}
