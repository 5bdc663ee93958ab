/**
 * Index Codec
 *
 * Handles are written either as `{ slot, generation }` objects or, in
 * compact form, as `"slot.generation"` strings.
 */

import { z } from "zod"
import { IndexDecodeError } from "./errors"
import type { Index } from "./types"

export type IndexFormat = "structured" | "compact"

const DIGITS = /^\d+$/

export function formatIndex(index: Index): string {
  return `${index.slot}.${index.generation}`
}

/**
 * Parse a compact `"slot.generation"` string.
 * @throws IndexDecodeError when the string is malformed
 */
export function parseIndex(input: string): Index {
  const parts = input.split(".")
  if (parts.length < 2) {
    throw new IndexDecodeError(input, 'missing "." separator between slot and generation')
  }
  if (parts.length > 2) {
    throw new IndexDecodeError(input, `expected exactly one "." separator, found ${parts.length - 1}`)
  }

  const [slotPart = "", generationPart = ""] = parts
  return {
    slot: parseComponent(input, "slot", slotPart),
    generation: parseComponent(input, "generation", generationPart),
  }
}

function parseComponent(input: string, name: string, part: string): number {
  if (part === "") {
    throw new IndexDecodeError(input, `${name} is empty`)
  }
  if (!DIGITS.test(part)) {
    throw new IndexDecodeError(input, `${name} "${part}" is not a non-negative integer`)
  }
  const value = Number(part)
  if (!Number.isSafeInteger(value)) {
    throw new IndexDecodeError(input, `${name} ${part} is out of range`)
  }
  return value
}

export function indexesEqual(a: Index, b: Index): boolean {
  return a.slot === b.slot && a.generation === b.generation
}

/**
 * Order by slot, then generation.
 */
export function compareIndexes(a: Index, b: Index): number {
  if (a.slot !== b.slot) return a.slot - b.slot
  return a.generation - b.generation
}

// =============================================================================
// SCHEMAS
// =============================================================================

export const structuredIndexSchema = z
  .object({
    slot: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    generation: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  })
  .strict()

export const compactIndexSchema = z.string().transform((value, ctx): Index => {
  try {
    return parseIndex(value)
  } catch (error) {
    if (!(error instanceof IndexDecodeError)) throw error
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message })
    return z.NEVER
  }
})

export function indexSchema(format: IndexFormat): z.ZodType<Index, z.ZodTypeDef, unknown> {
  return format === "compact" ? compactIndexSchema : structuredIndexSchema
}

/**
 * Encode a handle in the requested format.
 */
export function encodeIndex(index: Index, format: IndexFormat): Index | string {
  return format === "compact" ? formatIndex(index) : { slot: index.slot, generation: index.generation }
}
