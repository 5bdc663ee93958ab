import { describe, it, expect, beforeEach } from "vitest"
import { z } from "zod"
import { deserializeSlotTable, serializeSlotTable, SlotTable, SlotTableDecodeError } from "../src"

describe("slot table serialization", () => {
  let table: SlotTable<string>

  beforeEach(() => {
    table = new SlotTable<string>()
    table.add("a")
    const b = table.add("b")
    table.add("c")
    table.remove(b)
  })

  describe("serializeSlotTable", () => {
    it("should key live values by compact index", () => {
      expect(serializeSlotTable(table, { format: "compact" })).toEqual({ "0.0": "a", "2.0": "c" })
    })

    it("should list live values as structured entries by default", () => {
      expect(serializeSlotTable(table)).toEqual([
        { index: { slot: 0, generation: 0 }, value: "a" },
        { index: { slot: 2, generation: 0 }, value: "c" },
      ])
    })

    it("should encode values on the way out", () => {
      const out = serializeSlotTable(table, { format: "compact", encodeValue: (value: string) => value.toUpperCase() })
      expect(out).toEqual({ "0.0": "A", "2.0": "C" })
    })
  })

  describe("deserializeSlotTable", () => {
    it("should rebuild a compact table and thread gaps into the free list", () => {
      const loaded = deserializeSlotTable({ "0.0": "a", "2.0": "c" }, { format: "compact", valueSchema: z.string() })

      expect(loaded.get({ slot: 0, generation: 0 })).toBe("a")
      expect(loaded.get({ slot: 2, generation: 0 })).toBe("c")
      expect(loaded.capacity).toBe(3)
      expect([...loaded.freeSlots()]).toEqual([1])
      expect(loaded.checkFreeList()).toEqual([])
      expect(loaded.add("d")).toEqual({ slot: 1, generation: 0 })
    })

    it("should rebuild a structured table", () => {
      const loaded = deserializeSlotTable(serializeSlotTable(table), { valueSchema: z.string() })
      expect([...loaded.entries()]).toEqual([...table.entries()])
    })

    it("should keep generations from the input", () => {
      const loaded = deserializeSlotTable({ "1.4": 10 }, { format: "compact", valueSchema: z.number() })
      expect(loaded.get({ slot: 1, generation: 4 })).toBe(10)
      expect(loaded.get({ slot: 1, generation: 0 })).toBeUndefined()
    })

    it("should load an empty table", () => {
      const loaded = deserializeSlotTable({}, { format: "compact", valueSchema: z.string() })
      expect(loaded.size).toBe(0)
      expect(loaded.capacity).toBe(0)
    })

    it("should reject malformed keys", () => {
      expect(() => deserializeSlotTable({ abc: "a" }, { format: "compact", valueSchema: z.string() })).toThrow(
        'Invalid slot table key: Invalid index "abc": missing "." separator between slot and generation',
      )
    })

    it("should reject values that fail the schema", () => {
      try {
        deserializeSlotTable({ "0.0": 5 }, { format: "compact", valueSchema: z.string() })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(SlotTableDecodeError)
        if (error instanceof SlotTableDecodeError) {
          expect(error.message).toBe("Invalid slot table value at 0.0: Expected string, received number")
          expect(error.issues[0]?.path).toEqual(["0.0"])
        }
      }
    })

    it("should reject two entries for the same slot", () => {
      expect(() =>
        deserializeSlotTable({ "0.0": "a", "0.1": "b" }, { format: "compact", valueSchema: z.string() }),
      ).toThrow("Duplicate entries for slot 0 (0.0 and 0.1)")
    })

    it("should reject input of the wrong shape", () => {
      expect(() => deserializeSlotTable([], { format: "compact", valueSchema: z.string() })).toThrow(
        "Slot table must be an object keyed by index",
      )
      expect(() =>
        deserializeSlotTable([{ index: { slot: -1, generation: 0 }, value: "a" }], { valueSchema: z.string() }),
      ).toThrow(SlotTableDecodeError)
    })
  })
})
