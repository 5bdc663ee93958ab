/**
 * Slot Table Errors
 */

import type { ZodIssue } from "zod"

/**
 * Base error for slot table failures.
 */
export class SlotTableError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "SlotTableError"
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * The table's internal bookkeeping no longer holds.
 * Never caused by caller input.
 */
export class SlotTableCorruptionError extends SlotTableError {
  constructor(message: string) {
    super(`Slot table corrupted: ${message}`)
    this.name = "SlotTableCorruptionError"
  }
}

/**
 * A compact index string could not be parsed.
 */
export class IndexDecodeError extends SlotTableError {
  constructor(
    public readonly input: string,
    public readonly reason: string,
  ) {
    super(`Invalid index "${input}": ${reason}`)
    this.name = "IndexDecodeError"
  }
}

/**
 * Serialized table data did not match the expected shape.
 */
export class SlotTableDecodeError extends SlotTableError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = [],
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "SlotTableDecodeError"
  }
}
