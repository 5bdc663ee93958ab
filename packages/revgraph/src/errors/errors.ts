/**
 * Custom Error Classes
 */

import { formatIndex } from "@revgraph/slots"
import type { ZodIssue } from "zod"
import type { GraphDiffType } from "../diff/types"
import type { EdgeIndex, VertexIndex } from "../types"

export type GraphErrorCode =
  | "VERTEX_DOES_NOT_EXIST"
  | "EDGE_DOES_NOT_EXIST"
  | "INVALID_DIFF"
  | "GRAPH_CORRUPTED"
  | "DECODE_FAILED"

/**
 * Base error for all graph errors.
 */
export class GraphError extends Error {
  public override readonly cause?: Error

  constructor(
    message: string,
    public readonly code: GraphErrorCode,
    cause?: Error,
  ) {
    super(message)
    this.name = "GraphError"
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
 * A vertex handle did not resolve to a live vertex.
 */
export class VertexDoesNotExistError extends GraphError {
  constructor(public readonly index: VertexIndex) {
    super(`Vertex ${formatIndex(index)} does not exist`, "VERTEX_DOES_NOT_EXIST")
    this.name = "VertexDoesNotExistError"
  }
}

/**
 * An edge handle did not resolve to a live edge.
 */
export class EdgeDoesNotExistError extends GraphError {
  constructor(public readonly index: EdgeIndex) {
    super(`Edge ${formatIndex(index)} does not exist`, "EDGE_DOES_NOT_EXIST")
    this.name = "EdgeDoesNotExistError"
  }
}

export type DiffAction = "apply" | "rollback"

/**
 * A diff does not fit the graph's current state: it was replayed out of
 * order, twice, or against another graph.
 */
export class InvalidDiffError extends GraphError {
  constructor(
    public readonly action: DiffAction,
    public readonly diffType: GraphDiffType,
    public readonly index: VertexIndex | EdgeIndex,
    public readonly reason: string,
  ) {
    super(`Cannot ${action} ${diffType} diff for ${index.kind} ${formatIndex(index)}: ${reason}`, "INVALID_DIFF")
    this.name = "InvalidDiffError"
  }
}

/**
 * Graph bookkeeping is broken. Thrown, never returned.
 */
export class GraphCorruptionError extends GraphError {
  constructor(message: string) {
    super(`Graph state corrupted: ${message}`, "GRAPH_CORRUPTED")
    this.name = "GraphCorruptionError"
  }
}

/**
 * Encoded graph or diff data could not be decoded.
 */
export class GraphDecodeError extends GraphError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = [],
    cause?: Error,
  ) {
    super(message, "DECODE_FAILED", cause)
    this.name = "GraphDecodeError"
  }
}

/**
 * Assert an internal invariant.
 * @throws GraphCorruptionError when it does not hold
 */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new GraphCorruptionError(message)
  }
}
