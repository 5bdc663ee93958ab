/**
 * Reversible directed graph.
 *
 * Vertices and edges live in generational slot tables, so handles detect
 * reuse. Every mutation returns a diff that can be rolled back or replayed.
 *
 * @example
 * ```typescript
 * import { createGraph, unwrap } from 'revgraph';
 *
 * const graph = createGraph<string, number>();
 * const a = graph.addVertex('a');
 * const b = graph.addVertex('b');
 * const edge = unwrap(graph.addEdge(a.index, b.index, 1));
 *
 * graph.rollbackDiff(edge.diff); // edge gone
 * graph.applyDiff(edge.diff);    // back, at the same handle
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// GRAPH
// =============================================================================

export { Graph, createGraph } from "./graph"
export type { GraphConfig, Added, Updated, Removed } from "./graph"

export { vertexIndex, edgeIndex } from "./types"
export type { VertexIndex, EdgeIndex, AdjacencyEntry, Vertex, Edge, Degree, GraphStats } from "./types"

// =============================================================================
// DIFFS
// =============================================================================

export type {
  GraphDiff,
  GraphDiffType,
  AddVertexDiff,
  AddEdgeDiff,
  RemoveVertexDiff,
  RemoveEdgeDiff,
  UpdateVertexDataDiff,
  UpdateEdgeDataDiff,
} from "./diff"

// =============================================================================
// RESULTS & ERRORS
// =============================================================================

export { ok, err, isOk, isErr, unwrap, unwrapErr, mapResult } from "./result"
export type { Ok, Err, GraphResult } from "./result"

export {
  GraphError,
  VertexDoesNotExistError,
  EdgeDoesNotExistError,
  InvalidDiffError,
  GraphCorruptionError,
  GraphDecodeError,
} from "./errors"
export type { GraphErrorCode, DiffAction } from "./errors"

// =============================================================================
// HOOKS & LOGGING
// =============================================================================

export { composeHooks } from "./hooks"
export type {
  GraphHooks,
  GraphOperation,
  HookContext,
  AfterMutationHook,
  AfterApplyHook,
  AfterRollbackHook,
  InvalidDiffHook,
} from "./hooks"

export { createLogger } from "./util/logger"
export { copyData } from "./util/copy"
export type { Logger, LoggerConfig, LogLevel, LogContext, LogHandler } from "./util/logger"

// =============================================================================
// CODECS
// =============================================================================

export { createGraphCodec } from "./codec"
export type {
  GraphCodec,
  GraphCodecOptions,
  EncodedIndex,
  EncodedEdge,
  EncodedGraph,
  EncodedRemovedEdge,
  EncodedDiff,
} from "./codec"

export { formatIndex, parseIndex, indexesEqual, SlotTable } from "@revgraph/slots"
export type { Index, IndexFormat, MutableEntry } from "@revgraph/slots"
