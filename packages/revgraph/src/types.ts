/**
 * Graph Types
 *
 * Vertex and edge handles, plus the read-only shapes handed to callers.
 */

import type { Index } from "@revgraph/slots"

// =============================================================================
// HANDLES
// =============================================================================

/**
 * Handle to a vertex. The `kind` tag keeps it from being passed where an
 * edge handle is expected.
 */
export interface VertexIndex extends Index {
  readonly kind: "vertex"
}

/**
 * Handle to an edge.
 */
export interface EdgeIndex extends Index {
  readonly kind: "edge"
}

export function vertexIndex(index: Index): VertexIndex {
  return { kind: "vertex", slot: index.slot, generation: index.generation }
}

export function edgeIndex(index: Index): EdgeIndex {
  return { kind: "edge", slot: index.slot, generation: index.generation }
}

// =============================================================================
// VIEWS
// =============================================================================

/**
 * One end of a connection: the vertex on the other side and the edge.
 */
export interface AdjacencyEntry {
  readonly vertex: VertexIndex
  readonly edge: EdgeIndex
}

export interface Vertex<V> {
  /** Edges leaving this vertex, paired with their targets */
  readonly outAdjacency: readonly AdjacencyEntry[]
  /** Edges arriving at this vertex, paired with their sources */
  readonly inAdjacency: readonly AdjacencyEntry[]
  readonly data: V
}

export interface Edge<E> {
  readonly from: VertexIndex
  readonly to: VertexIndex
  readonly data: E
}

export interface Degree {
  readonly outgoing: number
  readonly incoming: number
}

export interface GraphStats {
  vertices: number
  edges: number
  /** Physical vertex slots, live or open */
  vertexCapacity: number
  /** Physical edge slots, live or open */
  edgeCapacity: number
}
