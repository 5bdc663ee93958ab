/**
 * Graph Diff Types
 *
 * One record per mutation. Each record holds everything needed to replay
 * the mutation or revert it, and the handles it carries pin down the
 * slot generations the graph must be at for either to succeed.
 */

import type { Edge, EdgeIndex, Vertex, VertexIndex } from "../types"

export interface AddVertexDiff<V> {
  readonly type: "AddVertex"
  readonly index: VertexIndex
  readonly data: V
}

export interface AddEdgeDiff<E> {
  readonly type: "AddEdge"
  readonly index: EdgeIndex
  readonly from: VertexIndex
  readonly to: VertexIndex
  readonly data: E
}

export interface RemoveEdgeDiff<E> {
  readonly type: "RemoveEdge"
  readonly index: EdgeIndex
  readonly edge: Edge<E>
}

/**
 * Removal of a vertex together with every edge that touched it.
 * `vertex` is recorded after its edges were detached, so its adjacency
 * lists are empty; `removedEdges` restores them.
 */
export interface RemoveVertexDiff<V, E> {
  readonly type: "RemoveVertex"
  readonly index: VertexIndex
  readonly vertex: Vertex<V>
  readonly removedEdges: readonly RemoveEdgeDiff<E>[]
}

export interface UpdateVertexDataDiff<V> {
  readonly type: "UpdateVertexData"
  readonly index: VertexIndex
  readonly before: V
  readonly after: V
}

export interface UpdateEdgeDataDiff<E> {
  readonly type: "UpdateEdgeData"
  readonly index: EdgeIndex
  readonly before: E
  readonly after: E
}

export type GraphDiff<V, E> =
  | AddVertexDiff<V>
  | AddEdgeDiff<E>
  | RemoveVertexDiff<V, E>
  | RemoveEdgeDiff<E>
  | UpdateVertexDataDiff<V>
  | UpdateEdgeDataDiff<E>

export type GraphDiffType = GraphDiff<unknown, unknown>["type"]
