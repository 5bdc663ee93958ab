/**
 * Graph
 *
 * Directed multigraph over two generational slot tables. Every mutation
 * returns a diff that can later be replayed with `applyDiff` or reverted
 * with `rollbackDiff` on the same graph.
 */

import { formatIndex, indexesEqual, SlotTable, type Index, type MutableEntry } from "@revgraph/slots"
import type {
  AddEdgeDiff,
  AddVertexDiff,
  GraphDiff,
  RemoveEdgeDiff,
  RemoveVertexDiff,
  UpdateEdgeDataDiff,
  UpdateVertexDataDiff,
} from "./diff"
import {
  EdgeDoesNotExistError,
  InvalidDiffError,
  invariant,
  VertexDoesNotExistError,
  type DiffAction,
} from "./errors"
import type { GraphHooks, GraphOperation } from "./hooks"
import { err, ok, type GraphResult } from "./result"
import {
  edgeIndex,
  vertexIndex,
  type AdjacencyEntry,
  type Degree,
  type Edge,
  type EdgeIndex,
  type GraphStats,
  type Vertex,
  type VertexIndex,
} from "./types"
import { copyData } from "./util/copy"
import { createLogger, type Logger } from "./util/logger"

/**
 * Configuration for a graph instance.
 */
export interface GraphConfig<V, E> {
  /** Lifecycle callbacks */
  hooks?: GraphHooks<V, E>
  /** Logger (defaults to a silent one) */
  logger?: Logger
  /** Copies data crossing the API boundary (defaults to a prototype-preserving deep copy) */
  cloneData?: <T>(value: T) => T
}

export interface Added<I, D> {
  readonly index: I
  readonly diff: D
}

export interface Updated<T, D> {
  /** Data held before the update */
  readonly previous: T
  readonly diff: D
}

export interface Removed<T, D> {
  /** Data the removed element held */
  readonly data: T
  readonly diff: D
}

interface VertexRecord<V> {
  outAdjacency: AdjacencyEntry[]
  inAdjacency: AdjacencyEntry[]
  data: V
}

interface EdgeRecord<E> {
  from: VertexIndex
  to: VertexIndex
  data: E
}

type RemovalMode = "advance" | "preserve"

export class Graph<V, E> {
  private vertexSlots = new SlotTable<VertexRecord<V>>()
  private edgeSlots = new SlotTable<EdgeRecord<E>>()

  private readonly hooks: GraphHooks<V, E>
  private readonly logger: Logger
  private readonly cloneData: <T>(value: T) => T

  constructor(private readonly config: GraphConfig<V, E> = {}) {
    this.hooks = config.hooks ?? {}
    this.logger = config.logger ?? createLogger()
    this.cloneData = config.cloneData ?? copyData
  }

  // ===========================================================================
  // MUTATIONS
  // ===========================================================================

  addVertex(data: V): Added<VertexIndex, AddVertexDiff<V>> {
    const index = vertexIndex(this.vertexSlots.add({ outAdjacency: [], inAdjacency: [], data: this.cloneData(data) }))
    const diff: AddVertexDiff<V> = { type: "AddVertex", index, data: this.cloneData(data) }

    this.afterMutation("addVertex", diff)
    return { index, diff }
  }

  /**
   * Connect `from` to `to`. Both endpoints are checked before anything
   * changes. Self-loops and parallel edges are allowed.
   */
  addEdge(
    from: VertexIndex,
    to: VertexIndex,
    data: E,
  ): GraphResult<Added<EdgeIndex, AddEdgeDiff<E>>, VertexDoesNotExistError> {
    const source = this.vertexSlots.get(from)
    if (!source) return err(new VertexDoesNotExistError(vertexIndex(from)))
    const target = this.vertexSlots.get(to)
    if (!target) return err(new VertexDoesNotExistError(vertexIndex(to)))

    const record: EdgeRecord<E> = { from: vertexIndex(from), to: vertexIndex(to), data: this.cloneData(data) }
    const index = edgeIndex(this.edgeSlots.add(record))
    source.outAdjacency.push({ vertex: record.to, edge: index })
    target.inAdjacency.push({ vertex: record.from, edge: index })

    const diff: AddEdgeDiff<E> = {
      type: "AddEdge",
      index,
      from: record.from,
      to: record.to,
      data: this.cloneData(data),
    }

    this.afterMutation("addEdge", diff)
    return ok({ index, diff })
  }

  updateVertex(
    index: VertexIndex,
    data: V,
  ): GraphResult<Updated<V, UpdateVertexDataDiff<V>>, VertexDoesNotExistError> {
    const vertex = this.vertexSlots.get(index)
    if (!vertex) return err(new VertexDoesNotExistError(vertexIndex(index)))

    const previous = vertex.data
    vertex.data = this.cloneData(data)
    const diff: UpdateVertexDataDiff<V> = {
      type: "UpdateVertexData",
      index: vertexIndex(index),
      before: this.cloneData(previous),
      after: this.cloneData(data),
    }

    this.afterMutation("updateVertex", diff)
    return ok({ previous, diff })
  }

  updateEdge(index: EdgeIndex, data: E): GraphResult<Updated<E, UpdateEdgeDataDiff<E>>, EdgeDoesNotExistError> {
    const edge = this.edgeSlots.get(index)
    if (!edge) return err(new EdgeDoesNotExistError(edgeIndex(index)))

    const previous = edge.data
    edge.data = this.cloneData(data)
    const diff: UpdateEdgeDataDiff<E> = {
      type: "UpdateEdgeData",
      index: edgeIndex(index),
      before: this.cloneData(previous),
      after: this.cloneData(data),
    }

    this.afterMutation("updateEdge", diff)
    return ok({ previous, diff })
  }

  removeEdge(index: EdgeIndex): GraphResult<Removed<E, RemoveEdgeDiff<E>>, EdgeDoesNotExistError> {
    if (!this.edgeSlots.has(index)) return err(new EdgeDoesNotExistError(edgeIndex(index)))

    const { data, diff } = this.removeEdgeRecord(edgeIndex(index))
    this.afterMutation("removeEdge", diff)
    return ok({ data, diff })
  }

  /**
   * Remove a vertex and every edge touching it. The diff carries the
   * removed edges so a rollback restores the whole neighbourhood.
   */
  removeVertex(index: VertexIndex): GraphResult<Removed<V, RemoveVertexDiff<V, E>>, VertexDoesNotExistError> {
    if (!this.vertexSlots.has(index)) return err(new VertexDoesNotExistError(vertexIndex(index)))

    const { data, diff } = this.removeVertexRecord(vertexIndex(index))
    this.afterMutation("removeVertex", diff)
    return ok({ data, diff })
  }

  /**
   * Drop every vertex and edge. Slot generations restart at 0, so a
   * handle taken before the clear can match an element added after it.
   */
  clear(): void {
    this.vertexSlots.clear()
    this.edgeSlots.clear()
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  get vertexCount(): number {
    return this.vertexSlots.size
  }

  get edgeCount(): number {
    return this.edgeSlots.size
  }

  hasVertex(index: VertexIndex): boolean {
    return this.vertexSlots.has(index)
  }

  hasEdge(index: EdgeIndex): boolean {
    return this.edgeSlots.has(index)
  }

  getVertex(index: VertexIndex): Vertex<V> | undefined {
    const vertex = this.vertexSlots.get(index)
    return vertex ? this.copyVertex(vertex) : undefined
  }

  getEdge(index: EdgeIndex): Edge<E> | undefined {
    const edge = this.edgeSlots.get(index)
    return edge ? this.copyEdge(edge) : undefined
  }

  getVertexData(index: VertexIndex): V | undefined {
    const vertex = this.vertexSlots.get(index)
    return vertex ? this.cloneData(vertex.data) : undefined
  }

  getEdgeData(index: EdgeIndex): E | undefined {
    const edge = this.edgeSlots.get(index)
    return edge ? this.cloneData(edge.data) : undefined
  }

  /**
   * Check a vertex exists before a multi-step operation.
   */
  assertVertexExists(index: VertexIndex): GraphResult<void, VertexDoesNotExistError> {
    return this.vertexSlots.has(index) ? ok() : err(new VertexDoesNotExistError(vertexIndex(index)))
  }

  /**
   * Check an edge exists before a multi-step operation.
   */
  assertEdgeExists(index: EdgeIndex): GraphResult<void, EdgeDoesNotExistError> {
    return this.edgeSlots.has(index) ? ok() : err(new EdgeDoesNotExistError(edgeIndex(index)))
  }

  /**
   * Edges directed from `from` to `to`, in one direction only. The result
   * is lazy and reads the graph each time it is iterated.
   */
  sharedEdges(from: VertexIndex, to: VertexIndex): GraphResult<Iterable<EdgeIndex>, VertexDoesNotExistError> {
    if (!this.vertexSlots.has(from)) return err(new VertexDoesNotExistError(vertexIndex(from)))

    const slots = this.vertexSlots
    const source = vertexIndex(from)
    return ok({
      *[Symbol.iterator]() {
        const vertex = slots.get(source)
        if (!vertex) return
        for (const entry of vertex.outAdjacency) {
          if (indexesEqual(entry.vertex, to)) yield entry.edge
        }
      },
    })
  }

  outgoing(index: VertexIndex): GraphResult<AdjacencyEntry[], VertexDoesNotExistError> {
    const vertex = this.vertexSlots.get(index)
    return vertex ? ok([...vertex.outAdjacency]) : err(new VertexDoesNotExistError(vertexIndex(index)))
  }

  incoming(index: VertexIndex): GraphResult<AdjacencyEntry[], VertexDoesNotExistError> {
    const vertex = this.vertexSlots.get(index)
    return vertex ? ok([...vertex.inAdjacency]) : err(new VertexDoesNotExistError(vertexIndex(index)))
  }

  degree(index: VertexIndex): GraphResult<Degree, VertexDoesNotExistError> {
    const vertex = this.vertexSlots.get(index)
    if (!vertex) return err(new VertexDoesNotExistError(vertexIndex(index)))
    return ok({ outgoing: vertex.outAdjacency.length, incoming: vertex.inAdjacency.length })
  }

  stats(): GraphStats {
    return {
      vertices: this.vertexSlots.size,
      edges: this.edgeSlots.size,
      vertexCapacity: this.vertexSlots.capacity,
      edgeCapacity: this.edgeSlots.capacity,
    }
  }

  // ===========================================================================
  // ITERATION
  // ===========================================================================

  *vertexIndexes(): IterableIterator<VertexIndex> {
    for (const index of this.vertexSlots.indexes()) yield vertexIndex(index)
  }

  *edgeIndexes(): IterableIterator<EdgeIndex> {
    for (const index of this.edgeSlots.indexes()) yield edgeIndex(index)
  }

  *vertices(): IterableIterator<[VertexIndex, Vertex<V>]> {
    for (const [index, vertex] of this.vertexSlots.entries()) {
      yield [vertexIndex(index), this.copyVertex(vertex)]
    }
  }

  *edges(): IterableIterator<[EdgeIndex, Edge<E>]> {
    for (const [index, edge] of this.edgeSlots.entries()) {
      yield [edgeIndex(index), this.copyEdge(edge)]
    }
  }

  *vertexData(): IterableIterator<[VertexIndex, V]> {
    for (const [index, vertex] of this.vertexSlots.entries()) {
      yield [vertexIndex(index), this.cloneData(vertex.data)]
    }
  }

  *edgeData(): IterableIterator<[EdgeIndex, E]> {
    for (const [index, edge] of this.edgeSlots.entries()) {
      yield [edgeIndex(index), this.cloneData(edge.data)]
    }
  }

  /**
   * Live data of one vertex. Writes through the entry are not recorded in
   * any diff; use `updateVertex` for tracked changes.
   */
  getVertexDataMut(index: VertexIndex): MutableEntry<VertexIndex, V> | undefined {
    const record = this.vertexSlots.get(index)
    return record ? liveData(vertexIndex(index), record) : undefined
  }

  /**
   * Live data of one edge. Writes through the entry are not recorded in
   * any diff; use `updateEdge` for tracked changes.
   */
  getEdgeDataMut(index: EdgeIndex): MutableEntry<EdgeIndex, E> | undefined {
    const record = this.edgeSlots.get(index)
    return record ? liveData(edgeIndex(index), record) : undefined
  }

  /**
   * Live vertex data. Writes here are not recorded in any diff; use
   * `updateVertex` for tracked changes.
   */
  *vertexDataMut(): IterableIterator<MutableEntry<VertexIndex, V>> {
    for (const entry of this.vertexSlots.entriesMut()) {
      yield liveData(vertexIndex(entry.index), entry.value)
    }
  }

  /**
   * Live edge data. Writes here are not recorded in any diff; use
   * `updateEdge` for tracked changes.
   */
  *edgeDataMut(): IterableIterator<MutableEntry<EdgeIndex, E>> {
    for (const entry of this.edgeSlots.entriesMut()) {
      yield liveData(edgeIndex(entry.index), entry.value)
    }
  }

  // ===========================================================================
  // DIFFS
  // ===========================================================================

  /**
   * Replay a diff. The graph must be in the state the diff was recorded
   * from; otherwise nothing changes and an `InvalidDiffError` is returned.
   */
  applyDiff(diff: GraphDiff<V, E>): GraphResult<void, InvalidDiffError> {
    const result = this.dispatchApply(diff)
    this.afterReplay("applyDiff", diff, result)
    return result
  }

  /**
   * Revert a diff. The graph must be in the state the diff produced;
   * otherwise nothing changes and an `InvalidDiffError` is returned.
   */
  rollbackDiff(diff: GraphDiff<V, E>): GraphResult<void, InvalidDiffError> {
    const result = this.dispatchRollback(diff)
    this.afterReplay("rollbackDiff", diff, result)
    return result
  }

  private dispatchApply(diff: GraphDiff<V, E>): GraphResult<void, InvalidDiffError> {
    switch (diff.type) {
      case "AddVertex":
        return this.applyAddVertex(diff)
      case "AddEdge":
        return this.applyAddEdge(diff)
      case "UpdateVertexData":
        return this.writeVertexData("apply", diff, diff.after)
      case "UpdateEdgeData":
        return this.writeEdgeData("apply", diff, diff.after)
      case "RemoveEdge":
        return this.applyRemoveEdge(diff)
      case "RemoveVertex":
        return this.applyRemoveVertex(diff)
    }
  }

  private dispatchRollback(diff: GraphDiff<V, E>): GraphResult<void, InvalidDiffError> {
    switch (diff.type) {
      case "AddVertex":
        return this.rollbackAddVertex(diff)
      case "AddEdge":
        return this.rollbackAddEdge(diff)
      case "UpdateVertexData":
        return this.writeVertexData("rollback", diff, diff.before)
      case "UpdateEdgeData":
        return this.writeEdgeData("rollback", diff, diff.before)
      case "RemoveEdge":
        return this.rollbackRemoveEdge(diff)
      case "RemoveVertex":
        return this.rollbackRemoveVertex(diff)
    }
  }

  private applyAddVertex(diff: AddVertexDiff<V>): GraphResult<void, InvalidDiffError> {
    if (!this.vertexSlots.isOpenAtGeneration(diff.index)) {
      return invalid("apply", diff, `slot ${diff.index.slot} is not open at generation ${diff.index.generation}`)
    }

    this.vertexSlots.forceWriteOccupied(diff.index, {
      outAdjacency: [],
      inAdjacency: [],
      data: this.cloneData(diff.data),
    })
    return ok()
  }

  private applyAddEdge(diff: AddEdgeDiff<E>): GraphResult<void, InvalidDiffError> {
    const missing = this.firstMissingVertex([diff.from, diff.to])
    if (missing) {
      return invalid("apply", diff, `endpoint vertex ${formatIndex(missing)} does not exist`)
    }
    if (!this.edgeSlots.isOpenAtGeneration(diff.index)) {
      return invalid("apply", diff, `slot ${diff.index.slot} is not open at generation ${diff.index.generation}`)
    }

    this.restoreEdge(edgeIndex(diff.index), { from: diff.from, to: diff.to, data: diff.data })
    return ok()
  }

  private applyRemoveEdge(diff: RemoveEdgeDiff<E>): GraphResult<void, InvalidDiffError> {
    if (!this.edgeSlots.has(diff.index)) {
      return invalid("apply", diff, "edge does not exist")
    }
    this.removeEdgeRecord(edgeIndex(diff.index))
    return ok()
  }

  private applyRemoveVertex(diff: RemoveVertexDiff<V, E>): GraphResult<void, InvalidDiffError> {
    if (!this.vertexSlots.has(diff.index)) {
      return invalid("apply", diff, "vertex does not exist")
    }
    this.removeVertexRecord(vertexIndex(diff.index))
    return ok()
  }

  private rollbackAddVertex(diff: AddVertexDiff<V>): GraphResult<void, InvalidDiffError> {
    const vertex = this.vertexSlots.get(diff.index)
    if (!vertex) {
      return invalid("rollback", diff, "vertex does not exist")
    }
    const incident = this.incidentEdges(vertex).length
    if (incident > 0) {
      return invalid("rollback", diff, `vertex still has ${incident} incident edge(s)`)
    }

    const removed = this.vertexSlots.removePreservingGeneration(diff.index)
    invariant(removed, `vertex ${formatIndex(diff.index)} vanished during rollback`)
    return ok()
  }

  private rollbackAddEdge(diff: AddEdgeDiff<E>): GraphResult<void, InvalidDiffError> {
    if (!this.edgeSlots.has(diff.index)) {
      return invalid("rollback", diff, "edge does not exist")
    }
    this.detachEdge(edgeIndex(diff.index), "preserve")
    return ok()
  }

  private rollbackRemoveEdge(diff: RemoveEdgeDiff<E>): GraphResult<void, InvalidDiffError> {
    if (!this.edgeSlots.isOpenAtGenerationPlusOne(diff.index)) {
      return invalid("rollback", diff, `slot ${diff.index.slot} is not open at generation ${diff.index.generation + 1}`)
    }
    const missing = this.firstMissingVertex([diff.edge.from, diff.edge.to])
    if (missing) {
      return invalid("rollback", diff, `endpoint vertex ${formatIndex(missing)} does not exist`)
    }

    this.restoreEdge(edgeIndex(diff.index), diff.edge)
    return ok()
  }

  private rollbackRemoveVertex(diff: RemoveVertexDiff<V, E>): GraphResult<void, InvalidDiffError> {
    if (!this.vertexSlots.isOpenAtGenerationPlusOne(diff.index)) {
      return invalid("rollback", diff, `slot ${diff.index.slot} is not open at generation ${diff.index.generation + 1}`)
    }

    // Every precondition is checked before the first write
    const restoredSlots = new Set<number>()
    for (const removed of diff.removedEdges) {
      const label = `removed edge ${formatIndex(removed.index)}`
      if (restoredSlots.has(removed.index.slot)) {
        return invalid("rollback", diff, `${label} shares its slot with another removed edge`)
      }
      restoredSlots.add(removed.index.slot)

      if (!this.edgeSlots.isOpenAtGenerationPlusOne(removed.index)) {
        return invalid("rollback", diff, `${label}: slot is not open at generation ${removed.index.generation + 1}`)
      }

      const { from, to } = removed.edge
      if (!indexesEqual(from, diff.index) && !indexesEqual(to, diff.index)) {
        return invalid("rollback", diff, `${label} does not touch the removed vertex`)
      }
      const missing = this.firstMissingVertex([from, to].filter((endpoint) => !indexesEqual(endpoint, diff.index)))
      if (missing) {
        return invalid("rollback", diff, `${label}: endpoint vertex ${formatIndex(missing)} does not exist`)
      }
    }

    this.vertexSlots.forceWriteOccupied(diff.index, {
      outAdjacency: [],
      inAdjacency: [],
      data: this.cloneData(diff.vertex.data),
    })
    for (const removed of diff.removedEdges) {
      this.restoreEdge(edgeIndex(removed.index), removed.edge)
    }
    return ok()
  }

  private writeVertexData(
    action: DiffAction,
    diff: UpdateVertexDataDiff<V>,
    data: V,
  ): GraphResult<void, InvalidDiffError> {
    const vertex = this.vertexSlots.get(diff.index)
    if (!vertex) {
      return invalid(action, diff, "vertex does not exist")
    }
    vertex.data = this.cloneData(data)
    return ok()
  }

  private writeEdgeData(action: DiffAction, diff: UpdateEdgeDataDiff<E>, data: E): GraphResult<void, InvalidDiffError> {
    const edge = this.edgeSlots.get(diff.index)
    if (!edge) {
      return invalid(action, diff, "edge does not exist")
    }
    edge.data = this.cloneData(data)
    return ok()
  }

  // ===========================================================================
  // MAINTENANCE
  // ===========================================================================

  /**
   * Independent deep copy with the same handles and free slots.
   */
  clone(): Graph<V, E> {
    const copy = new Graph<V, E>(this.config)
    copy.vertexSlots = this.vertexSlots.map((vertex) => ({
      outAdjacency: [...vertex.outAdjacency],
      inAdjacency: [...vertex.inAdjacency],
      data: this.cloneData(vertex.data),
    }))
    copy.edgeSlots = this.edgeSlots.map((edge) => ({ ...edge, data: this.cloneData(edge.data) }))
    return copy
  }

  /**
   * Verify adjacency and free-list bookkeeping.
   * @returns human-readable violations, empty when the graph is sound
   */
  checkInvariants(): string[] {
    const violations: string[] = []
    const outSeen = new Map<string, number>()
    const inSeen = new Map<string, number>()

    for (const [index, vertex] of this.vertexSlots.entries()) {
      const vertexLabel = formatIndex(index)
      const check = (entries: AdjacencyEntry[], direction: "out" | "in", seen: Map<string, number>) => {
        for (const entry of entries) {
          const edgeLabel = formatIndex(entry.edge)
          seen.set(edgeLabel, (seen.get(edgeLabel) ?? 0) + 1)
          const edge = this.edgeSlots.get(entry.edge)
          if (!edge) {
            violations.push(`vertex ${vertexLabel} lists ${direction} edge ${edgeLabel}, which does not exist`)
            continue
          }
          const self = direction === "out" ? edge.from : edge.to
          const other = direction === "out" ? edge.to : edge.from
          if (!indexesEqual(self, index) || !indexesEqual(other, entry.vertex)) {
            violations.push(`vertex ${vertexLabel} lists ${direction} edge ${edgeLabel} with mismatched endpoints`)
          }
        }
      }
      check(vertex.outAdjacency, "out", outSeen)
      check(vertex.inAdjacency, "in", inSeen)
    }

    for (const [index, edge] of this.edgeSlots.entries()) {
      const edgeLabel = formatIndex(index)
      if (!this.vertexSlots.has(edge.from) || !this.vertexSlots.has(edge.to)) {
        violations.push(`edge ${edgeLabel} has an endpoint that does not exist`)
      }
      if (outSeen.get(edgeLabel) !== 1) {
        violations.push(`edge ${edgeLabel} appears ${outSeen.get(edgeLabel) ?? 0} time(s) in outgoing adjacency`)
      }
      if (inSeen.get(edgeLabel) !== 1) {
        violations.push(`edge ${edgeLabel} appears ${inSeen.get(edgeLabel) ?? 0} time(s) in incoming adjacency`)
      }
    }

    violations.push(...this.vertexSlots.checkFreeList().map((message) => `vertex table: ${message}`))
    violations.push(...this.edgeSlots.checkFreeList().map((message) => `edge table: ${message}`))
    return violations
  }

  /**
   * Replace the graph's contents with prebuilt tables, keeping their
   * handles and free slots, and rebuild adjacency from the edges in slot
   * order. Every edge endpoint must be a live vertex.
   * @internal
   */
  loadTables(vertices: SlotTable<V>, edges: SlotTable<Edge<E>>): void {
    const vertexSlots = vertices.map((data): VertexRecord<V> => ({ outAdjacency: [], inAdjacency: [], data }))
    const edgeSlots = edges.map(
      (edge): EdgeRecord<E> => ({ from: vertexIndex(edge.from), to: vertexIndex(edge.to), data: edge.data }),
    )

    for (const [slotIndex, edge] of edgeSlots.entries()) {
      const index = edgeIndex(slotIndex)
      const source = vertexSlots.get(edge.from)
      invariant(source, `edge ${formatIndex(index)} leaves missing vertex ${formatIndex(edge.from)}`)
      const target = vertexSlots.get(edge.to)
      invariant(target, `edge ${formatIndex(index)} enters missing vertex ${formatIndex(edge.to)}`)
      source.outAdjacency.push({ vertex: edge.to, edge: index })
      target.inAdjacency.push({ vertex: edge.from, edge: index })
    }

    this.vertexSlots = vertexSlots
    this.edgeSlots = edgeSlots
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private removeEdgeRecord(index: EdgeIndex): Removed<E, RemoveEdgeDiff<E>> {
    const record = this.detachEdge(index, "advance")
    return {
      data: record.data,
      diff: {
        type: "RemoveEdge",
        index,
        edge: { from: record.from, to: record.to, data: this.cloneData(record.data) },
      },
    }
  }

  private removeVertexRecord(index: VertexIndex): Removed<V, RemoveVertexDiff<V, E>> {
    const vertex = this.vertexSlots.get(index)
    invariant(vertex, `vertex ${formatIndex(index)} vanished before removal`)

    const removedEdges = this.incidentEdges(vertex).map((edge) => this.removeEdgeRecord(edge).diff)
    const record = this.vertexSlots.remove(index)
    invariant(record, `vertex ${formatIndex(index)} vanished during removal`)

    return {
      data: record.data,
      diff: {
        type: "RemoveVertex",
        index,
        vertex: { outAdjacency: [], inAdjacency: [], data: this.cloneData(record.data) },
        removedEdges,
      },
    }
  }

  /**
   * Unlink a live edge from both endpoints and free its slot.
   */
  private detachEdge(index: EdgeIndex, mode: RemovalMode): EdgeRecord<E> {
    const edge = this.edgeSlots.get(index)
    invariant(edge, `edge ${formatIndex(index)} vanished before removal`)

    const source = this.vertexSlots.get(edge.from)
    invariant(source, `edge ${formatIndex(index)} leaves missing vertex ${formatIndex(edge.from)}`)
    const target = this.vertexSlots.get(edge.to)
    invariant(target, `edge ${formatIndex(index)} enters missing vertex ${formatIndex(edge.to)}`)

    dropEntry(source.outAdjacency, index, "outgoing")
    dropEntry(target.inAdjacency, index, "incoming")

    const removed =
      mode === "advance" ? this.edgeSlots.remove(index) : this.edgeSlots.removePreservingGeneration(index)
    invariant(removed, `edge ${formatIndex(index)} vanished during removal`)
    return removed
  }

  /**
   * Write an edge back at its recorded handle and relink both endpoints.
   */
  private restoreEdge(index: EdgeIndex, edge: Edge<E>): void {
    const record: EdgeRecord<E> = {
      from: vertexIndex(edge.from),
      to: vertexIndex(edge.to),
      data: this.cloneData(edge.data),
    }
    const source = this.vertexSlots.get(record.from)
    invariant(source, `cannot restore edge ${formatIndex(index)}: vertex ${formatIndex(record.from)} is missing`)
    const target = this.vertexSlots.get(record.to)
    invariant(target, `cannot restore edge ${formatIndex(index)}: vertex ${formatIndex(record.to)} is missing`)

    this.edgeSlots.forceWriteOccupied(index, record)
    source.outAdjacency.push({ vertex: record.to, edge: index })
    target.inAdjacency.push({ vertex: record.from, edge: index })
  }

  /**
   * Edges touching a vertex, outgoing first. A self-loop is listed once.
   */
  private incidentEdges(vertex: VertexRecord<V>): EdgeIndex[] {
    const seen = new Set<string>()
    const edges: EdgeIndex[] = []
    for (const entry of [...vertex.outAdjacency, ...vertex.inAdjacency]) {
      const key = formatIndex(entry.edge)
      if (seen.has(key)) continue
      seen.add(key)
      edges.push(entry.edge)
    }
    return edges
  }

  private firstMissingVertex(indexes: readonly Index[]): Index | undefined {
    return indexes.find((index) => !this.vertexSlots.has(index))
  }

  private copyVertex(vertex: VertexRecord<V>): Vertex<V> {
    return {
      outAdjacency: [...vertex.outAdjacency],
      inAdjacency: [...vertex.inAdjacency],
      data: this.cloneData(vertex.data),
    }
  }

  private copyEdge(edge: EdgeRecord<E>): Edge<E> {
    return { from: edge.from, to: edge.to, data: this.cloneData(edge.data) }
  }

  private afterMutation(operation: GraphOperation, diff: GraphDiff<V, E>): void {
    this.logger.debug(`${operation} ${formatIndex(diff.index)}`, { operation, diff: diff.type })
    this.hooks.afterMutation?.(diff, { operation, timestamp: new Date() })
  }

  private afterReplay(
    operation: "applyDiff" | "rollbackDiff",
    diff: GraphDiff<V, E>,
    result: GraphResult<void, InvalidDiffError>,
  ): void {
    const ctx = { operation, timestamp: new Date() }
    if (!result.ok) {
      this.logger.warn(result.error.message, { operation, diff: diff.type })
      this.hooks.onInvalidDiff?.(result.error, ctx)
      return
    }

    this.logger.debug(`${operation} ${diff.type} ${formatIndex(diff.index)}`, { operation, diff: diff.type })
    if (operation === "applyDiff") {
      this.hooks.afterApply?.(diff, ctx)
    } else {
      this.hooks.afterRollback?.(diff, ctx)
    }
  }
}

/**
 * Create a new, empty graph.
 */
export function createGraph<V, E>(config?: GraphConfig<V, E>): Graph<V, E> {
  return new Graph<V, E>(config)
}

function invalid(
  action: DiffAction,
  diff: GraphDiff<unknown, unknown>,
  reason: string,
): GraphResult<never, InvalidDiffError> {
  return err(new InvalidDiffError(action, diff.type, diff.index, reason))
}

/**
 * Entry whose `value` reads and writes the record's data in place.
 */
function liveData<I, T>(index: I, record: { data: T }): MutableEntry<I, T> {
  return {
    index,
    get value() {
      return record.data
    },
    set value(data: T) {
      record.data = data
    },
  }
}

function dropEntry(entries: AdjacencyEntry[], edge: EdgeIndex, direction: string): void {
  const position = entries.findIndex((entry) => indexesEqual(entry.edge, edge))
  invariant(position >= 0, `edge ${formatIndex(edge)} is missing from its endpoint's ${direction} adjacency`)
  entries.splice(position, 1)
}
