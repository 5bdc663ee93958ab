import { describe, it, expect, beforeEach } from "vitest"
import {
  createGraph,
  edgeIndex,
  EdgeDoesNotExistError,
  Graph,
  unwrap,
  unwrapErr,
  vertexIndex,
  VertexDoesNotExistError,
} from "../src"

describe("Graph", () => {
  let graph: Graph<string, number>

  beforeEach(() => {
    graph = createGraph<string, number>()
  })

  describe("addVertex", () => {
    it("should hand out vertex handles in slot order", () => {
      const a = graph.addVertex("a")
      const b = graph.addVertex("b")

      expect(a.index).toEqual({ kind: "vertex", slot: 0, generation: 0 })
      expect(b.index).toEqual({ kind: "vertex", slot: 1, generation: 0 })
      expect(graph.vertexCount).toBe(2)
    })

    it("should return an AddVertex diff", () => {
      const { index, diff } = graph.addVertex("a")

      expect(diff).toEqual({ type: "AddVertex", index, data: "a" })
    })
  })

  describe("addEdge", () => {
    it("should link both endpoints", () => {
      const a = graph.addVertex("a").index
      const b = graph.addVertex("b").index
      const { index, diff } = unwrap(graph.addEdge(a, b, 7))

      expect(index).toEqual({ kind: "edge", slot: 0, generation: 0 })
      expect(diff).toEqual({ type: "AddEdge", index, from: a, to: b, data: 7 })
      expect(unwrap(graph.outgoing(a))).toEqual([{ vertex: b, edge: index }])
      expect(unwrap(graph.incoming(b))).toEqual([{ vertex: a, edge: index }])
      expect(graph.getEdge(index)).toEqual({ from: a, to: b, data: 7 })
    })

    it("should allow self-loops and parallel edges", () => {
      const a = graph.addVertex("a").index
      const b = graph.addVertex("b").index

      unwrap(graph.addEdge(a, a, 1))
      unwrap(graph.addEdge(a, b, 2))
      unwrap(graph.addEdge(a, b, 3))

      expect(unwrap(graph.degree(a))).toEqual({ outgoing: 3, incoming: 1 })
      expect(unwrap(graph.degree(b))).toEqual({ outgoing: 0, incoming: 2 })
      expect(graph.checkInvariants()).toEqual([])
    })

    it("should fail without mutating when an endpoint is missing", () => {
      const a = graph.addVertex("a").index
      const ghost = vertexIndex({ slot: 5, generation: 0 })

      const error = unwrapErr(graph.addEdge(a, ghost, 1))

      expect(error).toBeInstanceOf(VertexDoesNotExistError)
      expect(error.message).toBe("Vertex 5.0 does not exist")
      expect(error.index).toEqual(ghost)
      expect(graph.edgeCount).toBe(0)
      expect(unwrap(graph.degree(a))).toEqual({ outgoing: 0, incoming: 0 })
    })
  })

  describe("stale handles", () => {
    it("should reject a handle after its slot was reused", () => {
      const a = graph.addVertex("a").index
      unwrap(graph.removeVertex(a))
      const b = graph.addVertex("b").index

      expect(b).toEqual({ kind: "vertex", slot: 0, generation: 1 })
      expect(graph.getVertex(a)).toBeUndefined()
      expect(graph.getVertexData(b)).toBe("b")
      expect(graph.hasVertex(a)).toBe(false)
      expect(unwrapErr(graph.updateVertex(a, "x")).message).toBe("Vertex 0.0 does not exist")
    })

    it("should reject a stale edge handle", () => {
      const a = graph.addVertex("a").index
      const e = unwrap(graph.addEdge(a, a, 1)).index
      unwrap(graph.removeEdge(e))

      const error = unwrapErr(graph.removeEdge(e))
      expect(error).toBeInstanceOf(EdgeDoesNotExistError)
      expect(error.message).toBe("Edge 0.0 does not exist")
      expect(graph.getEdgeData(e)).toBeUndefined()
    })
  })

  describe("updates", () => {
    it("should return the previous data and a before/after diff", () => {
      const a = graph.addVertex("a").index
      const { previous, diff } = unwrap(graph.updateVertex(a, "z"))

      expect(previous).toBe("a")
      expect(diff).toEqual({ type: "UpdateVertexData", index: a, before: "a", after: "z" })
      expect(graph.getVertexData(a)).toBe("z")
    })

    it("should update edge data", () => {
      const a = graph.addVertex("a").index
      const e = unwrap(graph.addEdge(a, a, 1)).index
      const { previous, diff } = unwrap(graph.updateEdge(e, 2))

      expect(previous).toBe(1)
      expect(diff).toEqual({ type: "UpdateEdgeData", index: e, before: 1, after: 2 })
      expect(graph.getEdgeData(e)).toBe(2)
    })

    it("should report a missing edge", () => {
      expect(unwrapErr(graph.updateEdge(edgeIndex({ slot: 0, generation: 0 }), 1))).toBeInstanceOf(
        EdgeDoesNotExistError,
      )
    })
  })

  describe("removeEdge", () => {
    it("should detach the edge from both endpoints", () => {
      const a = graph.addVertex("a").index
      const b = graph.addVertex("b").index
      const e = unwrap(graph.addEdge(a, b, 4)).index

      const { data, diff } = unwrap(graph.removeEdge(e))

      expect(data).toBe(4)
      expect(diff).toEqual({ type: "RemoveEdge", index: e, edge: { from: a, to: b, data: 4 } })
      expect(graph.hasEdge(e)).toBe(false)
      expect(unwrap(graph.outgoing(a))).toEqual([])
      expect(unwrap(graph.incoming(b))).toEqual([])
    })
  })

  describe("removeVertex", () => {
    it("should remove every incident edge, outgoing first and self-loops once", () => {
      const a = graph.addVertex("a").index
      const b = graph.addVertex("b").index
      const c = graph.addVertex("c").index
      const ab = unwrap(graph.addEdge(a, b, 1)).index
      const ca = unwrap(graph.addEdge(c, a, 2)).index
      const aa = unwrap(graph.addEdge(a, a, 3)).index

      const { data, diff } = unwrap(graph.removeVertex(a))

      expect(data).toBe("a")
      expect(diff.vertex).toEqual({ outAdjacency: [], inAdjacency: [], data: "a" })
      expect(diff.removedEdges.map((removed) => removed.index)).toEqual([ab, aa, ca])
      expect(diff.removedEdges[2]?.edge).toEqual({ from: c, to: a, data: 2 })
      expect(graph.edgeCount).toBe(0)
      expect(unwrap(graph.degree(b))).toEqual({ outgoing: 0, incoming: 0 })
      expect(unwrap(graph.degree(c))).toEqual({ outgoing: 0, incoming: 0 })
      expect(graph.checkInvariants()).toEqual([])
    })

    it("should report a missing vertex", () => {
      const error = unwrapErr(graph.removeVertex(vertexIndex({ slot: 2, generation: 3 })))
      expect(error.message).toBe("Vertex 2.3 does not exist")
    })
  })

  describe("queries", () => {
    it("should list shared edges in one direction only", () => {
      const a = graph.addVertex("a").index
      const b = graph.addVertex("b").index
      const first = unwrap(graph.addEdge(a, b, 1)).index
      const second = unwrap(graph.addEdge(a, b, 2)).index
      const back = unwrap(graph.addEdge(b, a, 3)).index

      expect([...unwrap(graph.sharedEdges(a, b))]).toEqual([first, second])
      expect([...unwrap(graph.sharedEdges(b, a))]).toEqual([back])
    })

    it("should read shared edges lazily", () => {
      const a = graph.addVertex("a").index
      const b = graph.addVertex("b").index
      const shared = unwrap(graph.sharedEdges(a, b))

      expect([...shared]).toEqual([])
      const e = unwrap(graph.addEdge(a, b, 1)).index
      expect([...shared]).toEqual([e])
    })

    it("should fail shared edges for a missing source and yield nothing for a missing target", () => {
      const a = graph.addVertex("a").index
      const ghost = vertexIndex({ slot: 9, generation: 0 })

      expect(unwrapErr(graph.sharedEdges(ghost, a))).toBeInstanceOf(VertexDoesNotExistError)
      expect([...unwrap(graph.sharedEdges(a, ghost))]).toEqual([])
    })

    it("should check existence as results", () => {
      const a = graph.addVertex("a").index

      expect(graph.assertVertexExists(a)).toEqual({ ok: true, value: undefined })
      expect(unwrapErr(graph.assertEdgeExists(edgeIndex({ slot: 0, generation: 0 }))).message).toBe(
        "Edge 0.0 does not exist",
      )
    })

    it("should iterate live elements in slot order", () => {
      const a = graph.addVertex("a").index
      const b = graph.addVertex("b").index
      const c = graph.addVertex("c").index
      unwrap(graph.removeVertex(b))
      const e = unwrap(graph.addEdge(c, a, 9)).index

      expect([...graph.vertexIndexes()]).toEqual([a, c])
      expect([...graph.vertexData()]).toEqual([
        [a, "a"],
        [c, "c"],
      ])
      expect([...graph.edgeIndexes()]).toEqual([e])
      expect([...graph.edgeData()]).toEqual([[e, 9]])
      expect([...graph.edges()]).toEqual([[e, { from: c, to: a, data: 9 }]])
      expect([...graph.vertices()].map(([, vertex]) => vertex.data)).toEqual(["a", "c"])
    })

    it("should report stats including open slots", () => {
      const a = graph.addVertex("a").index
      graph.addVertex("b")
      unwrap(graph.removeVertex(a))

      expect(graph.stats()).toEqual({ vertices: 1, edges: 0, vertexCapacity: 2, edgeCapacity: 0 })
    })
  })

  describe("copy semantics", () => {
    it("should copy data on the way in and on the way out", () => {
      const objects = createGraph<{ n: number }, { w: number }>()
      const input = { n: 1 }
      const a = objects.addVertex(input).index
      input.n = 2

      const read = objects.getVertexData(a)
      expect(read).toEqual({ n: 1 })
      if (read) read.n = 3
      expect(objects.getVertexData(a)).toEqual({ n: 1 })
    })

    it("should expose live data through the mutable iterators", () => {
      const a = graph.addVertex("a").index
      const e = unwrap(graph.addEdge(a, a, 1)).index

      for (const entry of graph.vertexDataMut()) entry.value = entry.value.toUpperCase()
      for (const entry of graph.edgeDataMut()) entry.value += 10

      expect(graph.getVertexData(a)).toBe("A")
      expect(graph.getEdgeData(e)).toBe(11)
    })

    it("should keep class instances on their prototype", () => {
      class Weight {
        constructor(public amount: number) {}
        doubled(): number {
          return this.amount * 2
        }
      }
      const weighted = createGraph<Weight, Weight>()
      const input = new Weight(2)
      const a = weighted.addVertex(input).index
      input.amount = 5

      const read = weighted.getVertexData(a)
      expect(read).toBeInstanceOf(Weight)
      expect(read?.doubled()).toBe(4)
      expect(read).not.toBe(input)
    })

    it("should accept function payloads and share them", () => {
      const handlers = createGraph<() => number, () => number>()
      const handler = () => 1
      const a = handlers.addVertex(handler).index
      const e = unwrap(handlers.addEdge(a, a, handler)).index

      expect(handlers.getVertexData(a)).toBe(handler)
      expect(handlers.getEdgeData(e)?.()).toBe(1)
    })

    it("should honour a custom clone strategy", () => {
      const shared = createGraph<{ n: number }, never>({ cloneData: (value) => value })
      const input = { n: 1 }
      const a = shared.addVertex(input).index
      input.n = 2

      expect(shared.getVertexData(a)).toEqual({ n: 2 })
    })
  })

  describe("single-element live access", () => {
    it("should write vertex and edge data in place without a diff", () => {
      const mutations: string[] = []
      const tracked = createGraph<string, number>({ hooks: { afterMutation: (diff) => mutations.push(diff.type) } })
      const a = tracked.addVertex("a").index
      const e = unwrap(tracked.addEdge(a, a, 1)).index

      const vertex = tracked.getVertexDataMut(a)
      const edge = tracked.getEdgeDataMut(e)
      expect(vertex?.index).toEqual(a)
      if (vertex) vertex.value = "changed"
      if (edge) edge.value += 1

      expect(tracked.getVertexData(a)).toBe("changed")
      expect(tracked.getEdgeData(e)).toBe(2)
      expect(mutations).toEqual(["AddVertex", "AddEdge"])
    })

    it("should return undefined for stale handles", () => {
      const a = graph.addVertex("a").index
      unwrap(graph.removeVertex(a))

      expect(graph.getVertexDataMut(a)).toBeUndefined()
      expect(graph.getEdgeDataMut(edgeIndex({ slot: 0, generation: 0 }))).toBeUndefined()
    })
  })

  describe("clear", () => {
    it("should drop everything and restart generations", () => {
      const a = graph.addVertex("a").index
      unwrap(graph.addEdge(a, a, 1))
      graph.clear()

      expect(graph.stats()).toEqual({ vertices: 0, edges: 0, vertexCapacity: 0, edgeCapacity: 0 })
      expect(graph.addVertex("b").index).toEqual({ kind: "vertex", slot: 0, generation: 0 })
    })
  })

  describe("clone", () => {
    it("should produce an independent copy with the same handles", () => {
      const a = graph.addVertex("a").index
      const b = graph.addVertex("b").index
      const e = unwrap(graph.addEdge(a, b, 1)).index
      unwrap(graph.removeVertex(b))
      const copy = graph.clone()

      unwrap(copy.updateVertex(a, "changed"))
      const reused = copy.addVertex("c").index

      expect(reused).toEqual({ kind: "vertex", slot: 1, generation: 1 })
      expect(graph.getVertexData(a)).toBe("a")
      expect(graph.vertexCount).toBe(1)
      expect(copy.hasEdge(e)).toBe(false)
      expect(copy.checkInvariants()).toEqual([])
    })
  })
})
