/**
 * Graph Codec
 *
 * JSON-ready encoding of whole graphs and of individual diffs. Payloads are
 * validated with the zod schemas the codec is created with, so decoded
 * graphs and diffs carry data of the expected shape.
 */

import {
  deserializeSlotTable,
  encodeIndex,
  formatIndex,
  indexSchema,
  serializeSlotTable,
  SlotTableDecodeError,
  type Index,
  type IndexFormat,
  type SerializedSlotTable,
  type SlotTable,
  type ValueSchema,
} from "@revgraph/slots"
import { z, type ZodIssue } from "zod"
import type { GraphDiff, RemoveEdgeDiff } from "../diff"
import { GraphDecodeError } from "../errors"
import { Graph, type GraphConfig } from "../graph"
import { edgeIndex, vertexIndex, type Edge } from "../types"

// =============================================================================
// ENCODED SHAPES
// =============================================================================

/** `{ slot, generation }` or `"slot.generation"`, depending on the format */
export type EncodedIndex = Index | string

export interface EncodedEdge<E> {
  from: EncodedIndex
  to: EncodedIndex
  data: E
}

export interface EncodedGraph<V, E> {
  vertices: SerializedSlotTable<V>
  edges: SerializedSlotTable<EncodedEdge<E>>
}

export interface EncodedRemovedEdge<E> {
  index: EncodedIndex
  edge: EncodedEdge<E>
}

export type EncodedDiff<V, E> =
  | { type: "AddVertex"; index: EncodedIndex; data: V }
  | { type: "AddEdge"; index: EncodedIndex; from: EncodedIndex; to: EncodedIndex; data: E }
  | { type: "RemoveEdge"; index: EncodedIndex; edge: EncodedEdge<E> }
  | { type: "RemoveVertex"; index: EncodedIndex; data: V; removedEdges: EncodedRemovedEdge<E>[] }
  | { type: "UpdateVertexData"; index: EncodedIndex; before: V; after: V }
  | { type: "UpdateEdgeData"; index: EncodedIndex; before: E; after: E }

// =============================================================================
// CODEC
// =============================================================================

export interface GraphCodecOptions<V, E> {
  /** Validates vertex payloads on decode */
  vertexData: ValueSchema<V>
  /** Validates edge payloads on decode */
  edgeData: ValueSchema<E>
  /** Handle format (defaults to structured) */
  indexFormat?: IndexFormat
}

export interface GraphCodec<V, E> {
  encodeGraph(graph: Graph<V, E>): EncodedGraph<V, E>
  /**
   * @throws GraphDecodeError on malformed input, invalid payloads or edges
   * whose endpoints are not live vertices
   */
  decodeGraph(input: unknown, config?: GraphConfig<V, E>): Graph<V, E>
  encodeDiff(diff: GraphDiff<V, E>): EncodedDiff<V, E>
  /** @throws GraphDecodeError on malformed input or invalid payloads */
  decodeDiff(input: unknown): GraphDiff<V, E>
}

const encodedGraphSchema = z
  .object({
    vertices: z.unknown(),
    edges: z.unknown(),
  })
  .strict()

export function createGraphCodec<V, E>(options: GraphCodecOptions<V, E>): GraphCodec<V, E> {
  const format = options.indexFormat ?? "structured"
  const ref = indexSchema(format)

  const rawEdge = z.object({ from: ref, to: ref, data: z.unknown() })

  const edgeSchema = rawEdge.transform(
    (raw, ctx): Edge<E> => ({
      from: vertexIndex(raw.from),
      to: vertexIndex(raw.to),
      data: parseInto(options.edgeData, raw.data, ctx, ["data"]),
    }),
  )

  const toRemovedEdge = (
    raw: { index: Index; edge: z.infer<typeof rawEdge> },
    ctx: z.RefinementCtx,
    path: Path,
  ): RemoveEdgeDiff<E> => ({
    type: "RemoveEdge",
    index: edgeIndex(raw.index),
    edge: {
      from: vertexIndex(raw.edge.from),
      to: vertexIndex(raw.edge.to),
      data: parseInto(options.edgeData, raw.edge.data, ctx, [...path, "edge", "data"]),
    },
  })

  const diffSchema = z
    .discriminatedUnion("type", [
      z.object({ type: z.literal("AddVertex"), index: ref, data: z.unknown() }),
      z.object({ type: z.literal("AddEdge"), index: ref, from: ref, to: ref, data: z.unknown() }),
      z.object({ type: z.literal("RemoveEdge"), index: ref, edge: rawEdge }),
      z.object({
        type: z.literal("RemoveVertex"),
        index: ref,
        data: z.unknown(),
        removedEdges: z.array(z.object({ index: ref, edge: rawEdge })),
      }),
      z.object({ type: z.literal("UpdateVertexData"), index: ref, before: z.unknown(), after: z.unknown() }),
      z.object({ type: z.literal("UpdateEdgeData"), index: ref, before: z.unknown(), after: z.unknown() }),
    ])
    .transform((raw, ctx): GraphDiff<V, E> => {
      switch (raw.type) {
        case "AddVertex":
          return {
            type: raw.type,
            index: vertexIndex(raw.index),
            data: parseInto(options.vertexData, raw.data, ctx, ["data"]),
          }
        case "AddEdge":
          return {
            type: raw.type,
            index: edgeIndex(raw.index),
            from: vertexIndex(raw.from),
            to: vertexIndex(raw.to),
            data: parseInto(options.edgeData, raw.data, ctx, ["data"]),
          }
        case "RemoveEdge":
          return toRemovedEdge(raw, ctx, [])
        case "RemoveVertex":
          return {
            type: raw.type,
            index: vertexIndex(raw.index),
            vertex: {
              outAdjacency: [],
              inAdjacency: [],
              data: parseInto(options.vertexData, raw.data, ctx, ["data"]),
            },
            removedEdges: raw.removedEdges.map((removed, position) =>
              toRemovedEdge(removed, ctx, ["removedEdges", position]),
            ),
          }
        case "UpdateVertexData":
          return {
            type: raw.type,
            index: vertexIndex(raw.index),
            before: parseInto(options.vertexData, raw.before, ctx, ["before"]),
            after: parseInto(options.vertexData, raw.after, ctx, ["after"]),
          }
        case "UpdateEdgeData":
          return {
            type: raw.type,
            index: edgeIndex(raw.index),
            before: parseInto(options.edgeData, raw.before, ctx, ["before"]),
            after: parseInto(options.edgeData, raw.after, ctx, ["after"]),
          }
      }
    })

  const encodeEdge = (edge: Edge<E>): EncodedEdge<E> => ({
    from: encodeIndex(edge.from, format),
    to: encodeIndex(edge.to, format),
    data: edge.data,
  })

  const decodeTable = <T>(name: string, input: unknown, valueSchema: ValueSchema<T>): SlotTable<T> => {
    try {
      return deserializeSlotTable(input, { format, valueSchema })
    } catch (error) {
      if (error instanceof SlotTableDecodeError) {
        throw new GraphDecodeError(
          `Invalid ${name} table: ${error.message}`,
          error.issues.map((issue) => ({ ...issue, path: [name, ...issue.path] })),
          error,
        )
      }
      throw error
    }
  }

  return {
    encodeGraph(graph) {
      return {
        vertices: serializeSlotTable({ entries: () => graph.vertexData() }, { format }),
        edges: serializeSlotTable({ entries: () => graph.edges() }, { format, encodeValue: encodeEdge }),
      }
    },

    decodeGraph(input, config) {
      const parsed = encodedGraphSchema.safeParse(input)
      if (!parsed.success) {
        throw new GraphDecodeError("Encoded graph must be an object with vertices and edges", parsed.error.issues)
      }

      const vertices = decodeTable("vertices", parsed.data.vertices, options.vertexData)
      const edges = decodeTable("edges", parsed.data.edges, edgeSchema)

      for (const [index, edge] of edges.entries()) {
        for (const endpoint of [edge.from, edge.to]) {
          if (!vertices.has(endpoint)) {
            throw new GraphDecodeError(
              `Edge ${formatIndex(index)} references missing vertex ${formatIndex(endpoint)}`,
            )
          }
        }
      }

      const graph = new Graph<V, E>(config)
      graph.loadTables(vertices, edges)
      return graph
    },

    encodeDiff(diff) {
      const index = encodeIndex(diff.index, format)
      switch (diff.type) {
        case "AddVertex":
          return { type: diff.type, index, data: diff.data }
        case "AddEdge":
          return {
            type: diff.type,
            index,
            from: encodeIndex(diff.from, format),
            to: encodeIndex(diff.to, format),
            data: diff.data,
          }
        case "RemoveEdge":
          return { type: diff.type, index, edge: encodeEdge(diff.edge) }
        case "RemoveVertex":
          return {
            type: diff.type,
            index,
            data: diff.vertex.data,
            removedEdges: diff.removedEdges.map((removed) => ({
              index: encodeIndex(removed.index, format),
              edge: encodeEdge(removed.edge),
            })),
          }
        case "UpdateVertexData":
          return { type: diff.type, index, before: diff.before, after: diff.after }
        case "UpdateEdgeData":
          return { type: diff.type, index, before: diff.before, after: diff.after }
      }
    },

    decodeDiff(input) {
      const parsed = diffSchema.safeParse(input)
      if (!parsed.success) {
        throw new GraphDecodeError(describeIssues("Invalid diff", parsed.error.issues), parsed.error.issues)
      }
      return parsed.data
    },
  }
}

// =============================================================================
// HELPERS
// =============================================================================

type Path = Array<string | number>

/**
 * Parse a payload inside a transform, reporting failures on the outer
 * context under `path`.
 */
function parseInto<T>(schema: ValueSchema<T>, value: unknown, ctx: z.RefinementCtx, path: Path): T {
  const result = schema.safeParse(value)
  if (result.success) return result.data

  for (const issue of result.error.issues) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [...path, ...issue.path], message: issue.message })
  }
  return z.NEVER
}

function describeIssues(prefix: string, issues: ZodIssue[]): string {
  const first = issues[0]
  if (!first) return prefix
  const where = first.path.length > 0 ? ` at ${first.path.join(".")}` : ""
  return `${prefix}${where}: ${first.message}`
}
