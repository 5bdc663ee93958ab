/**
 * Diff Module
 */

export type {
  GraphDiff,
  GraphDiffType,
  AddVertexDiff,
  AddEdgeDiff,
  RemoveVertexDiff,
  RemoveEdgeDiff,
  UpdateVertexDataDiff,
  UpdateEdgeDataDiff,
} from "./types"
