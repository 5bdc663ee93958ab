/**
 * Codec Module
 */

export { createGraphCodec } from "./graph-codec"
export type {
  GraphCodec,
  GraphCodecOptions,
  EncodedIndex,
  EncodedEdge,
  EncodedGraph,
  EncodedRemovedEdge,
  EncodedDiff,
} from "./graph-codec"
