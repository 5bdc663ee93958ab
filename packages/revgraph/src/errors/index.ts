/**
 * Errors Module
 */

export {
  GraphError,
  VertexDoesNotExistError,
  EdgeDoesNotExistError,
  InvalidDiffError,
  GraphCorruptionError,
  GraphDecodeError,
  invariant,
} from "./errors"
export type { GraphErrorCode, DiffAction } from "./errors"
