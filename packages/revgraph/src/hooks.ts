/**
 * Graph Hooks
 *
 * Lifecycle callbacks fired once a graph operation has finished. Hooks
 * observe; they cannot veto or rewrite a mutation. An exception thrown by
 * a hook propagates to the caller of the operation.
 */

import type { GraphDiff } from "./diff"
import type { InvalidDiffError } from "./errors"

// =============================================================================
// HOOK CONTEXT
// =============================================================================

export type GraphOperation =
  | "addVertex"
  | "addEdge"
  | "updateVertex"
  | "updateEdge"
  | "removeVertex"
  | "removeEdge"
  | "applyDiff"
  | "rollbackDiff"

/**
 * Context passed to graph hooks.
 */
export interface HookContext {
  /** Operation that triggered the hook */
  operation: GraphOperation
  /** When the operation completed */
  timestamp: Date
}

// =============================================================================
// HOOK TYPES
// =============================================================================

/**
 * Called after a mutation method changed the graph, with the diff it returned.
 */
export type AfterMutationHook<V, E> = (diff: GraphDiff<V, E>, ctx: HookContext) => void

/**
 * Called after a diff was replayed.
 */
export type AfterApplyHook<V, E> = (diff: GraphDiff<V, E>, ctx: HookContext) => void

/**
 * Called after a diff was reverted.
 */
export type AfterRollbackHook<V, E> = (diff: GraphDiff<V, E>, ctx: HookContext) => void

/**
 * Called when a diff was rejected. The graph is unchanged.
 */
export type InvalidDiffHook = (error: InvalidDiffError, ctx: HookContext) => void

export interface GraphHooks<V, E> {
  afterMutation?: AfterMutationHook<V, E>
  afterApply?: AfterApplyHook<V, E>
  afterRollback?: AfterRollbackHook<V, E>
  onInvalidDiff?: InvalidDiffHook
}

/**
 * Merge several hook sets; each hook runs in the order given.
 */
export function composeHooks<V, E>(...sets: GraphHooks<V, E>[]): GraphHooks<V, E> {
  const afterMutation = sets.flatMap((set) => (set.afterMutation ? [set.afterMutation] : []))
  const afterApply = sets.flatMap((set) => (set.afterApply ? [set.afterApply] : []))
  const afterRollback = sets.flatMap((set) => (set.afterRollback ? [set.afterRollback] : []))
  const onInvalidDiff = sets.flatMap((set) => (set.onInvalidDiff ? [set.onInvalidDiff] : []))

  return {
    afterMutation: (diff, ctx) => afterMutation.forEach((hook) => hook(diff, ctx)),
    afterApply: (diff, ctx) => afterApply.forEach((hook) => hook(diff, ctx)),
    afterRollback: (diff, ctx) => afterRollback.forEach((hook) => hook(diff, ctx)),
    onInvalidDiff: (error, ctx) => onInvalidDiff.forEach((hook) => hook(error, ctx)),
  }
}
