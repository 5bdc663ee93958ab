import { describe, it, expect } from "vitest"
import {
  composeHooks,
  createGraph,
  createLogger,
  unwrap,
  type GraphDiff,
  type HookContext,
  type InvalidDiffError,
  type LogLevel,
} from "../src"

describe("Graph hooks", () => {
  it("should report each mutation with its diff", () => {
    const seen: Array<[string, GraphDiff<string, number>["type"]]> = []
    const graph = createGraph<string, number>({
      hooks: { afterMutation: (diff, ctx) => seen.push([ctx.operation, diff.type]) },
    })

    const a = graph.addVertex("a").index
    const e = unwrap(graph.addEdge(a, a, 1)).index
    unwrap(graph.updateEdge(e, 2))
    unwrap(graph.updateVertex(a, "b"))
    unwrap(graph.removeVertex(a))

    expect(seen).toEqual([
      ["addVertex", "AddVertex"],
      ["addEdge", "AddEdge"],
      ["updateEdge", "UpdateEdgeData"],
      ["updateVertex", "UpdateVertexData"],
      ["removeVertex", "RemoveVertex"],
    ])
  })

  it("should not fire mutation hooks for failed operations", () => {
    let calls = 0
    const graph = createGraph<string, number>({ hooks: { afterMutation: () => calls++ } })
    const a = graph.addVertex("a").index
    unwrap(graph.removeVertex(a))

    expect(graph.removeVertex(a).ok).toBe(false)
    expect(calls).toBe(2)
  })

  it("should separate applied, rolled back and rejected diffs", () => {
    const applied: string[] = []
    const rolledBack: string[] = []
    const rejected: InvalidDiffError[] = []
    const graph = createGraph<string, number>({
      hooks: {
        afterApply: (diff) => applied.push(diff.type),
        afterRollback: (diff) => rolledBack.push(diff.type),
        onInvalidDiff: (error) => rejected.push(error),
      },
    })

    const { diff } = graph.addVertex("a")
    unwrap(graph.rollbackDiff(diff))
    unwrap(graph.applyDiff(diff))
    expect(graph.applyDiff(diff).ok).toBe(false)

    expect(rolledBack).toEqual(["AddVertex"])
    expect(applied).toEqual(["AddVertex"])
    expect(rejected.map((error) => error.reason)).toEqual(["slot 0 is not open at generation 0"])
  })

  it("should run composed hooks in order", () => {
    const order: string[] = []
    const contexts: HookContext[] = []
    const graph = createGraph<string, number>({
      hooks: composeHooks<string, number>(
        { afterMutation: () => order.push("first") },
        { afterApply: () => order.push("apply") },
        {
          afterMutation: (_diff, ctx) => {
            order.push("second")
            contexts.push(ctx)
          },
        },
      ),
    })

    graph.addVertex("a")

    expect(order).toEqual(["first", "second"])
    expect(contexts[0]?.operation).toBe("addVertex")
    expect(contexts[0]?.timestamp).toBeInstanceOf(Date)
  })

  it("should propagate a throwing hook after the mutation completed", () => {
    const graph = createGraph<string, number>({
      hooks: {
        afterMutation: () => {
          throw new Error("hook failed")
        },
      },
    })

    expect(() => graph.addVertex("a")).toThrow("hook failed")
    expect(graph.vertexCount).toBe(1)
  })
})

describe("Logger", () => {
  type Entry = [LogLevel, string, Record<string, unknown> | undefined]

  it("should filter below the configured level and tag the component", () => {
    const entries: Entry[] = []
    const logger = createLogger({
      level: "warn",
      component: "graph",
      handler: (level, message, context) => entries.push([level, message, context]),
    })

    logger.debug("hidden")
    logger.info("hidden")
    logger.warn("shown", { key: 1 })
    logger.error("also shown")

    expect(entries).toEqual([
      ["warn", "shown", { component: "graph", key: 1 }],
      ["error", "also shown", { component: "graph" }],
    ])
  })

  it("should stay silent by default", () => {
    const entries: Entry[] = []
    const logger = createLogger({ handler: (level, message, context) => entries.push([level, message, context]) })

    logger.error("nothing")

    expect(entries).toEqual([])
  })

  it("should log mutations at debug and rejected diffs at warn", () => {
    const entries: Entry[] = []
    const logger = createLogger({
      level: "debug",
      handler: (level, message, context) => entries.push([level, message, context]),
    })
    const graph = createGraph<string, number>({ logger })

    const { diff } = graph.addVertex("a")
    expect(graph.applyDiff(diff).ok).toBe(false)

    expect(entries).toEqual([
      ["debug", "addVertex 0.0", { operation: "addVertex", diff: "AddVertex" }],
      [
        "warn",
        "Cannot apply AddVertex diff for vertex 0.0: slot 0 is not open at generation 0",
        { operation: "applyDiff", diff: "AddVertex" },
      ],
    ])
  })
})
