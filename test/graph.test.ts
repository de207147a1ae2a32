import { describe, expect, it } from "vitest";
import { DependencyError } from "../src/core/errors.js";
import { DependencyGraph, type GraphNode } from "../src/core/graph.js";

const CONTENT: GraphNode[] = [
  { name: "parser", dependencies: [] },
  { name: "questions", dependencies: ["parser"] },
  { name: "product", dependencies: ["parser"] },
  { name: "comparison", dependencies: ["parser"] },
  { name: "faq", dependencies: ["parser", "questions"] }
];

function dependencyErrorOf(nodes: GraphNode[]): DependencyError {
  try {
    DependencyGraph.fromUnits(nodes);
  } catch (err) {
    if (err instanceof DependencyError) return err;
    throw err;
  }
  throw new Error("expected a dependency error");
}

describe("DependencyGraph", () => {
  it("answers dependency queries in registration order", () => {
    const graph = DependencyGraph.fromUnits(CONTENT);

    expect(graph.order).toEqual(["parser", "questions", "product", "comparison", "faq"]);
    expect(graph.dependenciesOf("faq")).toEqual(["parser", "questions"]);
    expect(graph.dependentsOf("parser")).toEqual(["questions", "product", "comparison", "faq"]);
    expect(graph.descendantsOf("questions")).toEqual(["faq"]);
    expect(graph.descendantsOf("parser")).toEqual(["questions", "product", "comparison", "faq"]);
    expect(graph.descendantsOf("faq")).toEqual([]);
  });

  it("accepts units registered before their dependencies", () => {
    const graph = DependencyGraph.fromUnits([
      { name: "faq", dependencies: ["parser", "questions"] },
      { name: "questions", dependencies: ["parser"] },
      { name: "parser", dependencies: [] }
    ]);
    expect(graph.order).toEqual(["faq", "questions", "parser"]);
    expect(graph.dependentsOf("parser")).toEqual(["faq", "questions"]);
    expect(graph.descendantsOf("parser")).toEqual(["faq", "questions"]);
  });

  it("names the cycle it finds", () => {
    const err = dependencyErrorOf([
      { name: "a", dependencies: ["b"] },
      { name: "b", dependencies: ["a"] }
    ]);
    expect(err.kind).toBe("cycle");
    expect(err.cycle).toEqual(["a", "b", "a"]);
    expect(err.message).toBe("Dependency cycle: a -> b -> a");
  });

  it("treats a self-dependency as a cycle", () => {
    expect(dependencyErrorOf([{ name: "a", dependencies: ["a"] }]).cycle).toEqual(["a", "a"]);
  });

  it("rejects unknown dependencies and duplicate names", () => {
    expect(dependencyErrorOf([{ name: "a", dependencies: ["ghost"] }])).toMatchObject({
      kind: "unresolved_dependency",
      unit: "a",
      dependency: "ghost"
    });
    expect(
      dependencyErrorOf([
        { name: "a", dependencies: [] },
        { name: "a", dependencies: [] }
      ])
    ).toMatchObject({ kind: "duplicate_unit", unit: "a" });
  });
});
