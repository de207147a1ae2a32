import { DependencyError } from "./errors.js";

export type GraphNode = {
  readonly name: string;
  readonly dependencies: readonly string[];
};

/**
 * Immutable dependency DAG over unit names. Construction fails on duplicate
 * names, unknown dependencies and cycles; every query answers in
 * registration order.
 */
export class DependencyGraph {
  private readonly deps: ReadonlyMap<string, readonly string[]>;
  private readonly dependents: ReadonlyMap<string, readonly string[]>;

  private constructor(readonly order: readonly string[], deps: Map<string, readonly string[]>) {
    this.deps = deps;
    const dependents = new Map<string, string[]>();
    for (const name of order) dependents.set(name, []);
    for (const name of order) {
      for (const dep of deps.get(name) ?? []) dependents.get(dep)?.push(name);
    }
    this.dependents = dependents;
  }

  static fromUnits(nodes: readonly GraphNode[]): DependencyGraph {
    const deps = new Map<string, readonly string[]>();
    for (const node of nodes) {
      if (deps.has(node.name)) {
        throw new DependencyError("duplicate_unit", `Unit "${node.name}" is registered more than once`, { unit: node.name });
      }
      deps.set(node.name, [...node.dependencies]);
    }

    for (const node of nodes) {
      for (const dep of node.dependencies) {
        if (!deps.has(dep)) {
          throw new DependencyError("unresolved_dependency", `Unit "${node.name}" depends on unknown unit "${dep}"`, {
            unit: node.name,
            dependency: dep
          });
        }
      }
    }

    const order = nodes.map((n) => n.name);
    const cycle = findCycle(order, deps);
    if (cycle) {
      throw new DependencyError("cycle", `Dependency cycle: ${cycle.join(" -> ")}`, { unit: cycle[0], cycle });
    }

    return new DependencyGraph(order, deps);
  }

  dependenciesOf(name: string): readonly string[] {
    return this.deps.get(name) ?? [];
  }

  dependentsOf(name: string): readonly string[] {
    return this.dependents.get(name) ?? [];
  }

  /** Every unit reachable through dependents of `name`, in registration order. */
  descendantsOf(name: string): string[] {
    const seen = new Set<string>();
    const stack = [...this.dependentsOf(name)];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      stack.push(...this.dependentsOf(next));
    }
    return this.order.filter((n) => seen.has(n));
  }

}

function findCycle(order: readonly string[], deps: ReadonlyMap<string, readonly string[]>): string[] | null {
  const state = new Map<string, "visiting" | "done">();
  const path: string[] = [];

  const visit = (name: string): string[] | null => {
    const mark = state.get(name);
    if (mark === "done") return null;
    if (mark === "visiting") return [...path.slice(path.indexOf(name)), name];

    state.set(name, "visiting");
    path.push(name);
    for (const dep of deps.get(name) ?? []) {
      const found = visit(dep);
      if (found) return found;
    }
    path.pop();
    state.set(name, "done");
    return null;
  };

  for (const name of order) {
    const found = visit(name);
    if (found) return found;
  }
  return null;
}
