import { isoAt, systemClock, type Clock } from "./clock.js";
import { DependencyGraph } from "./graph.js";
import type { JsonValue } from "./response_parser.js";
import { SharedState } from "./shared_state.js";
import type { InputRecord, Unit, UnitContext } from "./unit.js";

export type UnitOutcome =
  | { status: "succeeded"; output: JsonValue }
  | { status: "failed"; error: Error }
  | { status: "skipped"; reason: "unreachable"; blockedBy: string }
  | { status: "skipped"; reason: "cancelled" };

export type Transition = "started" | "succeeded" | "failed" | "skipped";

export type TraceEntry = {
  seq: number;
  unit: string;
  transition: Transition;
  at: string;
};

export type RunResult = {
  runId: string;
  /** Keyed by unit name, in registration order. */
  outcomes: ReadonlyMap<string, UnitOutcome>;
  trace: readonly TraceEntry[];
  state: SharedState;
  cancelled: boolean;
};

export type SchedulerOptions = {
  runId?: string;
  /** Upper bound on units executing at once. Unbounded by default. */
  maxConcurrent?: number;
  clock?: Clock;
  signal?: AbortSignal;
  /** Awaited for every trace entry, in trace order per unit. */
  onTransition?: (entry: TraceEntry, outcome?: UnitOutcome) => void | Promise<void>;
  log?: (unit: string, message: string) => void;
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class Scheduler {
  private readonly units: readonly Unit[];

  constructor(
    units: readonly Unit[],
    private readonly options: SchedulerOptions = {}
  ) {
    this.units = [...units];
    const limit = options.maxConcurrent;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new Error(`maxConcurrent must be a positive integer (got ${limit})`);
    }
  }

  /**
   * Runs every unit whose dependencies succeed. A failure skips the failed
   * unit's descendants and leaves unrelated branches running. Rejects only on
   * an invalid graph (before anything runs) or an observer failure.
   */
  async run(record: InputRecord): Promise<RunResult> {
    const graph = DependencyGraph.fromUnits(this.units);
    const byName = new Map(this.units.map((u) => [u.name, u]));
    const clock = this.options.clock ?? systemClock;
    const maxConcurrent = this.options.maxConcurrent ?? Number.POSITIVE_INFINITY;
    const signal = this.options.signal ?? new AbortController().signal;
    const runId = this.options.runId ?? "run";

    const state = new SharedState(record);
    const outcomes = new Map<string, UnitOutcome>();
    const running = new Map<string, Promise<void>>();
    const trace: TraceEntry[] = [];

    const emit = async (unit: string, transition: Transition, outcome?: UnitOutcome): Promise<void> => {
      const entry: TraceEntry = { seq: trace.length + 1, unit, transition, at: isoAt(clock) };
      trace.push(entry);
      await this.options.onTransition?.(entry, outcome);
    };

    const settle = async (name: string, outcome: UnitOutcome): Promise<void> => {
      outcomes.set(name, outcome);
      await emit(name, outcome.status, outcome);
      if (outcome.status !== "failed") return;
      for (const descendant of graph.descendantsOf(name)) {
        if (outcomes.has(descendant)) continue;
        const skipped: UnitOutcome = { status: "skipped", reason: "unreachable", blockedBy: name };
        outcomes.set(descendant, skipped);
        await emit(descendant, "skipped", skipped);
      }
    };

    const execute = async (unit: Unit): Promise<void> => {
      const ctx: UnitContext = {
        runId,
        record: state.record,
        inputs: state.pick(unit.dependencies),
        signal,
        log: (message) => this.options.log?.(unit.name, message)
      };
      await emit(unit.name, "started");

      let outcome: UnitOutcome;
      try {
        const output = await unit.execute(ctx);
        outcome = { status: "succeeded", output: state.publish(unit.name, output) };
      } catch (err) {
        outcome = { status: "failed", error: toError(err) };
      }
      await settle(unit.name, outcome);
    };

    const isReady = (name: string): boolean =>
      !outcomes.has(name) &&
      !running.has(name) &&
      graph.dependenciesOf(name).every((dep) => outcomes.get(dep)?.status === "succeeded");

    const dispatch = (): void => {
      for (const name of graph.order) {
        if (running.size >= maxConcurrent) return;
        const unit = byName.get(name);
        if (!unit || !isReady(name)) continue;
        const task = execute(unit).finally(() => running.delete(name));
        running.set(name, task);
      }
    };

    try {
      for (;;) {
        if (!signal.aborted) dispatch();
        if (running.size === 0) break;
        await Promise.race(running.values());
      }
    } catch (err) {
      await Promise.allSettled(running.values());
      throw err;
    }

    const cancelled = signal.aborted;
    for (const name of graph.order) {
      if (outcomes.has(name)) continue;
      await settle(name, { status: "skipped", reason: "cancelled" });
    }

    const ordered = new Map<string, UnitOutcome>();
    for (const name of graph.order) {
      const outcome = outcomes.get(name);
      if (outcome) ordered.set(name, outcome);
    }

    return { runId, outcomes: ordered, trace: [...trace], state, cancelled };
  }
}

export async function runUnits(units: readonly Unit[], record: InputRecord, options: SchedulerOptions = {}): Promise<RunResult> {
  return new Scheduler(units, options).run(record);
}
