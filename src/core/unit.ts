import type { JsonValue } from "./response_parser.js";

export type InputRecord = { readonly [key: string]: JsonValue };

export type UnitContext = {
  runId: string;
  /** The run's input record, frozen for the whole run. */
  record: InputRecord;
  /** Finalized outputs of the unit's declared dependencies, and nothing else. */
  inputs: Readonly<Record<string, JsonValue>>;
  /** Aborts when the run is cancelled. */
  signal: AbortSignal;
  log: (message: string) => void;
};

export interface Unit {
  readonly name: string;
  readonly dependencies: readonly string[];
  execute(ctx: UnitContext): Promise<JsonValue>;
}

export function defineUnit(
  name: string,
  dependencies: readonly string[],
  execute: (ctx: UnitContext) => Promise<JsonValue>
): Unit {
  return Object.freeze({ name, dependencies: Object.freeze([...dependencies]), execute });
}
