import { StateConflictError } from "./errors.js";
import type { JsonValue } from "./response_parser.js";
import type { InputRecord } from "./unit.js";
import { deepFreeze } from "./validator.js";

/**
 * Input record plus a write-once map of finalized unit outputs. Values are
 * frozen on publish, so a reader never sees a half-built output.
 */
export class SharedState {
  private readonly outputs = new Map<string, JsonValue>();

  constructor(readonly record: InputRecord) {
    deepFreeze(record);
  }

  publish(key: string, value: JsonValue): JsonValue {
    if (this.outputs.has(key)) throw new StateConflictError(key);
    const frozen = deepFreeze(value);
    this.outputs.set(key, frozen);
    return frozen;
  }

  get(key: string): JsonValue | undefined {
    return this.outputs.get(key);
  }

  /** Outputs for `keys`; every key must already be published. */
  pick(keys: readonly string[]): Readonly<Record<string, JsonValue>> {
    const out: Record<string, JsonValue> = {};
    for (const key of keys) {
      const value = this.outputs.get(key);
      if (value === undefined) throw new Error(`Shared state key "${key}" is not published`);
      out[key] = value;
    }
    return Object.freeze(out);
  }
}
