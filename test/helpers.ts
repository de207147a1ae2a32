import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { abortReason, type Clock } from "../src/core/clock.js";
import type { GenerationRequest, TextGenerationProvider } from "../src/llm/provider.js";
import type { ProductRecord } from "../src/pipeline/dataset.js";

export const FIXED_START_MS = Date.parse("2026-01-01T00:00:00.000Z");

type PendingSleep = { at: number; seq: number; ms: number; resolve: () => void };

/**
 * Virtual time. Pending sleeps fire one at a time, earliest first, once the
 * process has nothing else to do; each firing advances `now` and records the
 * duration in `sleeps`. A sleep cleared through its signal never fires.
 */
export class ManualClock implements Clock {
  current: number;
  readonly sleeps: number[] = [];
  private pending: PendingSleep[] = [];
  private seq = 0;
  private scheduled = false;

  constructor(start = FIXED_START_MS) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }
      const entry: PendingSleep = { at: this.current + Math.max(0, ms), seq: this.seq++, ms, resolve };
      this.pending.push(entry);
      signal?.addEventListener(
        "abort",
        () => {
          this.pending = this.pending.filter((p) => p !== entry);
          reject(abortReason(signal));
        },
        { once: true }
      );
      this.schedule();
    });
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => this.fireNext());
  }

  private fireNext(): void {
    this.scheduled = false;
    let next: PendingSleep | undefined;
    for (const p of this.pending) {
      if (!next || p.at < next.at || (p.at === next.at && p.seq < next.seq)) next = p;
    }
    if (!next) return;
    const fired = next;
    this.pending = this.pending.filter((p) => p !== fired);
    this.current = Math.max(this.current, fired.at);
    this.sleeps.push(fired.ms);
    fired.resolve();
    if (this.pending.length > 0) this.schedule();
  }
}

export type ScriptStep = string | Error | ((request: GenerationRequest, signal: AbortSignal) => Promise<string>);

/** Plays back one step per call; runs out loudly. */
export class ScriptedProvider implements TextGenerationProvider {
  readonly name = "scripted";
  readonly calls: GenerationRequest[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(private readonly steps: ScriptStep[]) {}

  async generate(request: GenerationRequest, options: { signal: AbortSignal }): Promise<string> {
    this.calls.push(request);
    this.signals.push(options.signal);
    const step = this.steps.shift();
    if (step === undefined) throw new Error("scripted provider has no response left");
    if (typeof step === "string") return step;
    if (step instanceof Error) throw step;
    return step(request, options.signal);
  }
}

/** Never settles unless the call's signal aborts. */
export function hangUntilAborted(_request: GenerationRequest, signal: AbortSignal): Promise<string> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

export function deferred<T>() {
  let resolve!: (value: T) => void;
  let reject!: (reason?: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export async function waitFor(fn: () => boolean | Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(10);
  }
  throw new Error("timeout");
}

export async function makeTmpDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export function sampleProduct(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    name: "Test Serum",
    concentration: "10% Vitamin C",
    skin_type: ["Oily", "Combination"],
    key_ingredients: ["Vitamin C", "Hyaluronic Acid"],
    benefits: ["Brightening", "Fades dark spots"],
    how_to_use: "Apply 2-3 drops in the morning",
    side_effects: "Mild tingling",
    price: "₹699",
    ...overrides
  };
}
