import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import { z } from "zod";
import type { TraceEntry } from "./core/scheduler.js";
import { ProductRecordSchema, type ProductRecord } from "./pipeline/dataset.js";
import {
  ensureDir,
  nowIso,
  outputRootAbs,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs,
  slug,
  stringifyJson,
  tryReadJsonFile,
  writeTextFile
} from "./pipeline/utils.js";

export const UNIT_ORDER = ["parser", "questions", "product", "comparison", "faq"] as const;

export type UnitName = (typeof UNIT_ORDER)[number];

export function isUnitName(name: string): name is UnitName {
  return UNIT_ORDER.some((u) => u === name);
}

const UnitRecordSchema = z.object({
  name: z.enum(UNIT_ORDER),
  status: z.enum(["queued", "running", "done", "error", "skipped"]),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  error: z.string().optional(),
  errorKind: z.string().optional(),
  skipReason: z.enum(["unreachable", "cancelled"]).optional(),
  blockedBy: z.string().optional(),
  artifacts: z.array(z.string())
});

export type UnitRecord = z.infer<typeof UnitRecordSchema>;

const TraceEntrySchema = z.object({
  seq: z.number().int(),
  unit: z.string(),
  transition: z.enum(["started", "succeeded", "failed", "skipped"]),
  at: z.string()
});

const RunSummarySchema = z.object({
  succeeded: z.number().int(),
  failed: z.number().int(),
  skipped: z.number().int(),
  cancelled: z.boolean()
});

export type RunSummary = z.infer<typeof RunSummarySchema>;

export const RunStatusSchema = z.object({
  runId: z.string().min(1),
  label: z.string(),
  productIndex: z.number().int().optional(),
  input: ProductRecordSchema,
  provider: z.string().optional(),
  status: z.enum(["queued", "running", "done", "error"]),
  startedAt: z.string(),
  finishedAt: z.string().optional(),
  units: z.object({
    parser: UnitRecordSchema,
    questions: UnitRecordSchema,
    product: UnitRecordSchema,
    comparison: UnitRecordSchema,
    faq: UnitRecordSchema
  }),
  trace: z.array(TraceEntrySchema),
  artifacts: z.array(z.string()),
  summary: RunSummarySchema.optional(),
  outputFolder: z.string()
});

export type RunStatus = z.infer<typeof RunStatusSchema>;

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "label" | "status" | "startedAt" | "finishedAt" | "summary">;

export type RunStorageRecord = {
  runId: string;
  label: string;
  status: RunStatus["status"];
  startedAt: string;
  finishedAt?: string;
  ageHours: number;
  sizeBytes: number;
};

export type CleanupRunsResult = {
  keepLast: number;
  dryRun: boolean;
  scannedTerminalRuns: number;
  keptRunIds: string[];
  deletedRunIds: string[];
  reclaimedBytes: number;
  deletedRuns: RunStorageRecord[];
};

export type RunEventType = "unit_started" | "unit_finished" | "unit_skipped" | "artifact_written" | "log" | "error";

export type RunEvent =
  | { type: "unit_started"; unit: UnitName; at: string }
  | { type: "unit_finished"; unit: UnitName; ok: boolean; error?: string; errorKind?: string; at: string }
  | { type: "unit_skipped"; unit: UnitName; reason: "unreachable" | "cancelled"; blockedBy?: string; at: string }
  | { type: "artifact_written"; name: string; unit?: UnitName; at: string }
  | { type: "log"; message: string; unit?: UnitName; at: string }
  | { type: "error"; message: string; unit?: UnitName; at: string };

const RUN_EVENT_TYPES: readonly RunEventType[] = [
  "unit_started",
  "unit_finished",
  "unit_skipped",
  "artifact_written",
  "log",
  "error"
];

const RUN_ID_SLUG_MAX = 48;
const RUN_ID_SUFFIX_LEN = 8;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (const byte of bytes) {
    out += RUN_ID_SUFFIX_ALPHABET[byte % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

export function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status === "done" || status === "error";
}

function freshUnits(): RunStatus["units"] {
  const unit = (name: UnitName): UnitRecord => ({ name, status: "queued", artifacts: [] });
  return {
    parser: unit("parser"),
    questions: unit("questions"),
    product: unit("product"),
    comparison: unit("comparison"),
    faq: unit("faq")
  };
}

function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunStatus(run.status)) return run;
  const recoveredAt = nowIso();
  const units = { ...run.units };

  for (const name of UNIT_ORDER) {
    const unit = units[name];
    if (unit.status === "running" || unit.status === "queued") {
      units[name] = {
        ...unit,
        status: "error",
        error: unit.error ?? "Recovered after restart while run was active.",
        finishedAt: unit.finishedAt ?? recoveredAt
      };
    }
  }

  return { ...run, status: "error", finishedAt: run.finishedAt ?? recoveredAt, units };
}

function ageHoursOf(startedAt: string, nowMs: number): number {
  const startedMs = Date.parse(startedAt);
  return Number.isFinite(startedMs) ? Math.max(0, (nowMs - startedMs) / (1000 * 60 * 60)) : 0;
}

export class RunManager {
  private runs = new Map<string, RunInternal>();
  private writes = new Map<string, Promise<void>>();

  async initFromDisk(): Promise<void> {
    await ensureDir(outputRootAbs());
    const entries = await fs.readdir(outputRootAbs(), { withFileTypes: true });
    for (const ent of entries) {
      if (!ent.isDirectory()) continue;
      const runId = ent.name;
      const parsed = RunStatusSchema.safeParse(await tryReadJsonFile(this.runJsonPath(runId)));
      if (!parsed.success) continue;
      const data = parsed.data;
      const recovered = recoverStaleLoadedRun(data);

      const emitter = new EventEmitter();
      // Node treats "error" events specially: if nobody is listening, it throws.
      // Errors are an optional event stream here, never a process crash.
      emitter.on("error", () => undefined);
      const run: RunInternal = { ...recovered, emitter };
      this.runs.set(runId, run);
      if (recovered !== data) await this.persist(run);
    }
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({
        runId: r.runId,
        label: r.label,
        status: r.status,
        startedAt: r.startedAt,
        finishedAt: r.finishedAt,
        summary: r.summary
      }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
  }

  async cleanupTerminalRuns(keepLast: number, dryRun: boolean): Promise<CleanupRunsResult> {
    const keep = Math.max(0, Math.floor(keepLast));
    const terminalRuns = [...this.runs.values()]
      .filter((r) => isTerminalRunStatus(r.status))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
    const kept = terminalRuns.slice(0, keep);
    const toDelete = terminalRuns.slice(keep);

    const nowMs = Date.now();
    const deletedRuns: RunStorageRecord[] = [];
    let reclaimedBytes = 0;

    for (const run of toDelete) {
      const sizeBytes = await this.dirSizeBytes(runOutputDirAbs(run.runId));
      reclaimedBytes += sizeBytes;
      deletedRuns.push({
        runId: run.runId,
        label: run.label,
        status: run.status,
        startedAt: run.startedAt,
        finishedAt: run.finishedAt,
        ageHours: ageHoursOf(run.startedAt, nowMs),
        sizeBytes
      });

      if (!dryRun) {
        await this.writes.get(run.runId);
        await fs.rm(runOutputDirAbs(run.runId), { recursive: true, force: true });
        this.runs.delete(run.runId);
        this.writes.delete(run.runId);
      }
    }

    return {
      keepLast: keep,
      dryRun,
      scannedTerminalRuns: terminalRuns.length,
      keptRunIds: kept.map((r) => r.runId),
      deletedRunIds: toDelete.map((r) => r.runId),
      reclaimedBytes,
      deletedRuns
    };
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    if (!r) return null;
    return this.snapshot(r);
  }

  private async runIdExists(runId: string): Promise<boolean> {
    if (this.runs.has(runId)) return true;
    try {
      const st = await fs.stat(runOutputDirAbs(runId));
      return st.isDirectory();
    } catch {
      return false;
    }
  }

  private async nextRunId(label: string): Promise<string> {
    const labelSlug = slug(label).slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled";
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${labelSlug}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!(await this.runIdExists(runId))) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  async createRun(input: ProductRecord, options?: { label?: string; productIndex?: number }): Promise<RunStatus> {
    const label = options?.label ?? input.name;
    const runId = await this.nextRunId(label);

    const emitter = new EventEmitter();
    emitter.on("error", () => undefined);

    const run: RunInternal = {
      runId,
      label,
      productIndex: options?.productIndex,
      input,
      status: "queued",
      startedAt: nowIso(),
      units: freshUnits(),
      trace: [],
      artifacts: [],
      outputFolder: path.join("output", runId),
      emitter
    };

    await ensureDir(runIntermediateDirAbs(runId));
    await ensureDir(runFinalDirAbs(runId));
    this.runs.set(runId, run);
    await this.persist(run);
    return this.snapshot(run);
  }

  async setRunStatus(
    runId: string,
    status: RunStatus["status"],
    patch?: Partial<Pick<RunStatus, "finishedAt" | "summary" | "provider">>
  ): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    if (patch?.summary) r.summary = patch.summary;
    if (patch?.provider) r.provider = patch.provider;
    await this.persist(r);
  }

  async startUnit(runId: string, unit: UnitName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const u = r.units[unit];
    u.status = "running";
    u.startedAt = nowIso();
    await this.persist(r);
    this.emit(r, { type: "unit_started", unit, at: u.startedAt });
  }

  async finishUnit(runId: string, unit: UnitName, ok: boolean, failure?: { message: string; kind?: string }): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const u = r.units[unit];
    u.status = ok ? "done" : "error";
    u.finishedAt = nowIso();
    if (!ok && failure) {
      u.error = failure.message;
      u.errorKind = failure.kind;
    }
    await this.persist(r);
    this.emit(r, { type: "unit_finished", unit, ok, error: u.error, errorKind: u.errorKind, at: u.finishedAt });
    if (!ok && failure) this.emit(r, { type: "error", message: failure.message, unit, at: u.finishedAt });
  }

  async skipUnit(runId: string, unit: UnitName, reason: "unreachable" | "cancelled", blockedBy?: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const u = r.units[unit];
    u.status = "skipped";
    u.skipReason = reason;
    u.blockedBy = blockedBy;
    u.finishedAt = nowIso();
    await this.persist(r);
    this.emit(r, { type: "unit_skipped", unit, reason, blockedBy, at: u.finishedAt });
  }

  async appendTrace(runId: string, entry: TraceEntry): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.trace.push({ ...entry });
    await this.persist(r);
  }

  async addArtifact(runId: string, name: string, unit?: UnitName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    if (!r.artifacts.includes(name)) r.artifacts.push(name);
    if (unit && !r.units[unit].artifacts.includes(name)) r.units[unit].artifacts.push(name);
    await this.persist(r);
    this.emit(r, { type: "artifact_written", name, unit, at: nowIso() });
  }

  log(runId: string, message: string, unit?: UnitName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    this.emit(r, { type: "log", message, unit, at: nowIso() });
  }

  error(runId: string, message: string, unit?: UnitName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    this.emit(r, { type: "error", message, unit, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (event: RunEvent) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const handler = (event: RunEvent) => onEvent(event);
    for (const type of RUN_EVENT_TYPES) r.emitter.on(type, handler);

    return () => {
      for (const type of RUN_EVENT_TYPES) r.emitter.off(type, handler);
    };
  }

  /** Resolves once every queued run.json write for the run has landed. */
  async flush(runId: string): Promise<void> {
    await this.writes.get(runId);
  }

  private emit(run: RunInternal, event: RunEvent): void {
    run.emitter.emit(event.type, event);
  }

  private runJsonPath(runId: string): string {
    return path.join(runOutputDirAbs(runId), "run.json");
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return structuredClone(pub);
  }

  private persist(run: RunInternal): Promise<void> {
    // Render now so each write carries the state at call time; writes land in call order.
    const text = stringifyJson(this.snapshot(run));
    const filePath = this.runJsonPath(run.runId);
    const previous = this.writes.get(run.runId) ?? Promise.resolve();
    // A failed earlier write already rejected for its own caller.
    const next = previous.catch(() => undefined).then(() => writeTextFile(filePath, text));
    this.writes.set(run.runId, next);
    return next;
  }

  private async dirSizeBytes(dir: string): Promise<number> {
    const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
    let sum = 0;
    for (const ent of entries) {
      const p = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        sum += await this.dirSizeBytes(p);
        continue;
      }
      if (!ent.isFile()) continue;
      const st = await fs.stat(p);
      sum += st.size;
    }
    return sum;
  }
}
