import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import {
  RunManager,
  UNIT_ORDER,
  isUnitName,
  type RunEvent,
  type RunStatus,
  type UnitName,
  type UnitRecord
} from "../src/run_manager.js";
import {
  readJsonFile,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs,
  writeJsonFile
} from "../src/pipeline/utils.js";
import { makeTmpDir, sampleProduct } from "./helpers.js";

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await makeTmpDir("pagesmith-runs-");
  process.env.PAGESMITH_OUTPUT_DIR = tmpOut;
});

afterEach(async () => {
  delete process.env.PAGESMITH_OUTPUT_DIR;
  if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true }).catch(() => undefined);
  tmpOut = null;
});

function runFixture(runId: string, overrides: Partial<RunStatus> = {}): RunStatus {
  const unit = (name: UnitName): UnitRecord => ({ name, status: "done", artifacts: [] });
  return {
    runId,
    label: runId,
    input: sampleProduct(),
    status: "done",
    startedAt: "2020-01-01T00:00:00.000Z",
    finishedAt: "2020-01-01T00:01:00.000Z",
    units: {
      parser: unit("parser"),
      questions: unit("questions"),
      product: unit("product"),
      comparison: unit("comparison"),
      faq: unit("faq")
    },
    trace: [],
    artifacts: [],
    outputFolder: path.join("output", runId),
    ...overrides
  };
}

async function writeRunFixture(run: RunStatus): Promise<void> {
  await writeJsonFile(path.join(runOutputDirAbs(run.runId), "run.json"), run);
}

describe("RunManager", () => {
  it("createRun writes run.json and initializes units", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct(), { productIndex: 2 });

    expect(run.runId).toMatch(/^test-serum-[a-z0-9]{8}$/);
    expect(run.label).toBe("Test Serum");
    expect(run.productIndex).toBe(2);
    expect(run.status).toBe("queued");
    expect(run.outputFolder).toBe(path.join("output", run.runId));

    const onDisk = await readJsonFile(path.join(runOutputDirAbs(run.runId), "run.json"));
    expect(onDisk).toMatchObject({ runId: run.runId, label: "Test Serum", status: "queued" });
    await expect(fs.stat(runIntermediateDirAbs(run.runId))).resolves.toBeTruthy();
    await expect(fs.stat(runFinalDirAbs(run.runId))).resolves.toBeTruthy();

    for (const name of UNIT_ORDER) {
      expect(run.units[name]).toEqual({ name, status: "queued", artifacts: [] });
    }
  });

  it("takes an explicit label", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct(), { label: "Spring Launch!" });
    expect(run.label).toBe("Spring Launch!");
    expect(run.runId).toMatch(/^spring-launch-[a-z0-9]{8}$/);
  });

  it("emits unit and artifact events to subscribers until unsubscribed", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct());

    const events: RunEvent[] = [];
    const unsub = runs.subscribe(run.runId, (event) => events.push(event));
    expect(unsub).toBeTypeOf("function");

    await runs.startUnit(run.runId, "parser");
    await runs.addArtifact(run.runId, "parsed_product.json", "parser");
    await runs.finishUnit(run.runId, "parser", true);
    unsub?.();
    runs.log(run.runId, "after unsubscribe");

    expect(events.map((e) => e.type)).toEqual(["unit_started", "artifact_written", "unit_finished"]);
    expect(events[1]).toMatchObject({ type: "artifact_written", name: "parsed_product.json", unit: "parser" });
    expect(runs.getRun(run.runId)?.units.parser).toMatchObject({ status: "done", artifacts: ["parsed_product.json"] });
  });

  it("finishUnit records failure details and emits an error event", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct());
    const types: string[] = [];
    runs.subscribe(run.runId, (event) => types.push(event.type));

    await runs.startUnit(run.runId, "faq");
    await runs.finishUnit(run.runId, "faq", false, { message: "faq_page: faqs too short", kind: "schema_violation" });

    expect(types).toEqual(["unit_started", "unit_finished", "error"]);
    expect(runs.getRun(run.runId)?.units.faq).toMatchObject({
      status: "error",
      error: "faq_page: faqs too short",
      errorKind: "schema_violation"
    });
  });

  it("skipUnit records the reason and the blocking unit", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct());
    const events: RunEvent[] = [];
    runs.subscribe(run.runId, (event) => events.push(event));

    await runs.skipUnit(run.runId, "faq", "unreachable", "questions");

    expect(runs.getRun(run.runId)?.units.faq).toMatchObject({
      status: "skipped",
      skipReason: "unreachable",
      blockedBy: "questions"
    });
    expect(events[0]).toMatchObject({ type: "unit_skipped", unit: "faq", reason: "unreachable", blockedBy: "questions" });
  });

  it("addArtifact de-dupes names", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct());

    await runs.addArtifact(run.runId, "trace.json");
    await runs.addArtifact(run.runId, "trace.json");

    expect(runs.getRun(run.runId)?.artifacts).toEqual(["trace.json"]);
  });

  it("appendTrace persists entries once flushed", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct());

    await runs.appendTrace(run.runId, { seq: 1, unit: "parser", transition: "started", at: "2020-01-01T00:00:00.000Z" });
    await runs.setRunStatus(run.runId, "running", { provider: "fake" });
    await runs.flush(run.runId);

    const onDisk = await readJsonFile(path.join(runOutputDirAbs(run.runId), "run.json"));
    expect(onDisk).toMatchObject({
      status: "running",
      provider: "fake",
      trace: [{ seq: 1, unit: "parser", transition: "started" }]
    });
  });

  it("error events never crash the process when unobserved", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct());
    expect(() => runs.error(run.runId, "boom")).not.toThrow();
  });

  it("getRun returns a snapshot the caller cannot mutate", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct());

    const snapshot = runs.getRun(run.runId);
    snapshot?.artifacts.push("tampered.json");

    expect(runs.getRun(run.runId)?.artifacts).toEqual([]);
  });

  it("setRunStatus applies patch fields and ignores missing runs", async () => {
    const runs = new RunManager();
    const run = await runs.createRun(sampleProduct());

    await expect(runs.setRunStatus("missing", "done")).resolves.toBeUndefined();
    await runs.setRunStatus(run.runId, "done", {
      finishedAt: "2026-01-01T00:05:00.000Z",
      summary: { succeeded: 5, failed: 0, skipped: 0, cancelled: false }
    });

    expect(runs.getRun(run.runId)).toMatchObject({
      status: "done",
      finishedAt: "2026-01-01T00:05:00.000Z",
      summary: { succeeded: 5, failed: 0, skipped: 0, cancelled: false }
    });
  });

  it("mutators are no-ops for missing run ids", async () => {
    const runs = new RunManager();
    await expect(runs.startUnit("missing", "parser")).resolves.toBeUndefined();
    await expect(runs.finishUnit("missing", "parser", true)).resolves.toBeUndefined();
    await expect(runs.skipUnit("missing", "parser", "cancelled")).resolves.toBeUndefined();
    await expect(runs.addArtifact("missing", "x.json")).resolves.toBeUndefined();
    expect(runs.subscribe("missing", () => undefined)).toBeNull();
    expect(runs.getRun("missing")).toBeNull();
    expect(() => runs.log("missing", "x")).not.toThrow();
  });

  it("initFromDisk loads prior runs and skips noise", async () => {
    const runs1 = new RunManager();
    const r1 = await runs1.createRun(sampleProduct());
    await runs1.setRunStatus(r1.runId, "done");
    await runs1.flush(r1.runId);

    const root = tmpOut ?? "";
    await fs.writeFile(path.join(root, "not_a_dir.txt"), "x\n", "utf8");
    await fs.mkdir(path.join(root, "orphan"), { recursive: true });
    await fs.mkdir(path.join(root, "bad"), { recursive: true });
    await fs.writeFile(path.join(root, "bad", "run.json"), "{not json", "utf8");

    const runs2 = new RunManager();
    await runs2.initFromDisk();

    expect(runs2.getRun(r1.runId)).toMatchObject({ label: "Test Serum", status: "done" });
    expect(runs2.getRun("orphan")).toBeNull();
    expect(runs2.getRun("bad")).toBeNull();
  });

  it("initFromDisk marks runs that were active at shutdown as failed", async () => {
    const stale = runFixture("stale-run", { status: "running", finishedAt: undefined });
    stale.units.parser = { name: "parser", status: "done", artifacts: ["parsed_product.json"] };
    stale.units.questions = { name: "questions", status: "running", artifacts: [] };
    stale.units.faq = { name: "faq", status: "queued", artifacts: [] };
    await writeRunFixture(stale);

    const runs = new RunManager();
    await runs.initFromDisk();
    await runs.flush("stale-run");

    const loaded = runs.getRun("stale-run");
    expect(loaded?.status).toBe("error");
    expect(loaded?.finishedAt).toBeTruthy();
    expect(loaded?.units.parser.status).toBe("done");
    expect(loaded?.units.questions).toMatchObject({
      status: "error",
      error: "Recovered after restart while run was active."
    });
    expect(loaded?.units.faq.status).toBe("error");

    const onDisk = await readJsonFile(path.join(runOutputDirAbs("stale-run"), "run.json"));
    expect(onDisk).toMatchObject({ status: "error" });
  });

  it("listRuns sorts newest first", async () => {
    await writeRunFixture(runFixture("run-a", { startedAt: "2020-01-01T00:00:00.000Z" }));
    await writeRunFixture(runFixture("run-b", { startedAt: "2020-01-03T00:00:00.000Z" }));
    await writeRunFixture(runFixture("run-c", { startedAt: "2020-01-02T00:00:00.000Z" }));

    const runs = new RunManager();
    await runs.initFromDisk();

    expect(runs.listRuns().map((r) => r.runId)).toEqual(["run-b", "run-c", "run-a"]);
  });

  it("cleanupTerminalRuns supports dry-run and real deletion of the oldest finished runs", async () => {
    await writeRunFixture(runFixture("old-1", { startedAt: "2020-01-01T00:00:00.000Z" }));
    await writeRunFixture(runFixture("old-2", { startedAt: "2020-01-02T00:00:00.000Z", status: "error" }));
    await writeRunFixture(runFixture("old-3", { startedAt: "2020-01-03T00:00:00.000Z" }));

    const runs = new RunManager();
    await runs.initFromDisk();
    const active = await runs.createRun(sampleProduct());

    const size = async (runId: string) => (await fs.stat(path.join(runOutputDirAbs(runId), "run.json"))).size;
    const expectedBytes = (await size("old-2")) + (await size("old-1"));

    const dry = await runs.cleanupTerminalRuns(1, true);
    expect(dry).toMatchObject({
      keepLast: 1,
      dryRun: true,
      scannedTerminalRuns: 3,
      keptRunIds: ["old-3"],
      deletedRunIds: ["old-2", "old-1"],
      reclaimedBytes: expectedBytes
    });
    expect(dry.deletedRuns[0]).toMatchObject({ runId: "old-2", status: "error", label: "old-2" });
    await expect(fs.stat(runOutputDirAbs("old-1"))).resolves.toBeTruthy();

    const real = await runs.cleanupTerminalRuns(1, false);
    expect(real.deletedRunIds).toEqual(["old-2", "old-1"]);
    await expect(fs.stat(runOutputDirAbs("old-1"))).rejects.toThrow();
    await expect(fs.stat(runOutputDirAbs("old-2"))).rejects.toThrow();
    expect(runs.listRuns().map((r) => r.runId)).toEqual([active.runId, "old-3"]);
  });
});

describe("isUnitName", () => {
  it("accepts only the five content units", () => {
    expect(UNIT_ORDER.every(isUnitName)).toBe(true);
    expect(isUnitName("render")).toBe(false);
  });
});
