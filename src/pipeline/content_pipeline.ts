import type { Clock } from "../core/clock.js";
import { errorKindOf, errorMessage } from "../core/errors.js";
import { runUnits, type RunResult, type TraceEntry, type UnitOutcome } from "../core/scheduler.js";
import type { PipelineFn } from "../executor.js";
import { isUnitName, type RunManager, type RunSummary, type UnitName } from "../run_manager.js";
import { ARTIFACT_FOR_UNIT, createContentUnits, type TextGenerator } from "./units.js";
import { artifactAbsPath, writeJsonFile } from "./utils.js";

export type ContentPipelineDeps = {
  generator: TextGenerator;
  maxConcurrentUnits?: number;
  repairAttempts?: number;
  clock?: Clock;
};

type OutcomeRecord = {
  status: UnitOutcome["status"];
  reason?: string;
  blockedBy?: string;
  error?: string;
  errorKind?: string;
};

export function describeOutcome(outcome: UnitOutcome): OutcomeRecord {
  switch (outcome.status) {
    case "succeeded":
      return { status: "succeeded" };
    case "failed":
      return { status: "failed", error: outcome.error.message, errorKind: errorKindOf(outcome.error) };
    case "skipped":
      return outcome.reason === "unreachable"
        ? { status: "skipped", reason: outcome.reason, blockedBy: outcome.blockedBy }
        : { status: "skipped", reason: outcome.reason };
  }
}

export function summarize(result: RunResult): RunSummary {
  const summary: RunSummary = { succeeded: 0, failed: 0, skipped: 0, cancelled: result.cancelled };
  for (const outcome of result.outcomes.values()) summary[outcome.status] += 1;
  return summary;
}

async function recordTransition(
  runs: RunManager,
  runId: string,
  entry: TraceEntry,
  outcome: UnitOutcome | undefined
): Promise<void> {
  await runs.appendTrace(runId, entry);
  if (!isUnitName(entry.unit)) return;
  const unit: UnitName = entry.unit;

  if (entry.transition === "started") {
    await runs.startUnit(runId, unit);
    return;
  }
  if (!outcome) return;

  switch (outcome.status) {
    case "succeeded": {
      const name = ARTIFACT_FOR_UNIT[unit];
      await writeJsonFile(artifactAbsPath(runId, name), outcome.output);
      await runs.addArtifact(runId, name, unit);
      await runs.finishUnit(runId, unit, true);
      return;
    }
    case "failed":
      await runs.finishUnit(runId, unit, false, { message: errorMessage(outcome.error), kind: errorKindOf(outcome.error) });
      return;
    case "skipped":
      await runs.skipUnit(runId, unit, outcome.reason, outcome.reason === "unreachable" ? outcome.blockedBy : undefined);
      return;
  }
}

/**
 * Runs the five content units for one product record. Each success is written
 * as its artifact the moment it settles; failed units write nothing. The
 * pipeline resolves with a summary even when units fail.
 */
export function createContentPipeline(deps: ContentPipelineDeps): PipelineFn {
  return async (input, runs, options) => {
    const { runId } = input;
    const units = createContentUnits({ generator: deps.generator, repairAttempts: deps.repairAttempts });

    const result = await runUnits(units, input.record, {
      runId,
      maxConcurrent: deps.maxConcurrentUnits,
      clock: deps.clock,
      signal: options.signal,
      log: (unit, message) => runs.log(runId, message, isUnitName(unit) ? unit : undefined),
      onTransition: (entry, outcome) => recordTransition(runs, runId, entry, outcome)
    });

    const outcomes: Record<string, OutcomeRecord> = {};
    for (const [name, outcome] of result.outcomes) outcomes[name] = describeOutcome(outcome);

    await writeJsonFile(artifactAbsPath(runId, "trace.json"), {
      runId,
      cancelled: result.cancelled,
      outcomes,
      trace: result.trace
    });
    await runs.addArtifact(runId, "trace.json");

    const summary = summarize(result);
    runs.log(
      runId,
      `Units finished: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped${summary.cancelled ? " (cancelled)" : ""}`
    );
    return summary;
  };
}
