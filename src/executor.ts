import type { ProductRecord } from "./pipeline/dataset.js";
import type { RunManager, RunSummary } from "./run_manager.js";
import { UNIT_ORDER } from "./run_manager.js";
import { artifactAbsPath, nowIso, writeTextFile } from "./pipeline/utils.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineInput = {
  runId: string;
  label: string;
  record: ProductRecord;
};

export type PipelineFn = (input: PipelineInput, runs: RunManager, options: PipelineOptions) => Promise<RunSummary>;

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];
  private readonly providerName?: string;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
      /** Recorded on each run so run.json says which provider produced it. */
      providerName?: string;
    }
  ) {
    this.concurrency = Math.max(1, Math.floor(options?.concurrency ?? 1));
    this.providerName = options?.providerName;
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status !== "queued") return false;

    // Avoid duplicate queue entries.
    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  async cancel(runId: string): Promise<boolean> {
    const run = this.runs.getRun(runId);
    if (!run) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort(new Error("Cancelled"));
      return true;
    }

    const idx = this.queue.indexOf(runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      for (const unit of UNIT_ORDER) await this.runs.skipUnit(runId, unit, "cancelled");
      await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() });
      this.notifyIdle();
      return true;
    }

    return false;
  }

  async cancelAll(): Promise<void> {
    for (const runId of [...this.queue, ...this.running.keys()]) await this.cancel(runId);
  }

  /** Resolves once nothing is queued or running. */
  waitForIdle(): Promise<void> {
    if (this.running.size === 0 && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private notifyIdle(): void {
    if (this.running.size > 0 || this.queue.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private drain(): void {
    while (this.running.size < this.concurrency && this.queue.length > 0) {
      // Queue is non-empty due to the while condition.
      const next = this.queue.shift()!;
      void this.start(next);
    }
    this.notifyIdle();
  }

  private async start(runId: string): Promise<void> {
    const controller = new AbortController();
    this.running.set(runId, controller);

    try {
      const run = this.runs.getRun(runId);
      if (!run) return;
      await this.runs.setRunStatus(runId, "running", { provider: this.providerName });

      const summary = await this.pipeline({ runId, label: run.label, record: run.input }, this.runs, {
        signal: controller.signal
      });

      if (summary.cancelled) {
        this.runs.error(runId, "Cancelled");
        await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso(), summary });
        // Cancellation marker next to the intermediate artifacts.
        await writeTextFile(artifactAbsPath(runId, "CANCELLED.txt"), `Cancelled at ${nowIso()}`);
        return;
      }
      await this.runs.setRunStatus(runId, "done", { finishedAt: nowIso(), summary });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.runs.error(runId, msg);
      await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() });
    } finally {
      this.running.delete(runId);
      this.drain();
    }
  }
}
