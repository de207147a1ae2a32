import type { Command } from "commander";
import { GeneratorClient } from "../core/generator_client.js";
import {
  generatorSettingsFromEnv,
  maxConcurrentRunsFromEnv,
  modelFromEnv,
  openaiApiKey,
  pipelineSettingsFromEnv,
  useFakePipeline
} from "../config.js";
import { RunExecutor } from "../executor.js";
import { FakeProvider } from "../llm/fake_provider.js";
import { OpenAIAgentsProvider } from "../llm/openai_agents_provider.js";
import type { TextGenerationProvider } from "../llm/provider.js";
import { createContentPipeline } from "../pipeline/content_pipeline.js";
import { defaultDatasetPath, loadDataset, parseSelection, selectProducts } from "../pipeline/dataset.js";
import { UNIT_ORDER, RunManager, type RunEvent, type RunStatus } from "../run_manager.js";

export type GenerateCommandOptions = {
  dataset?: string;
  product: string;
  fake?: boolean;
};

export type Printer = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const consolePrinter: Printer = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

export function formatEvent(runId: string, event: RunEvent): string {
  switch (event.type) {
    case "unit_started":
      return `[${runId}] ${event.unit}: started`;
    case "unit_finished":
      return event.ok
        ? `[${runId}] ${event.unit}: done`
        : `[${runId}] ${event.unit}: failed (${event.errorKind ?? "error"}) ${event.error ?? ""}`.trimEnd();
    case "unit_skipped":
      return event.blockedBy
        ? `[${runId}] ${event.unit}: skipped (${event.reason}, blocked by ${event.blockedBy})`
        : `[${runId}] ${event.unit}: skipped (${event.reason})`;
    case "artifact_written":
      return `[${runId}] wrote ${event.name}`;
    case "log":
      return event.unit ? `[${runId}] ${event.unit}: ${event.message}` : `[${runId}] ${event.message}`;
    case "error":
      return event.unit ? `[${runId}] ${event.unit}: ERROR ${event.message}` : `[${runId}] ERROR ${event.message}`;
  }
}

export function formatRunResult(run: RunStatus): string[] {
  const lines = [`${run.runId} (${run.label}): ${run.status}`];
  for (const name of UNIT_ORDER) {
    const unit = run.units[name];
    const detail = unit.error ? ` - ${unit.errorKind ?? "error"}: ${unit.error}` : unit.blockedBy ? ` - blocked by ${unit.blockedBy}` : "";
    lines.push(`  ${name.padEnd(10)} ${unit.status}${detail}`);
  }
  return lines;
}

function createProvider(fake: boolean): TextGenerationProvider {
  if (fake) return new FakeProvider();
  const apiKey = openaiApiKey();
  if (!apiKey) throw new Error("Missing OPENAI_API_KEY (set it in .env, or pass --fake)");
  return new OpenAIAgentsProvider({ apiKey, model: modelFromEnv() });
}

/** One run per selected product. Resolves with the process exit code. */
export async function runGenerate(options: GenerateCommandOptions, printer: Printer = consolePrinter): Promise<number> {
  const datasetPath = options.dataset ?? defaultDatasetPath();
  const dataset = await loadDataset(datasetPath);
  const selected = selectProducts(dataset, parseSelection(options.product));

  const fake = Boolean(options.fake) || useFakePipeline();
  const provider = createProvider(fake);
  const generator = new GeneratorClient({ provider, ...generatorSettingsFromEnv() });
  const pipeline = createContentPipeline({ generator, ...pipelineSettingsFromEnv() });

  const runs = new RunManager();
  await runs.initFromDisk();
  const executor = new RunExecutor(runs, pipeline, {
    concurrency: maxConcurrentRunsFromEnv(),
    providerName: provider.name
  });

  printer.out(`Generating content for ${selected.length} product(s) from ${datasetPath} (provider: ${provider.name})`);

  const runIds: string[] = [];
  const unsubscribers: Array<() => void> = [];
  for (const { index, product } of selected) {
    const run = await runs.createRun(product, { productIndex: index });
    runIds.push(run.runId);
    const unsubscribe = runs.subscribe(run.runId, (event) => {
      const line = formatEvent(run.runId, event);
      if (event.type === "error") printer.err(line);
      else printer.out(line);
    });
    if (unsubscribe) unsubscribers.push(unsubscribe);
    executor.enqueue(run.runId);
  }

  const onSigint = () => {
    printer.err("Cancelling runs...");
    executor.cancelAll().catch((err: unknown) => printer.err(`Cancel failed: ${err instanceof Error ? err.message : String(err)}`));
  };
  process.once("SIGINT", onSigint);

  try {
    await executor.waitForIdle();
  } finally {
    process.off("SIGINT", onSigint);
    for (const unsubscribe of unsubscribers) unsubscribe();
  }

  let exitCode = 0;
  for (const runId of runIds) {
    await runs.flush(runId);
    const run = runs.getRun(runId);
    if (!run) continue;
    for (const line of formatRunResult(run)) printer.out(line);
    const anyFailed = UNIT_ORDER.some((name) => run.units[name].status !== "done");
    if (run.status !== "done" || anyFailed) exitCode = 1;
  }
  return exitCode;
}

export function registerGenerateCommand(program: Command): void {
  program
    .command("generate")
    .description("Generate FAQ, product and comparison pages for products in a dataset")
    .option("-d, --dataset <path>", "dataset JSON file (default: data/products.json)")
    .option("-p, --product <index|all>", "product index in the dataset, or all", "0")
    .option("--fake", "use the offline provider instead of the OpenAI API")
    .action(async (opts: GenerateCommandOptions) => {
      process.exitCode = await runGenerate(opts);
    });
}
