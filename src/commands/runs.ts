import type { Command } from "commander";
import { RunManager, type RunListItem } from "../run_manager.js";
import type { Printer } from "./generate.js";

const consolePrinter: Printer = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

export function formatRunListItem(run: RunListItem): string {
  const counts = run.summary
    ? ` ${run.summary.succeeded} ok / ${run.summary.failed} failed / ${run.summary.skipped} skipped`
    : "";
  return `${run.runId}  ${run.status.padEnd(7)} ${run.startedAt}  ${run.label}${counts}`;
}

export async function listRunsCommand(printer: Printer = consolePrinter): Promise<number> {
  const runs = new RunManager();
  await runs.initFromDisk();
  const items = runs.listRuns();
  if (items.length === 0) {
    printer.out("No runs found.");
    return 0;
  }
  for (const item of items) printer.out(formatRunListItem(item));
  return 0;
}

export async function cleanRunsCommand(
  opts: { keep: string; dryRun?: boolean },
  printer: Printer = consolePrinter
): Promise<number> {
  const keep = Number(opts.keep);
  if (!Number.isInteger(keep) || keep < 0) {
    printer.err(`--keep must be a non-negative integer (got "${opts.keep}")`);
    return 1;
  }

  const runs = new RunManager();
  await runs.initFromDisk();
  const result = await runs.cleanupTerminalRuns(keep, Boolean(opts.dryRun));
  const verb = result.dryRun ? "Would delete" : "Deleted";
  printer.out(
    `${verb} ${result.deletedRunIds.length} of ${result.scannedTerminalRuns} finished run(s), ${result.reclaimedBytes} bytes`
  );
  for (const runId of result.deletedRunIds) printer.out(`  ${runId}`);
  return 0;
}

export function registerRunsCommand(program: Command): void {
  const runs = program.command("runs").description("Inspect and prune persisted runs");

  runs
    .command("list")
    .description("List runs under the output directory, newest first")
    .action(async () => {
      process.exitCode = await listRunsCommand();
    });

  runs
    .command("clean")
    .description("Delete finished runs, keeping the newest ones")
    .option("-k, --keep <n>", "number of finished runs to keep", "10")
    .option("--dry-run", "report what would be deleted without deleting")
    .action(async (opts: { keep: string; dryRun?: boolean }) => {
      process.exitCode = await cleanRunsCommand(opts);
    });
}
