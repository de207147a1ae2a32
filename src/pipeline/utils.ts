import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const RUN_INTERMEDIATE_DIRNAME = "intermediate";
export const RUN_FINAL_DIRNAME = "final";

// Artifacts published as the run's deliverables.
const FINAL_ARTIFACT_NAMES = new Set(["faq.json", "product_page.json", "comparison_page.json", "trace.json"]);

let tmpCounter = 0;

export function nowIso(): string {
  return new Date().toISOString();
}

export function repoRoot(): string {
  // src/pipeline/utils.ts (or dist/pipeline/utils.js): two levels below the repo root.
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../..");
}

export function outputRootAbs(): string {
  const env = process.env.PAGESMITH_OUTPUT_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "output");
}

export function dataRootAbs(): string {
  const env = process.env.PAGESMITH_DATA_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "data");
}

export function runOutputDirAbs(runId: string): string {
  return path.join(outputRootAbs(), runId);
}

export function runIntermediateDirAbs(runId: string): string {
  return path.join(runOutputDirAbs(runId), RUN_INTERMEDIATE_DIRNAME);
}

export function runFinalDirAbs(runId: string): string {
  return path.join(runOutputDirAbs(runId), RUN_FINAL_DIRNAME);
}

export function isFinalArtifactName(name: string): boolean {
  return FINAL_ARTIFACT_NAMES.has(name);
}

export function artifactAbsPath(runId: string, name: string): string {
  if (isFinalArtifactName(name)) {
    return path.join(runFinalDirAbs(runId), name);
  }
  return path.join(runIntermediateDirAbs(runId), name);
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

async function atomicWrite(filePath: string, data: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  tmpCounter += 1;
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}.${tmpCounter}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  const out = text.endsWith("\n") ? text : `${text}\n`;
  await atomicWrite(filePath, out);
}

/** Stable rendering: two-space indent and a trailing newline. */
export function stringifyJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await atomicWrite(filePath, stringifyJson(value));
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  const value: unknown = JSON.parse(raw);
  return value;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** `null` when the file is missing or not valid JSON; other I/O errors propagate. */
export async function tryReadJsonFile(filePath: string): Promise<unknown> {
  try {
    return await readJsonFile(filePath);
  } catch (err) {
    if (isMissingFile(err) || err instanceof SyntaxError) return null;
    throw err;
  }
}

export function slug(input: string): string {
  const s = input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s.slice(0, 60) || "untitled";
}
