import { GENERATOR_DEFAULTS } from "./core/generator_client.js";

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_MAX_CONCURRENT_UNITS = 3;
export const DEFAULT_REPAIR_ATTEMPTS = 1;
export const DEFAULT_MAX_CONCURRENT_RUNS = 1;

type Env = Record<string, string | undefined>;

function trimmed(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw && raw.length > 0 ? raw : undefined;
}

/** Positive number from `key`; anything missing, unparsable or <= 0 gives the fallback. */
function positiveNumber(env: Env, key: string, fallback: number): number {
  const raw = trimmed(env, key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function positiveInteger(env: Env, key: string, fallback: number): number {
  const n = positiveNumber(env, key, fallback);
  return Number.isInteger(n) ? n : fallback;
}

function nonNegativeInteger(env: Env, key: string, fallback: number): number {
  const raw = trimmed(env, key);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

export function openaiApiKey(env: Env = process.env): string | undefined {
  return trimmed(env, "OPENAI_API_KEY");
}

export function modelFromEnv(env: Env = process.env): string {
  return trimmed(env, "PAGESMITH_MODEL") ?? DEFAULT_MODEL;
}

export function useFakePipeline(env: Env = process.env): boolean {
  return trimmed(env, "PAGESMITH_PIPELINE_MODE")?.toLowerCase() === "fake";
}

export type GeneratorSettings = {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  minIntervalMs: number;
  timeoutMs: number;
};

export function generatorSettingsFromEnv(env: Env = process.env): GeneratorSettings {
  return {
    maxRetries: positiveInteger(env, "PAGESMITH_MAX_RETRIES", GENERATOR_DEFAULTS.maxRetries),
    baseDelayMs: positiveNumber(env, "PAGESMITH_BASE_DELAY_MS", GENERATOR_DEFAULTS.baseDelayMs),
    maxDelayMs: positiveNumber(env, "PAGESMITH_MAX_DELAY_MS", GENERATOR_DEFAULTS.maxDelayMs),
    minIntervalMs: positiveNumber(env, "PAGESMITH_MIN_CALL_INTERVAL_MS", GENERATOR_DEFAULTS.minIntervalMs),
    timeoutMs: positiveNumber(env, "PAGESMITH_CALL_TIMEOUT_MS", GENERATOR_DEFAULTS.timeoutMs)
  };
}

export type PipelineSettings = {
  maxConcurrentUnits: number;
  repairAttempts: number;
};

export function pipelineSettingsFromEnv(env: Env = process.env): PipelineSettings {
  return {
    maxConcurrentUnits: positiveInteger(env, "PAGESMITH_MAX_CONCURRENT_UNITS", DEFAULT_MAX_CONCURRENT_UNITS),
    // Zero disables the parse-repair re-ask.
    repairAttempts: nonNegativeInteger(env, "PAGESMITH_REPAIR_ATTEMPTS", DEFAULT_REPAIR_ATTEMPTS)
  };
}

export function maxConcurrentRunsFromEnv(env: Env = process.env): number {
  return positiveInteger(env, "MAX_CONCURRENT_RUNS", DEFAULT_MAX_CONCURRENT_RUNS);
}
