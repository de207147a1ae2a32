import { backoffDelayMs, type BackoffPolicy } from "./backoff.js";
import { systemClock, type Clock } from "./clock.js";
import { GenerationError, errorMessage } from "./errors.js";
import { IntervalThrottle } from "./throttle.js";
import {
  ProviderError,
  classifyProviderFailure,
  type FailureClass,
  type GenerationRequest,
  type ShapeHint,
  type TextGenerationProvider
} from "../llm/provider.js";

export type GeneratorClientOptions = {
  provider: TextGenerationProvider;
  clock?: Clock;
  /** Shared gate; pass the same instance to every client that must be spaced together. */
  throttle?: IntervalThrottle;
  minIntervalMs?: number;
  /** Total attempts per call, the first one included. */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  /** Per-attempt limit; an attempt that runs over counts as a transient failure. */
  timeoutMs?: number;
};

export type GenerateOptions = {
  system?: string;
  shapeHint?: ShapeHint;
  signal?: AbortSignal;
  log?: (message: string) => void;
};

export const GENERATOR_DEFAULTS = {
  maxRetries: 3,
  baseDelayMs: 10_000,
  maxDelayMs: 60_000,
  factor: 2,
  minIntervalMs: 1_500,
  timeoutMs: 90_000
} as const;

type Raced<T> = { settled: true; value: T } | { settled: false; expired: boolean };

/** Races `promise` against a timer on `clock`; the timer is cleared once either side wins. */
async function withHardTimeout<T>(promise: Promise<T>, clock: Clock, timeoutMs: number, label: string): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return await promise;
  const timer = new AbortController();
  const expired = clock.sleep(timeoutMs, timer.signal).then(
    () => true,
    () => false
  );
  try {
    const first = await Promise.race([
      promise.then((value): Raced<T> => ({ settled: true, value })),
      expired.then((fired): Raced<T> => ({ settled: false, expired: fired }))
    ]);
    if (first.settled) return first.value;
    // A clock that failed to sleep leaves the call unbounded.
    if (!first.expired) return await promise;
    throw new ProviderError(`${label} timed out after ${timeoutMs}ms`, { kind: "timeout" });
  } finally {
    timer.abort();
  }
}

function positiveInt(value: number | undefined, fallback: number, label: string): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 1) throw new Error(`${label} must be a positive integer (got ${value})`);
  return value;
}

/**
 * Drives one text-generation call to completion: throttled attempts, a
 * per-attempt timeout, and exponential backoff between transient failures.
 * Fatal failures surface on the first occurrence.
 */
export class GeneratorClient {
  readonly throttle: IntervalThrottle;
  readonly maxRetries: number;
  private readonly provider: TextGenerationProvider;
  private readonly clock: Clock;
  private readonly policy: BackoffPolicy;
  private readonly timeoutMs: number;

  constructor(options: GeneratorClientOptions) {
    this.provider = options.provider;
    this.clock = options.clock ?? systemClock;
    this.throttle =
      options.throttle ?? new IntervalThrottle(options.minIntervalMs ?? GENERATOR_DEFAULTS.minIntervalMs, this.clock);
    this.maxRetries = positiveInt(options.maxRetries, GENERATOR_DEFAULTS.maxRetries, "maxRetries");
    this.policy = {
      baseDelayMs: options.baseDelayMs ?? GENERATOR_DEFAULTS.baseDelayMs,
      maxDelayMs: options.maxDelayMs ?? GENERATOR_DEFAULTS.maxDelayMs,
      factor: options.factor ?? GENERATOR_DEFAULTS.factor
    };
    this.timeoutMs = options.timeoutMs ?? GENERATOR_DEFAULTS.timeoutMs;
  }

  get providerName(): string {
    return this.provider.name;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const { signal, log } = options;
    const request: GenerationRequest = { prompt, system: options.system, shapeHint: options.shapeHint };
    const label = options.shapeHint ? `generate:${options.shapeHint.kind}` : "generate";
    let lastFailure: FailureClass | null = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) throw this.cancelled(attempt - 1, signal.reason);

      try {
        await this.throttle.acquire(signal);
      } catch (err) {
        throw this.cancelled(attempt - 1, err);
      }

      try {
        return await this.attempt(request, label, log);
      } catch (err) {
        const failure = classifyProviderFailure(err);
        if (!failure.transient) {
          throw new GenerationError(failure.kind, failure.message, { attempts: attempt, status: failure.status, cause: err });
        }
        lastFailure = failure;
        log?.(`${label} attempt ${attempt}/${this.maxRetries} failed (${failure.kind}): ${failure.message}`);
      }

      if (attempt < this.maxRetries) {
        const delay = backoffDelayMs(attempt, this.policy);
        log?.(`${label} retrying in ${delay}ms`);
        try {
          await this.clock.sleep(delay, signal);
        } catch (err) {
          throw this.cancelled(attempt, err);
        }
      }
    }

    const detail = lastFailure ? `: ${lastFailure.message}` : "";
    throw new GenerationError("rate_limit_exhausted", `${label} gave up after ${this.maxRetries} attempts${detail}`, {
      attempts: this.maxRetries,
      status: lastFailure?.status
    });
  }

  private async attempt(request: GenerationRequest, label: string, log?: (message: string) => void): Promise<string> {
    // Only the timeout aborts a provider call; run cancellation lets it finish.
    const controller = new AbortController();
    const call = this.provider.generate(request, { signal: controller.signal });
    try {
      return await withHardTimeout(call, this.clock, this.timeoutMs, label);
    } catch (err) {
      if (err instanceof ProviderError && err.kind === "timeout") {
        controller.abort(err);
        void call.catch((late: unknown) => log?.(`${label} abandoned call settled with: ${errorMessage(late)}`));
      }
      throw err;
    }
  }

  private cancelled(attempts: number, cause: unknown): GenerationError {
    return new GenerationError("cancelled", "Generation cancelled", { attempts, cause });
  }
}
