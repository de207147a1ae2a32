import type { GenerationErrorKind } from "../core/errors.js";

export type ShapeHint = {
  /** Artifact kind the caller expects back, e.g. "faq_page". */
  kind: string;
  description?: string;
};

export type GenerationRequest = {
  prompt: string;
  system?: string;
  shapeHint?: ShapeHint;
};

export interface TextGenerationProvider {
  readonly name: string;
  generate(request: GenerationRequest, options: { signal: AbortSignal }): Promise<string>;
}

/** Thrown by providers that already know how to label a failure. */
export class ProviderError extends Error {
  readonly status?: number;
  readonly kind?: GenerationErrorKind;

  constructor(message: string, options?: { status?: number; kind?: GenerationErrorKind; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ProviderError";
    this.status = options?.status;
    this.kind = options?.kind;
  }
}

export type FailureClass = {
  kind: GenerationErrorKind;
  transient: boolean;
  status?: number;
  message: string;
};

function statusOf(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

function looksRateLimited(message: string): boolean {
  return /\b429\b|rate[\s_-]?limit|too many requests|quota exceeded/i.test(message);
}

/**
 * Sorts a provider failure into the retry taxonomy: rate limiting is the only
 * transient class a provider can report; everything else is fatal.
 */
export function classifyProviderFailure(err: unknown): FailureClass {
  const message = err instanceof Error ? err.message : String(err);
  const status = statusOf(err);

  if (err instanceof ProviderError && err.kind) {
    return {
      kind: err.kind,
      transient: err.kind === "rate_limited" || err.kind === "timeout",
      status,
      message
    };
  }

  if (status === 429 || looksRateLimited(message)) {
    return { kind: "rate_limited", transient: true, status, message };
  }
  if (status === 401 || status === 403) {
    return { kind: "authentication", transient: false, status, message };
  }
  if (status === 400 || status === 404 || status === 422) {
    return { kind: "malformed_request", transient: false, status, message };
  }
  return { kind: "provider_error", transient: false, status, message };
}
