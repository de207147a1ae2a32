export type DependencyErrorKind = "cycle" | "unresolved_dependency" | "duplicate_unit";

export class DependencyError extends Error {
  readonly kind: DependencyErrorKind;
  readonly unit?: string;
  readonly dependency?: string;
  readonly cycle?: string[];

  constructor(kind: DependencyErrorKind, message: string, details?: { unit?: string; dependency?: string; cycle?: string[] }) {
    super(message);
    this.name = "DependencyError";
    this.kind = kind;
    this.unit = details?.unit;
    this.dependency = details?.dependency;
    this.cycle = details?.cycle;
  }
}

export type TransientGenerationKind = "rate_limited" | "timeout";
export type FatalGenerationKind =
  | "authentication"
  | "malformed_request"
  | "provider_error"
  | "rate_limit_exhausted"
  | "cancelled";
export type GenerationErrorKind = TransientGenerationKind | FatalGenerationKind;

export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;
  readonly attempts: number;
  readonly status?: number;

  constructor(kind: GenerationErrorKind, message: string, options?: { attempts?: number; status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GenerationError";
    this.kind = kind;
    this.attempts = options?.attempts ?? 0;
    this.status = options?.status;
  }

  get transient(): boolean {
    return isTransientKind(this.kind);
  }
}

export function isTransientKind(kind: GenerationErrorKind): kind is TransientGenerationKind {
  return kind === "rate_limited" || kind === "timeout";
}

export class ParseError extends Error {
  readonly kind = "no_structured_payload" as const;
  readonly rawText: string;

  constructor(rawText: string, message = "No structured payload found in generator response") {
    super(message);
    this.name = "ParseError";
    this.rawText = rawText;
  }
}

export class SchemaViolationError extends Error {
  readonly kind = "schema_violation" as const;
  readonly artifactKind: string;
  readonly path: string;
  readonly expected: string;
  readonly actual: string;

  constructor(artifactKind: string, path: string, expected: string, actual: string) {
    super(`${artifactKind}: ${path} expected ${expected}, got ${actual}`);
    this.name = "SchemaViolationError";
    this.artifactKind = artifactKind;
    this.path = path;
    this.expected = expected;
    this.actual = actual;
  }
}

export class StateConflictError extends Error {
  readonly kind = "already_published" as const;
  readonly key: string;

  constructor(key: string) {
    super(`Shared state key "${key}" is already published`);
    this.name = "StateConflictError";
    this.key = key;
  }
}

/** Short machine-readable label for any error a unit can fail with. */
export function errorKindOf(err: unknown): string {
  if (
    err instanceof DependencyError ||
    err instanceof GenerationError ||
    err instanceof ParseError ||
    err instanceof SchemaViolationError ||
    err instanceof StateConflictError
  ) {
    return err.kind;
  }
  return "error";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
