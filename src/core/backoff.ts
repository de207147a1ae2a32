export type BackoffPolicy = {
  baseDelayMs: number;
  /** Multiplier between consecutive delays. Defaults to 2. */
  factor?: number;
  maxDelayMs?: number;
};

/**
 * Delay to wait after the `attempt`-th failed attempt (1-based):
 * `baseDelayMs * factor^(attempt - 1)`, capped at `maxDelayMs`.
 */
export function backoffDelayMs(attempt: number, policy: BackoffPolicy): number {
  const n = Math.max(1, Math.floor(attempt));
  const base = Math.max(0, policy.baseDelayMs);
  const factor = policy.factor !== undefined && Number.isFinite(policy.factor) && policy.factor >= 1 ? policy.factor : 2;
  // Exponent is clamped so huge attempt numbers stay finite before the cap applies.
  const raw = base * factor ** Math.min(n - 1, 30);
  const cap = policy.maxDelayMs;
  if (cap !== undefined && Number.isFinite(cap) && cap >= 0) return Math.min(raw, cap);
  return raw;
}

