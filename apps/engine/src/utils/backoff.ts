export interface BackoffOptions {
  initialIntervalMs?: number;
  multiplier?: number;
  maxIntervalMs?: number;
  /** Fraction of the delay used as ± jitter. */
  jitter?: number;
}

// Exponential backoff: base-4 gives 1s → 4s → 16s → 64s (capped at maxIntervalMs).
// attempt is 1-indexed; attempt=1 waits initialIntervalMs, attempt=2 waits 4x that, etc.
export function calculateBackOff(
  attempt: number,
  options: BackoffOptions = {},
  random: () => number = Math.random,
): number {
  const { initialIntervalMs = 1000, multiplier = 4.0, maxIntervalMs = 60000, jitter = 0.1 } = options;
  const delay = Math.min(initialIntervalMs * Math.pow(multiplier, attempt - 1), maxIntervalMs);
  const spread = delay * jitter;
  return Math.floor(delay + (random() * spread * 2 - spread));
}
