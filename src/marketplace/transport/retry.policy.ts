export interface RetryPolicy {
  baseMs: number;
  factor: number;
  maxDelayMs: number;
  maxAttempts: number;
  /** Fraction of the delay applied as +/- jitter. */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  baseMs: 1_000,
  factor: 2,
  maxDelayMs: 60_000,
  maxAttempts: 6,
  jitter: 0.2,
};

/**
 * Delay before the attempt that follows `attempt` (1-based), or null when
 * `attempt` was the last one allowed.
 */
export function nextDelay(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY, random: () => number = Math.random): number | null {
  if (attempt < 1 || attempt >= policy.maxAttempts) return null;
  const raw = policy.baseMs * Math.pow(policy.factor, attempt - 1);
  const base = Math.min(raw, policy.maxDelayMs);
  const spread = policy.jitter * base;
  const delta = Math.floor(random() * spread * 2 - spread);
  return Math.min(policy.maxDelayMs, Math.max(0, base + delta));
}

/** Retry-After as milliseconds; accepts delta-seconds or an HTTP date. */
export function parseRetryAfter(header: unknown, now: number = Date.now()): number | undefined {
  if (header === undefined || header === null) return undefined;
  const value = Array.isArray(header) ? header[0] : header;
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value * 1000 : undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
