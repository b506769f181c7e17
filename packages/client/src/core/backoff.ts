/**
 * Backoff Config
 * Exponential delay with jitter for reconnect and resubscribe loops
 */
export const BACKOFF_CONFIG = {
  /** Growth factor between attempts */
  FACTOR: 2,
  /** Fraction of the ceiling that jitter may shave off */
  JITTER: 0.5,
  /** Exponent cap so the ceiling arithmetic stays finite */
  MAX_EXPONENT: 31,
} as const;

export interface BackoffRange {
  minDelayMs: number;
  maxDelayMs: number;
}

export type RandomSource = () => number;

/**
 * Delay before attempt number `attempt` (zero based).
 *
 * The ceiling is `min(max, min * 2^attempt)`; jitter picks a value in
 * `[ceiling * (1 - JITTER), ceiling]`.
 */
export function backoffDelay(
  attempt: number,
  range: BackoffRange,
  random: RandomSource = Math.random
): number {
  const exponent = Math.min(Math.max(0, attempt), BACKOFF_CONFIG.MAX_EXPONENT);
  const ceiling = Math.min(range.maxDelayMs, range.minDelayMs * Math.pow(BACKOFF_CONFIG.FACTOR, exponent));
  const jitter = Math.min(Math.max(random(), 0), 1) * BACKOFF_CONFIG.JITTER;
  return Math.round(ceiling * (1 - jitter));
}
