export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Exponential backoff with "equal jitter": the capped delay
 * `min(max, base * 2^(attempt - 1))` is spread over `[delay / 2, delay]`.
 */
export function computeBackoff(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** exponent);
  const half = delay / 2;
  return Math.ceil(half + random() * half);
}
