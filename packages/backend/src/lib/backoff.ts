/**
 * Exponential backoff with additive jitter:
 * `base * 2^(attempt - 1) + random(0..jitter)` seconds.
 */
export function backoffDelaySeconds(
  attempt: number,
  baseSeconds: number,
  jitterSeconds: number,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(attempt, 1) - 1;
  const jitter = jitterSeconds > 0 ? Math.floor(random() * (jitterSeconds + 1)) : 0;
  return baseSeconds * 2 ** exponent + jitter;
}
