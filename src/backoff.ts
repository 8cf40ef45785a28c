export const DEFAULT_BACKOFF_MS = 2000;
export const DEFAULT_MAX_BACKOFF_MS = 5 * 60 * 1000;

/**
 * Exponential backoff: `baseMs * 2^attempts`, clamped to `maxDelayMs`.
 *
 * Pass `Infinity` as the cap for unbounded growth. Unbounded delays pass
 * an hour after a dozen attempts with the default base.
 */
export function computeBackoff(
  baseMs: number,
  attempts: number,
  maxDelayMs: number = DEFAULT_MAX_BACKOFF_MS,
): number {
  const delay = Math.max(0, baseMs) * 2 ** Math.max(0, attempts);
  return Math.min(delay, Math.max(0, maxDelayMs));
}
