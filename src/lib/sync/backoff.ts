/**
 * Delay before the next attempt: base, 2×base, 4×base, ... capped at max.
 *
 * @param retryCount - Attempts already retried (0 for the first retry)
 */
export function retryDelay(
  retryCount: number,
  baseMs: number,
  maxMs: number
): number {
  // 2^31 already dwarfs any sane cap
  const exponent = Math.min(Math.max(retryCount, 0), 31);
  return Math.min(baseMs * 2 ** exponent, maxMs);
}
