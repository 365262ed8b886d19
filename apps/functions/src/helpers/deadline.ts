/** Time kept back from the Lambda's remaining time to build the response. */
export const DEADLINE_RESERVE_MS = 250;

/**
 * Budget for the storage write: the configured bound, shortened when the
 * invocation itself has less time left.
 */
export function commandDeadline(timeoutMs: number, remainingMs?: number): number {
  const budget = remainingMs === undefined ? timeoutMs : Math.min(timeoutMs, remainingMs - DEADLINE_RESERVE_MS);
  return Math.max(budget, 0);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}
