/** Delay before reconnect attempt `attempt` (1-based): doubles from `baseMs`, capped at `ceilingMs`. */
export function backoffDelay(attempt: number, baseMs: number, ceilingMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(baseMs * 2 ** exponent, ceilingMs);
}
