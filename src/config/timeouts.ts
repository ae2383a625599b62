const MIN_TIMEOUT_MS = 5_000; // 5s
const MAX_TIMEOUT_MS = 5 * 60_000; // 5m

/** Budget for a single generation step (one provider round-trip). */
export const DEFAULT_GENERATION_TIMEOUT_MS = 60_000;

/** Whole-request deadline for the HTTP route, covering every retry. */
export const DEFAULT_ROUTE_TIMEOUT_MS = 120_000;

export function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}
