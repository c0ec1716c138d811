/**
 * Resolution handling: step sizes and the timestamp walk shared by both
 * generation modes. Bounds are inclusive; from > to walks nothing.
 */

export const ONE_MINUTE_MS = 60_000;
export const FIVE_MINUTES_MS = 300_000;

const RESOLUTION_INTERVALS_MS: ReadonlyMap<string, number> = new Map([
  ['1m', ONE_MINUTE_MS],
  ['5m', FIVE_MINUTES_MS],
  ['1h', 3_600_000],
  ['1d', 86_400_000],
]);

export const SUPPORTED_RESOLUTIONS: readonly string[] = [...RESOLUTION_INTERVALS_MS.keys()];

export function resolveInterval(resolution: string, fallbackMs: number): number {
  return RESOLUTION_INTERVALS_MS.get(resolution) ?? fallbackMs;
}

export function countDataPoints(fromMillis: number, toMillis: number, intervalMs: number): number {
  if (fromMillis > toMillis) return 0;
  return Math.floor((toMillis - fromMillis) / intervalMs) + 1;
}

export function buildTimestamps(fromMillis: number, toMillis: number, intervalMs: number): number[] {
  const timestamps: number[] = [];
  for (let cursor = fromMillis; cursor <= toMillis; cursor += intervalMs) {
    timestamps.push(cursor);
  }
  return timestamps;
}
