import type { Point } from '../types/index.js';

/**
 * Value of the sample closest in time to `target`.
 *
 * Expects points sorted by time. Stops scanning once samples are past the
 * target and getting farther away. Ties keep the earlier sample.
 */
export function findNearest(sortedPoints: readonly Point[], target: Date): number | undefined {
  let best: number | undefined;
  let bestDiff = Infinity;
  const t = target.getTime();

  for (const p of sortedPoints) {
    if (!p.timestamp) continue;
    const at = p.timestamp.getTime();
    const diff = Math.abs(at - t);
    if (diff < bestDiff) {
      bestDiff = diff;
      best = p.value;
    }
    if (at > t && diff > bestDiff) break;
  }

  return best;
}
