import type { Point } from '../types/index.js';
import { timeKey } from './time-key.js';

/**
 * Select the sparkline window for one sensor at a history cursor.
 *
 * Walks the `width` timeline slots ending at `timeSlots[cursorIndex]` and
 * keeps only the slots this sensor has a sample for. Missing slots are
 * skipped, so the result can be shorter than `width`.
 */
export function buildWindow(
  seriesPoints: readonly Point[],
  cursorIndex: number,
  width: number,
  timeSlots: readonly Date[]
): Point[] {
  if (seriesPoints.length === 0 || timeSlots.length === 0) return [];
  if (cursorIndex < 0 || cursorIndex >= timeSlots.length) return [];

  const values = new Map<number, number>();
  for (const p of seriesPoints) {
    if (p.timestamp) values.set(timeKey(p.timestamp), p.value);
  }

  const result: Point[] = [];
  for (let i = width - 1; i >= 0; i--) {
    const slotIdx = cursorIndex - i;
    if (slotIdx < 0 || slotIdx >= timeSlots.length) continue;

    const t = timeSlots[slotIdx];
    const value = values.get(timeKey(t));
    if (value !== undefined) {
      result.push({ value, timestamp: t });
    }
  }

  const cursorTime = timeSlots[cursorIndex];
  const cursorValue = values.get(timeKey(cursorTime));
  if (cursorValue !== undefined) {
    const lastTime = result[result.length - 1]?.timestamp;
    if (lastTime === undefined || lastTime.getTime() !== cursorTime.getTime()) {
      result.push({ value: cursorValue, timestamp: cursorTime });
    }
  }

  return result;
}
