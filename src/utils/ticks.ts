import type { Point } from '../types/index.js';

/** True when the point carries a usable timestamp */
export function hasTime(p: Point | undefined): p is Point & { timestamp: Date } {
  return p?.timestamp !== undefined && !Number.isNaN(p.timestamp.getTime());
}

/**
 * Whether `points[i]` marks a minute boundary.
 *
 * A point is a tick when its seconds field is zero, or when the previous
 * rendered point has a timestamp in a different minute. Only the neighbour is
 * compared, not a fixed clock grid, so irregular polling can miss or repeat a
 * boundary.
 */
export function isMinuteTick(points: readonly Point[], i: number): boolean {
  const p = points[i];
  if (!hasTime(p)) return false;
  if (p.timestamp.getSeconds() === 0) return true;

  const prev = i > 0 ? points[i - 1] : undefined;
  if (!hasTime(prev)) return false;
  return p.timestamp.getMinutes() !== prev.timestamp.getMinutes();
}

const pad2 = (n: number) => String(n).padStart(2, '0');

/** Local `HH:MM` */
export function formatClock(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/**
 * Keep the last `width` points, and report how many blank columns precede them
 */
export function rightAlign<T>(points: readonly T[], width: number): { visible: T[]; padding: number } {
  const visible = points.length > width ? points.slice(points.length - width) : points.slice();
  return { visible, padding: width - visible.length };
}
