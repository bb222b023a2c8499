import type { HistoryViewModel, Point, SeriesStats, StoredReading, Thresholds } from '../types/index.js';
import { sensorKey } from '../sensors/identity.js';
import { timeKey } from './time-key.js';

// Storage writes 0 when a sensor has no threshold
const present = (n: number | undefined): number | undefined => (n !== undefined && n > 0 ? n : undefined);

/**
 * Rebuild the browsing structures for one day from its stored rows.
 *
 * Rows need not be sorted by time. Time slots are the union of all sample
 * seconds. Where rows collide, array order decides: a sensor with two rows
 * in the same second keeps the one later in `rows`, and the last row in
 * `rows` carrying a threshold sets it.
 */
export function buildViewModel(rows: readonly StoredReading[]): HistoryViewModel {
  const slots = new Map<number, Date>();
  const perKey = new Map<string, Map<number, Point>>();
  const thresholds = new Map<string, Thresholds>();

  for (const row of rows) {
    const key = sensorKey(row.chip, row.label);
    const second = timeKey(row.timestamp);
    slots.set(second, row.timestamp);

    let points = perKey.get(key);
    if (!points) {
      points = new Map();
      perKey.set(key, points);
    }
    points.set(second, { value: row.value, timestamp: row.timestamp });

    const high = present(row.high);
    const critical = present(row.critical);
    if (high !== undefined || critical !== undefined) {
      thresholds.set(key, { high, critical });
    }
  }

  const series = new Map<string, Point[]>();
  for (const [key, points] of perKey) {
    const sorted = Array.from(points.entries())
      .sort(([a], [b]) => a - b)
      .map(([, p]) => p);
    series.set(key, sorted);
  }

  const timeSlots = Array.from(slots.entries())
    .sort(([a], [b]) => a - b)
    .map(([, t]) => t);

  return {
    sensors: Array.from(perKey.keys()).sort(),
    timeSlots,
    series,
    thresholds,
    readingCount: rows.length,
  };
}

/**
 * Average, lowest and highest value of a day's series
 */
export function seriesStats(points: readonly Point[]): SeriesStats | undefined {
  if (points.length === 0) return undefined;

  let sum = 0;
  let min = Infinity;
  let peak = -Infinity;
  for (const { value } of points) {
    sum += value;
    if (value < min) min = value;
    if (value > peak) peak = value;
  }

  return { average: sum / points.length, min, peak };
}
