import type { ChartConfig } from '../config.js';
import type { SeriesStats, Thresholds } from '../types/index.js';

/** Width of the threshold scale shown beside each sensor */
export const SCALE_WIDTH = 12;

/**
 * Sparkline width for a terminal of `totalWidth` columns.
 * Subtracts panel border/padding and the fixed row columns, then clamps.
 */
export function chartWidth(totalWidth: number, chart: ChartConfig): number {
  const inner = Math.max(30, totalWidth - 4);
  return Math.max(chart.minWidth, Math.min(chart.maxWidth, inner - chart.reservedColumns));
}

/**
 * Everything the host needs to draw one sensor line
 */
export interface SensorRow {
  key: string;
  label: string;
  /** Raw value at the live poll or history cursor */
  current: number;
  /** Styled `%5.1f°C` label */
  value: string;
  sparkline: string;
  /** Label line under the sparkline; empty when there are no ticks in view */
  timeline: string;
  scale: string;
  stats: SeriesStats;
  thresholds: Thresholds;
}

export interface ChipPanel {
  chip: string;
  /** Friendly component name, e.g. "CPU" */
  name: string;
  adapter?: string;
  rows: SensorRow[];
}
