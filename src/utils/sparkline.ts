/**
 * Sparkline - Compact inline temperature charts using Unicode block characters
 *
 * Uses 8-level block characters for gradation:
 * ▁▂▃▄▅▆▇█ (U+2581 to U+2588)
 *
 * Each block is colored by its threshold tier. Minute boundaries are drawn as
 * a thin pipe in place of the value block.
 */

import type { Point, Thresholds } from '../types/index.js';
import { classify, tierColor } from '../core/classifier.js';
import defaultColors, { type Colors } from './colors.js';
import { isMinuteTick, rightAlign } from './ticks.js';

// 8-level block characters for sparkline
export const SPARK_CHARS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'] as const;
export const EMPTY_CHAR = '╌';
export const TICK_CHAR = '│';

export const EMPTY_COLOR = 236;
export const TICK_COLOR = 239;

export interface RenderOptions {
  /** Palette to style with (default: detected from the terminal) */
  colors?: Colors;
}

/**
 * Map a value onto one of the 8 spark levels.
 * A non-positive span is treated as 1.
 */
export function sparkLevel(value: number, rangeMin: number, rangeMax: number): number {
  let span = rangeMax - rangeMin;
  if (span <= 0) span = 1;

  const normalized = Math.max(0, Math.min(1, (value - rangeMin) / span));
  const idx = Math.trunc(normalized * (SPARK_CHARS.length - 1));
  return Math.max(0, Math.min(SPARK_CHARS.length - 1, idx));
}

/**
 * Render a sparkline of exactly `width` columns.
 *
 * @example
 * ```ts
 * const pts = buffer.lastNPoints(40);
 * console.log(renderSparkline(pts, 40, 20, 110, { high: 80, critical: 100 }));
 * ```
 */
export function renderSparkline(
  points: readonly Point[],
  width: number,
  rangeMin: number,
  rangeMax: number,
  thresholds: Thresholds = {},
  options: RenderOptions = {}
): string {
  const c = options.colors ?? defaultColors;
  if (width <= 0) return '';

  const empty = c.fg256(EMPTY_COLOR);
  if (points.length === 0) return empty(EMPTY_CHAR.repeat(width));

  const { visible, padding } = rightAlign(points, width);

  let result = '';
  for (let i = 0; i < padding; i++) {
    result += empty(EMPTY_CHAR);
  }

  const tick = c.fg256(TICK_COLOR);
  for (let i = 0; i < visible.length; i++) {
    if (isMinuteTick(visible, i)) {
      result += tick(TICK_CHAR);
      continue;
    }

    const { value } = visible[i];
    const { tier, emphasis } = classify(value, thresholds);
    const glyph = c.fg256(tierColor(tier))(SPARK_CHARS[sparkLevel(value, rangeMin, rangeMax)]);
    result += emphasis ? c.bold(glyph) : glyph;
  }

  return result;
}

/**
 * Render bare values with no timestamps, so no minute ticks appear
 */
export function renderSparklineValues(
  values: readonly number[],
  width: number,
  rangeMin: number,
  rangeMax: number,
  thresholds: Thresholds = {},
  options: RenderOptions = {}
): string {
  const points = values.map((value): Point => ({ value }));
  return renderSparkline(points, width, rangeMin, rangeMax, thresholds, options);
}
