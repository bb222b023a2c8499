import type { Thresholds } from '../types/index.js';
import { classify, tierColor, TIER_COLORS } from '../core/classifier.js';
import defaultColors from './colors.js';
import type { RenderOptions } from './sparkline.js';

const BACKGROUND_CHAR = '·';
const MARKER_CHAR = '▪';
const CURRENT_CHAR = '◆';
const BACKGROUND_COLOR = 236;
const HIGH_MARKER_COLOR = TIER_COLORS.warn; // amber
const CRITICAL_MARKER_COLOR = TIER_COLORS.critical;

function scaleColumn(value: number, rangeMin: number, span: number, width: number): number {
  return Math.round(((width - 1) * (value - rangeMin)) / span);
}

function markerColumn(
  threshold: number | undefined,
  rangeMin: number,
  span: number,
  width: number
): number | undefined {
  if (threshold === undefined || threshold <= rangeMin) return undefined;
  const col = scaleColumn(threshold, rangeMin, span, width);
  return col >= 0 && col < width ? col : undefined;
}

/**
 * Render a one-line scale showing where `current` sits relative to the
 * high and critical thresholds.
 *
 * Column precedence: current value, then critical, then high, then background.
 */
export function renderThresholdScale(
  current: number,
  rangeMin: number,
  rangeMax: number,
  thresholds: Thresholds,
  width: number,
  options: RenderOptions = {}
): string {
  const c = options.colors ?? defaultColors;
  if (width <= 0) return '';

  let span = rangeMax - rangeMin;
  if (span <= 0) span = 1;

  const highCol = markerColumn(thresholds.high, rangeMin, span, width);
  const critCol = markerColumn(thresholds.critical, rangeMin, span, width);
  const curCol = Math.max(0, Math.min(width - 1, scaleColumn(current, rangeMin, span, width)));

  const currentStyle = c.fg256(tierColor(classify(current, thresholds).tier));
  const background = c.fg256(BACKGROUND_COLOR);

  let result = '';
  for (let i = 0; i < width; i++) {
    if (i === curCol) {
      result += c.bold(currentStyle(CURRENT_CHAR));
    } else if (i === critCol) {
      result += c.fg256(CRITICAL_MARKER_COLOR)(MARKER_CHAR);
    } else if (i === highCol) {
      result += c.fg256(HIGH_MARKER_COLOR)(MARKER_CHAR);
    } else {
      result += background(BACKGROUND_CHAR);
    }
  }

  return result;
}
