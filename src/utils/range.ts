import type { Thresholds } from '../types/index.js';

export const DEFAULT_RANGE_PADDING = 5;

/**
 * Vertical range for a sensor's sparkline and scale.
 *
 * Pads the observed extremes and stretches the top so that configured
 * thresholds stay on the scale. The bottom never goes below zero.
 */
export function displayRange(
  min: number,
  peak: number,
  thresholds: Thresholds = {},
  padding: number = DEFAULT_RANGE_PADDING
): [number, number] {
  const rangeMin = Math.max(0, min - padding);
  let rangeMax = peak + padding;

  if (thresholds.critical !== undefined && thresholds.critical > rangeMax) {
    rangeMax = thresholds.critical + padding;
  }
  if (thresholds.high !== undefined && thresholds.high > rangeMax) {
    rangeMax = thresholds.high + padding;
  }

  return [rangeMin, rangeMax];
}
