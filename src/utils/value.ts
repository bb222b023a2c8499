import type { Thresholds } from '../types/index.js';
import { classify, tierColor } from '../core/classifier.js';
import defaultColors from './colors.js';
import type { RenderOptions } from './sparkline.js';

/**
 * Temperature label such as ` 72.5°C`, colored by tier and bold when critical
 */
export function formatValue(value: number, thresholds: Thresholds = {}, options: RenderOptions = {}): string {
  const c = options.colors ?? defaultColors;
  const text = `${value.toFixed(1).padStart(5)}°C`;
  const { tier, emphasis } = classify(value, thresholds);
  const styled = c.fg256(tierColor(tier))(text);
  return emphasis ? c.bold(styled) : styled;
}

/**
 * Shorten `text` to `width` columns, ending in an ellipsis when cut
 */
export function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length <= width) return text;
  if (width <= 3) return chars.slice(0, Math.max(0, width)).join('');
  return chars.slice(0, width - 1).join('') + '…';
}
