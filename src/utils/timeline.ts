import type { Point } from '../types/index.js';
import defaultColors from './colors.js';
import type { RenderOptions } from './sparkline.js';
import { TICK_COLOR } from './sparkline.js';
import { formatClock, hasTime, isMinuteTick, rightAlign } from './ticks.js';

export interface TimelineLabel {
  /** First column of the label */
  start: number;
  text: string;
}

/**
 * Choose `HH:MM` labels for the minute ticks of a sparkline row.
 *
 * Labels sit two columns left of their tick, clamped at the left edge.
 * Labels that would run past the right edge are dropped, as is any label
 * starting within one column of the previous one; earlier ticks win.
 */
export function placeTimelineLabels(points: readonly Point[], width: number): TimelineLabel[] {
  if (points.length === 0 || width <= 0) return [];

  const { visible, padding } = rightAlign(points, width);
  const labels: TimelineLabel[] = [];
  // no previous label: any clamped start, including column 0, is free
  let lastEnd = -2;

  for (let i = 0; i < visible.length; i++) {
    const p = visible[i];
    if (!hasTime(p) || !isMinuteTick(visible, i)) continue;

    const text = formatClock(p.timestamp);
    const start = Math.max(0, padding + i - 2);
    const end = start + text.length;
    if (end > width) continue;
    if (start <= lastEnd + 1) continue;

    labels.push({ start, text });
    lastEnd = end;
  }

  return labels;
}

/**
 * Render the label line that goes under a sparkline of the same width
 */
export function renderTimeline(points: readonly Point[], width: number, options: RenderOptions = {}): string {
  const c = options.colors ?? defaultColors;
  if (points.length === 0 || width <= 0) return '';

  const line = new Array<string>(width).fill(' ');
  for (const { start, text } of placeTimelineLabels(points, width)) {
    for (let j = 0; j < text.length; j++) {
      line[start + j] = text[j];
    }
  }

  return c.fg256(TICK_COLOR)(line.join(''));
}
