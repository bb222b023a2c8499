import defaultColors from './colors.js';
import type { RenderOptions } from './sparkline.js';
import { TICK_COLOR } from './sparkline.js';

const TRACK_COLOR = 237;
const CURSOR_COLOR = 214;

/**
 * Position bar for the history cursor across a whole day.
 * Columns whose slot opens a new hour show a tick.
 */
export function renderScrubber(
  timeSlots: readonly Date[],
  cursor: number,
  width: number,
  options: RenderOptions = {}
): string {
  const c = options.colors ?? defaultColors;
  if (timeSlots.length === 0 || width <= 0) return '';

  const last = timeSlots.length - 1;
  let pos = last > 0 && width > 1 ? Math.floor((cursor * (width - 1)) / last) : 0;
  pos = Math.max(0, Math.min(width - 1, pos));

  const track = c.fg256(TRACK_COLOR);
  const tick = c.fg256(TICK_COLOR);

  let result = '';
  for (let i = 0; i < width; i++) {
    if (i === pos) {
      result += c.bold(c.fg256(CURSOR_COLOR)('◆'));
      continue;
    }

    const slot = last > 0 && width > 1 ? Math.floor((i * last) / (width - 1)) : 0;
    if (slot > 0 && timeSlots[slot].getHours() !== timeSlots[slot - 1].getHours()) {
      result += tick('│');
    } else {
      result += track('─');
    }
  }

  return result;
}
