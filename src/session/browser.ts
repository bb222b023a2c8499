import type { HistoryViewModel } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import { defineConfig, type ThermolineConfig } from '../config.js';
import { buildViewModel, seriesStats } from '../history/view-model.js';
import { buildWindow } from '../history/window-builder.js';
import { findNearest } from '../history/nearest.js';
import { friendlyName, splitSensorKey } from '../sensors/identity.js';
import defaultColors, { type Colors } from '../utils/colors.js';
import { displayRange } from '../utils/range.js';
import { renderScrubber } from '../utils/scrubber.js';
import { renderSparkline } from '../utils/sparkline.js';
import { renderThresholdScale } from '../utils/threshold-scale.js';
import { renderTimeline } from '../utils/timeline.js';
import { formatValue } from '../utils/value.js';
import { assertNever, type BrowserCommand, type BrowserEvent } from './events.js';
import { SCALE_WIDTH, type ChipPanel, type SensorRow } from './layout.js';
import { sessionLogger, type SessionOptions } from './options.js';

const EMPTY_MODEL: HistoryViewModel = {
  sensors: [],
  timeSlots: [],
  series: new Map(),
  thresholds: new Map(),
  readingCount: 0,
};

/**
 * State of the day-by-day history browser.
 *
 * `days` are the available log dates, newest first. The view model is
 * rebuilt from scratch whenever a day finishes loading.
 */
export class HistoryBrowser {
  readonly config: ThermolineConfig;
  readonly days: readonly string[];
  private readonly logger: Logger;
  private readonly colors: Colors;

  dayIndex = 0;
  model: HistoryViewModel = EMPTY_MODEL;
  cursor = 0;
  scroll = 0;
  width = 0;
  height = 0;
  error?: Error;

  constructor(days: readonly string[], options: SessionOptions = {}) {
    this.days = days;
    this.config = options.config ?? defineConfig();
    this.logger = sessionLogger(this.config, options.logger);
    this.colors = options.colors ?? defaultColors;
  }

  get currentDay(): string | undefined {
    return this.days[this.dayIndex];
  }

  /** No samples for the selected day (or nothing loaded yet) */
  get isEmpty(): boolean {
    return this.model.timeSlots.length === 0;
  }

  get cursorTime(): Date | undefined {
    return this.model.timeSlots[this.cursor];
  }

  init(): BrowserCommand[] {
    return this.loadCurrent();
  }

  handle(event: BrowserEvent): BrowserCommand[] {
    switch (event.type) {
      case 'day-loaded':
        if (event.day !== this.currentDay) {
          this.logger.debug(`ignoring stale load for ${event.day}`);
          return [];
        }
        this.model = buildViewModel(event.rows);
        this.cursor = Math.max(0, this.model.timeSlots.length - 1);
        this.scroll = 0;
        this.error = undefined;
        this.logger.debug(
          `loaded ${event.day}: ${event.rows.length} rows, ${this.model.sensors.length} sensors`
        );
        return [];

      case 'load-failed':
        if (event.day !== this.currentDay) {
          this.logger.debug(`ignoring stale failure for ${event.day}`);
          return [];
        }
        this.error = event.error;
        this.logger.warn(`cannot load ${event.day}: ${event.error.message}`);
        return [];

      case 'key':
        return this.handleKey(event.key);

      case 'resize':
        this.width = event.width;
        this.height = event.height;
        return [];

      default:
        return assertNever(event);
    }
  }

  /** Day-wide position bar for the cursor */
  scrubber(width: number): string {
    return renderScrubber(this.model.timeSlots, this.cursor, width, { colors: this.colors });
  }

  /**
   * Sensor rows at the cursor, grouped by chip in key order
   */
  panels(chartWidth: number): ChipPanel[] {
    const panels = new Map<string, ChipPanel>();

    for (const key of this.model.sensors) {
      const row = this.row(key, chartWidth);
      if (!row) continue;

      const { chip } = splitSensorKey(key);
      let panel = panels.get(chip);
      if (!panel) {
        panel = { chip, name: friendlyName(chip), rows: [] };
        panels.set(chip, panel);
      }
      panel.rows.push(row);
    }

    return Array.from(panels.values());
  }

  private row(key: string, width: number): SensorRow | undefined {
    const cursorTime = this.cursorTime;
    const points = this.model.series.get(key);
    const stats = points ? seriesStats(points) : undefined;
    if (!cursorTime || !points || !stats) return undefined;

    const current = findNearest(points, cursorTime) ?? points[0].value;
    const thresholds = this.model.thresholds.get(key) ?? {};
    const [rangeMin, rangeMax] = displayRange(stats.min, stats.peak, thresholds, this.config.rangePadding);
    const window = buildWindow(points, this.cursor, width, this.model.timeSlots);
    const options = { colors: this.colors };

    return {
      key,
      label: splitSensorKey(key).label,
      current,
      value: formatValue(current, thresholds, options),
      sparkline: renderSparkline(window, width, rangeMin, rangeMax, thresholds, options),
      timeline: renderTimeline(window, width, options),
      scale: renderThresholdScale(current, rangeMin, rangeMax, thresholds, SCALE_WIDTH, options),
      stats,
      thresholds,
    };
  }

  private handleKey(key: string): BrowserCommand[] {
    const lastSlot = Math.max(0, this.model.timeSlots.length - 1);

    switch (key) {
      case 'q':
      case 'ctrl+c':
        return [{ type: 'quit' }];
      case 'left':
      case 'h':
        if (this.cursor > 0) this.cursor--;
        break;
      case 'right':
      case 'l':
        if (this.cursor < lastSlot) this.cursor++;
        break;
      case 'shift+left':
      case 'H':
        this.cursor = Math.max(0, this.cursor - this.config.scrubStep);
        break;
      case 'shift+right':
      case 'L':
        this.cursor = Math.min(lastSlot, this.cursor + this.config.scrubStep);
        break;
      case 'home':
        this.cursor = 0;
        break;
      case 'end':
        this.cursor = lastSlot;
        break;
      case '[':
        if (this.dayIndex < this.days.length - 1) {
          this.dayIndex++;
          return this.loadCurrent();
        }
        break;
      case ']':
        if (this.dayIndex > 0) {
          this.dayIndex--;
          return this.loadCurrent();
        }
        break;
      case 'up':
      case 'k':
        if (this.scroll > 0) this.scroll--;
        break;
      case 'down':
      case 'j':
        this.scroll++;
        break;
    }
    return [];
  }

  private loadCurrent(): BrowserCommand[] {
    const day = this.currentDay;
    return day === undefined ? [] : [{ type: 'load-day', day }];
  }
}
