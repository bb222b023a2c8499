import type { SensorReading, Thresholds } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import { defineConfig, type ThermolineConfig } from '../config.js';
import { SeriesStore } from '../core/series-store.js';
import { friendlyName, readingKey } from '../sensors/identity.js';
import defaultColors, { type Colors } from '../utils/colors.js';
import { displayRange } from '../utils/range.js';
import { renderSparkline } from '../utils/sparkline.js';
import { renderThresholdScale } from '../utils/threshold-scale.js';
import { renderTimeline } from '../utils/timeline.js';
import { formatValue } from '../utils/value.js';
import { assertNever, type MonitorCommand, type MonitorEvent } from './events.js';
import { SCALE_WIDTH, type ChipPanel, type SensorRow } from './layout.js';
import { sessionLogger, type SessionOptions } from './options.js';

/**
 * Append keys not seen before, sorted, keeping the existing order stable
 */
export function extendOrder(existing: readonly string[], readings: readonly SensorReading[]): string[] {
  const seen = new Set(existing);
  const added: string[] = [];
  for (const r of readings) {
    const key = readingKey(r);
    if (!seen.has(key)) {
      seen.add(key);
      added.push(key);
    }
  }
  return [...existing, ...added.sort()];
}

/**
 * State of the live temperature monitor.
 *
 * The host feeds events one at a time through `handle` and carries out the
 * returned commands; the session never performs I/O itself.
 */
export class MonitorSession {
  readonly config: ThermolineConfig;
  readonly store: SeriesStore;
  private readonly logger: Logger;
  private readonly colors: Colors;

  readings: SensorReading[] = [];
  order: string[] = [];
  paused = false;
  scroll = 0;
  width = 0;
  height = 0;
  lastPoll?: Date;
  error?: Error;

  constructor(options: SessionOptions = {}) {
    this.config = options.config ?? defineConfig();
    this.store = new SeriesStore(this.config.historySize);
    this.logger = sessionLogger(this.config, options.logger);
    this.colors = options.colors ?? defaultColors;
  }

  /** Commands to issue once the host loop starts */
  init(): MonitorCommand[] {
    return [{ type: 'poll' }, this.scheduleTick()];
  }

  handle(event: MonitorEvent): MonitorCommand[] {
    switch (event.type) {
      case 'tick':
        if (this.paused) {
          this.logger.debug('tick skipped while paused');
          return [this.scheduleTick()];
        }
        return [{ type: 'poll' }, this.scheduleTick()];

      case 'readings':
        this.record(event.readings, event.timestamp);
        return [{ type: 'persist', readings: event.readings, timestamp: event.timestamp }];

      case 'key':
        return this.handleKey(event.key);

      case 'resize':
        this.width = event.width;
        this.height = event.height;
        return [];

      case 'error':
        this.error = event.error;
        this.logger.warn(`sensor poll failed: ${event.error.message}`);
        // the tick that issued the poll has already re-armed the timer
        return [];

      default:
        return assertNever(event);
    }
  }

  /** True until the first batch of readings arrives */
  get isWaiting(): boolean {
    return this.readings.length === 0;
  }

  /**
   * Sensor rows grouped by chip, in stable display order
   */
  panels(chartWidth: number): ChipPanel[] {
    const latest = new Map<string, SensorReading>();
    for (const r of this.readings) latest.set(readingKey(r), r);

    const panels = new Map<string, ChipPanel>();
    for (const key of this.order) {
      const reading = latest.get(key);
      if (!reading) continue;
      const row = this.row(key, reading, chartWidth);
      if (!row) continue;

      let panel = panels.get(reading.chip);
      if (!panel) {
        panel = { chip: reading.chip, name: friendlyName(reading.chip), adapter: reading.adapter, rows: [] };
        panels.set(reading.chip, panel);
      }
      panel.rows.push(row);
    }

    return Array.from(panels.values());
  }

  private row(key: string, reading: SensorReading, width: number): SensorRow | undefined {
    const history = this.store.get(key);
    if (!history) return undefined;

    const thresholds: Thresholds = { high: reading.high, critical: reading.critical };
    const [rangeMin, rangeMax] = displayRange(history.min, history.peak, thresholds, this.config.rangePadding);
    const points = history.lastNPoints(width);
    const options = { colors: this.colors };

    return {
      key,
      label: reading.label,
      current: reading.value,
      value: formatValue(reading.value, thresholds, options),
      sparkline: renderSparkline(points, width, rangeMin, rangeMax, thresholds, options),
      timeline: renderTimeline(points, width, options),
      scale: renderThresholdScale(reading.value, rangeMin, rangeMax, thresholds, SCALE_WIDTH, options),
      stats: { average: history.average(), min: history.min, peak: history.peak },
      thresholds,
    };
  }

  private record(readings: SensorReading[], timestamp: Date): void {
    for (const r of readings) {
      this.store.record(readingKey(r), r.value, timestamp);
    }
    this.readings = readings;
    this.lastPoll = timestamp;
    this.order = extendOrder(this.order, readings);
    this.error = undefined;
    this.logger.debug(`recorded ${readings.length} readings`);
  }

  private handleKey(key: string): MonitorCommand[] {
    switch (key) {
      case 'q':
      case 'ctrl+c':
        return [{ type: 'quit' }];
      case 'up':
      case 'k':
        if (this.scroll > 0) this.scroll--;
        break;
      case 'down':
      case 'j':
        this.scroll++;
        break;
      case 'home':
        this.scroll = 0;
        break;
      case ' ':
      case 'p':
        this.paused = !this.paused;
        this.logger.info(this.paused ? 'paused' : 'resumed');
        break;
    }
    return [];
  }

  private scheduleTick(): MonitorCommand {
    return { type: 'schedule-tick', delayMs: this.config.pollIntervalMs };
  }
}
