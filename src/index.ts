export * from './types/index.js';
export * from './types/logger.js';

export { RingBuffer } from './core/ring-buffer.js';
export { SeriesStore } from './core/series-store.js';
export { classify, tierColor, TIER_COLORS, WARN_RATIO } from './core/classifier.js';
export { ThermolineError, ConfigError } from './core/errors.js';

export { renderSparkline, renderSparklineValues, sparkLevel, SPARK_CHARS, EMPTY_CHAR, TICK_CHAR } from './utils/sparkline.js';
export type { RenderOptions } from './utils/sparkline.js';
export { renderTimeline, placeTimelineLabels } from './utils/timeline.js';
export type { TimelineLabel } from './utils/timeline.js';
export { renderThresholdScale } from './utils/threshold-scale.js';
export { renderScrubber } from './utils/scrubber.js';
export { formatValue, truncate } from './utils/value.js';
export { displayRange, DEFAULT_RANGE_PADDING } from './utils/range.js';
export { isMinuteTick, formatClock } from './utils/ticks.js';
export { createColors, detectColorSupport, stripAnsi, visibleWidth } from './utils/colors.js';
export type { Colors, Style } from './utils/colors.js';
export { TerminalLogger, createLogger, detectLogLevel } from './utils/logger.js';
export type { TerminalLoggerOptions } from './utils/logger.js';

export { buildWindow } from './history/window-builder.js';
export { findNearest } from './history/nearest.js';
export { buildViewModel, seriesStats } from './history/view-model.js';

export { friendlyName, sensorKey, readingKey, splitSensorKey } from './sensors/identity.js';

export { MonitorSession, extendOrder } from './session/monitor.js';
export { HistoryBrowser } from './session/browser.js';
export { chartWidth, SCALE_WIDTH } from './session/layout.js';
export type { SensorRow, ChipPanel } from './session/layout.js';
export type { SessionOptions } from './session/options.js';
export type { MonitorEvent, MonitorCommand, BrowserEvent, BrowserCommand } from './session/events.js';

export { configSchema, defineConfig, loadConfigFromEnv } from './config.js';
export type { ThermolineConfig, ThermolineConfigInput, ChartConfig } from './config.js';
