/**
 * A single sample in a temperature series.
 * Points without a timestamp (legacy values) never produce minute ticks.
 */
export interface Point {
  value: number;
  timestamp?: Date;
}

/**
 * Per-reading alarm levels. Absent means the sensor does not report one.
 */
export interface Thresholds {
  high?: number;
  critical?: number;
}

export type Tier = 'ok' | 'warn' | 'high' | 'critical';

export interface Classification {
  tier: Tier;
  /** Critical values are rendered bold */
  emphasis: boolean;
}

/**
 * One live reading as delivered by the sensor collectors.
 */
export interface SensorReading extends Thresholds {
  chip: string;       // e.g. "coretemp-isa-0000"
  label: string;      // e.g. "Core 0"
  value: number;      // degrees Celsius
  adapter?: string;   // e.g. "ISA adapter"
}

/**
 * One persisted row of a day's log, already parsed by the storage layer.
 */
export interface StoredReading extends Thresholds {
  timestamp: Date;
  chip: string;
  label: string;
  value: number;
}

/**
 * Derived structures for browsing one past day.
 */
export interface HistoryViewModel {
  /** Sorted unique sensor keys */
  sensors: string[];
  /** Strictly increasing, one entry per distinct second */
  timeSlots: Date[];
  /** Per-key points, strictly increasing by timestamp */
  series: Map<string, Point[]>;
  thresholds: Map<string, Thresholds>;
  readingCount: number;
}

export interface SeriesStats {
  average: number;
  min: number;
  peak: number;
}
