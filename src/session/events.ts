import type { SensorReading, StoredReading } from '../types/index.js';

/**
 * Messages delivered to the live monitor by its host loop
 */
export type MonitorEvent =
  /** Poll timer fired */
  | { type: 'tick'; at: Date }
  /** A poll finished; `timestamp` is the host's clock at poll time */
  | { type: 'readings'; readings: SensorReading[]; timestamp: Date }
  | { type: 'key'; key: string }
  | { type: 'resize'; width: number; height: number }
  /** A poll failed */
  | { type: 'error'; error: Error };

/**
 * Work the host performs on behalf of the monitor
 */
export type MonitorCommand =
  | { type: 'poll' }
  | { type: 'schedule-tick'; delayMs: number }
  | { type: 'persist'; readings: SensorReading[]; timestamp: Date }
  | { type: 'quit' };

/**
 * Messages delivered to the history browser by its host loop
 */
export type BrowserEvent =
  | { type: 'day-loaded'; day: string; rows: StoredReading[] }
  | { type: 'load-failed'; day: string; error: Error }
  | { type: 'key'; key: string }
  | { type: 'resize'; width: number; height: number };

export type BrowserCommand =
  | { type: 'load-day'; day: string }
  | { type: 'quit' };

export function assertNever(value: never): never {
  throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}
