import type { Point } from '../types/index.js';
import { ConfigError } from './errors.js';

export function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new ConfigError(`History capacity must be a positive integer, got ${capacity}`, ['historySize']);
  }
}

/**
 * Fixed-capacity history of one sensor.
 *
 * Pushing into a full buffer overwrites the oldest slot, so `push` is O(1).
 * `min` and `peak` cover every value ever pushed, including evicted ones.
 */
export class RingBuffer {
  readonly capacity: number;
  private readonly slots: Array<Point | undefined>;
  private head = 0; // next write index
  private count = 0;
  private lifetimeMin = Infinity;
  private lifetimePeak = -Infinity;

  constructor(capacity: number) {
    assertCapacity(capacity);
    this.capacity = capacity;
    this.slots = new Array<Point | undefined>(capacity).fill(undefined);
  }

  /** Add a new reading, evicting the oldest one when full */
  push(value: number, timestamp?: Date): void {
    this.slots[this.head] = { value, timestamp };
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;

    if (value < this.lifetimeMin) this.lifetimeMin = value;
    if (value > this.lifetimePeak) this.lifetimePeak = value;
  }

  /** Number of points currently in the window */
  get length(): number {
    return this.count;
  }

  /** Lowest value ever pushed (Infinity before the first push) */
  get min(): number {
    return this.lifetimeMin;
  }

  /** Highest value ever pushed (-Infinity before the first push) */
  get peak(): number {
    return this.lifetimePeak;
  }

  /** The most recent value, or 0 when empty */
  last(): number {
    if (this.count === 0) return 0;
    return this.at(this.count - 1).value;
  }

  /** Mean of the values currently in the window, 0 when empty */
  average(): number {
    if (this.count === 0) return 0;
    let sum = 0;
    for (let i = 0; i < this.count; i++) {
      sum += this.at(i).value;
    }
    return sum / this.count;
  }

  /**
   * The most recent `n` values, oldest first
   */
  lastN(n: number): number[] {
    return this.lastNPoints(n).map((p) => p.value);
  }

  /**
   * The most recent `n` points, oldest first. Returns copies.
   */
  lastNPoints(n: number): Point[] {
    if (n <= 0 || this.count === 0) return [];

    const take = Math.min(Math.floor(n), this.count);
    const out: Point[] = [];
    for (let i = this.count - take; i < this.count; i++) {
      const p = this.at(i);
      out.push({ value: p.value, timestamp: p.timestamp });
    }
    return out;
  }

  // i-th point in chronological order (0 = oldest)
  private at(i: number): Point {
    const start = (this.head - this.count + this.capacity) % this.capacity;
    const p = this.slots[(start + i) % this.capacity];
    if (p === undefined) {
      throw new Error(`RingBuffer slot ${i} is empty (length ${this.count})`);
    }
    return p;
  }
}
