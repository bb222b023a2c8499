import { RingBuffer, assertCapacity } from './ring-buffer.js';

/**
 * Histories for all sensors of one monitoring session.
 * Buffers are created lazily on the first reading for a key and never dropped.
 */
export class SeriesStore {
  readonly capacity: number;
  private readonly buffers = new Map<string, RingBuffer>();

  constructor(capacity: number) {
    assertCapacity(capacity);
    this.capacity = capacity;
  }

  /** Add a reading for the given sensor key */
  record(key: string, value: number, timestamp?: Date): void {
    let buffer = this.buffers.get(key);
    if (!buffer) {
      buffer = new RingBuffer(this.capacity);
      this.buffers.set(key, buffer);
    }
    buffer.push(value, timestamp);
  }

  get(key: string): RingBuffer | undefined {
    return this.buffers.get(key);
  }

  /** Keys in first-recorded order */
  keys(): string[] {
    return Array.from(this.buffers.keys());
  }

  get size(): number {
    return this.buffers.size;
  }
}
