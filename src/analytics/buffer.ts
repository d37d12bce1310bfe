/**
 * DEVICE BUFFER - BOUNDED CIRCULAR BUFFER PER DEVICE
 * ====================================================
 *
 * Holds the most recent `capacity` values for one device in arrival order.
 * Once full, each append overwrites the oldest value.
 *
 * Every method runs to completion on the event loop, so an append is never
 * observed half-done by a concurrent reader.
 */

import { windowStats } from './statistics';
import { DEFAULT_BUFFER_CAPACITY, type WindowedStatistics } from './types';

export class DeviceBuffer {
  private readonly values: number[];
  private head = 0;      // Index of next insertion
  private count = 0;

  constructor(
    readonly entityId: string,
    readonly capacity: number = DEFAULT_BUFFER_CAPACITY,
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.values = new Array<number>(capacity).fill(0);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Add a value (circular, overwrites oldest once full)
   */
  append(value: number): void {
    this.values[this.head] = value;
    this.head = (this.head + 1) % this.capacity;

    if (this.count < this.capacity) {
      this.count++;
    }
  }

  /**
   * Last `window` values, oldest first. Fewer when the buffer holds less.
   */
  snapshotWindow(window: number): number[] {
    const take = Math.min(Math.max(0, window), this.count);
    const result = new Array<number>(take);

    // Oldest retained value of the requested slice
    const first = (this.head - take + this.capacity) % this.capacity;
    for (let i = 0; i < take; i++) {
      result[i] = this.values[(first + i) % this.capacity];
    }

    return result;
  }

  toArray(): number[] {
    return this.snapshotWindow(this.count);
  }

  windowStats(window: number): WindowedStatistics {
    return windowStats(this.snapshotWindow(window), window);
  }
}
