/**
 * ANOMALY EVENT QUEUE - BOUNDED, LOSSY
 * =====================================
 *
 * Fixed-capacity FIFO between classification tasks and whoever lists anomalies.
 * Producers never wait: when the queue is full the result is dropped.
 */

import { setImmediate as nextTick } from 'timers/promises';
import { DEFAULT_EVENT_QUEUE_CAPACITY, type AnalyticsResult } from './types';

export class AnomalyEventQueue {
  private readonly slots: Array<AnalyticsResult | undefined>;
  private head = 0;      // Index of oldest entry
  private count = 0;
  private dropped = 0;

  constructor(readonly capacity: number = DEFAULT_EVENT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<AnalyticsResult | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  /**
   * Results discarded because the queue was full
   */
  get droppedCount(): number {
    return this.dropped;
  }

  tryEnqueue(result: AnalyticsResult): boolean {
    if (this.count === this.capacity) {
      this.dropped++;
      return false;
    }

    this.slots[(this.head + this.count) % this.capacity] = result;
    this.count++;
    return true;
  }

  /**
   * Remove and return the oldest entry, if any
   */
  poll(): AnalyticsResult | undefined {
    if (this.count === 0) {
      return undefined;
    }

    const result = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return result;
  }

  /**
   * Collect everything queued right now, then keep collecting what arrives
   * while the deadline has not passed. Stops at the first read that finds
   * nothing ready, so it rarely waits the full `maxWaitMs`.
   *
   * Between reads the loop yields one event-loop turn, letting already
   * scheduled producers run.
   */
  async drain(maxWaitMs: number): Promise<AnalyticsResult[]> {
    const drained: AnalyticsResult[] = [];
    const deadline = Date.now() + Math.max(0, maxWaitMs);

    for (;;) {
      const batchStart = drained.length;
      let next = this.poll();
      while (next !== undefined) {
        drained.push(next);
        next = this.poll();
      }

      if (drained.length === batchStart || Date.now() >= deadline) {
        return drained;
      }

      await nextTick();
    }
  }
}
