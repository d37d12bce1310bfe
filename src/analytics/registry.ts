/**
 * BUFFER REGISTRY
 * ================
 *
 * Owns the device id -> DeviceBuffer mapping. Buffers are created on first
 * write and never removed, so the map grows with the number of devices seen.
 */

import { DeviceBuffer } from './buffer';
import { DEFAULT_BUFFER_CAPACITY } from './types';

export class BufferRegistry {
  private readonly buffers = new Map<string, DeviceBuffer>();

  constructor(private readonly bufferCapacity: number = DEFAULT_BUFFER_CAPACITY) {}

  /**
   * Get or create the buffer for a device.
   * Lookup and insert happen in one synchronous step, so racing callers
   * always end up with the same instance.
   */
  getOrCreate(entityId: string): DeviceBuffer {
    let buffer = this.buffers.get(entityId);
    if (!buffer) {
      buffer = new DeviceBuffer(entityId, this.bufferCapacity);
      this.buffers.set(entityId, buffer);
    }
    return buffer;
  }

  get(entityId: string): DeviceBuffer | undefined {
    return this.buffers.get(entityId);
  }

  has(entityId: string): boolean {
    return this.buffers.has(entityId);
  }

  get size(): number {
    return this.buffers.size;
  }

  entityIds(): string[] {
    return Array.from(this.buffers.keys());
  }
}
