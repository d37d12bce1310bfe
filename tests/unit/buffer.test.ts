import { DeviceBuffer } from '../../src/analytics/buffer';
import { BufferRegistry } from '../../src/analytics/registry';

describe('DeviceBuffer', () => {
  it('keeps the most recent values in arrival order after each append', () => {
    const buffer = new DeviceBuffer('device-1', 3);
    const appended: number[] = [];

    for (let i = 1; i <= 7; i++) {
      buffer.append(i);
      appended.push(i);

      expect(buffer.size).toBe(Math.min(appended.length, 3));
      expect(buffer.toArray()).toEqual(appended.slice(-3));
    }
  });

  it('evicts past the default capacity of 1000', () => {
    const buffer = new DeviceBuffer('device-1');
    for (let i = 0; i < 1005; i++) {
      buffer.append(i);
    }

    const values = buffer.toArray();
    expect(buffer.capacity).toBe(1000);
    expect(values).toHaveLength(1000);
    expect(values[0]).toBe(5);
    expect(values[999]).toBe(1004);
  });

  it('returns the requested window, oldest first', () => {
    const buffer = new DeviceBuffer('device-1', 3);
    [1, 2, 3, 4, 5].forEach(v => buffer.append(v));

    expect(buffer.snapshotWindow(2)).toEqual([4, 5]);
    expect(buffer.snapshotWindow(10)).toEqual([3, 4, 5]);
    expect(buffer.snapshotWindow(0)).toEqual([]);
  });

  it('computes statistics over the window', () => {
    const buffer = new DeviceBuffer('device-1', 10);
    [1, 2, 3].forEach(v => buffer.append(v));

    expect(buffer.windowStats(2)).toEqual({ mean: 2.5, stdDev: 0.5, sampleCount: 2 });
  });

  it('starts empty', () => {
    const buffer = new DeviceBuffer('device-1', 5);
    expect(buffer.size).toBe(0);
    expect(buffer.windowStats(50)).toEqual({ mean: 0, stdDev: 0, sampleCount: 0 });
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new DeviceBuffer('device-1', 0)).toThrow(RangeError);
  });
});

describe('BufferRegistry', () => {
  it('creates a buffer once per device', () => {
    const registry = new BufferRegistry(10);

    const first = registry.getOrCreate('device-1');
    const second = registry.getOrCreate('device-1');

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
    expect(first.capacity).toBe(10);
  });

  it('hands concurrent callers the same buffer', async () => {
    const registry = new BufferRegistry();

    const buffers = await Promise.all(
      Array.from({ length: 25 }, () => Promise.resolve().then(() => registry.getOrCreate('x')))
    );

    expect(new Set(buffers).size).toBe(1);
    expect(registry.size).toBe(1);
    expect(registry.entityIds()).toEqual(['x']);
  });

  it('does not create buffers on lookup', () => {
    const registry = new BufferRegistry();

    expect(registry.get('missing')).toBeUndefined();
    expect(registry.has('missing')).toBe(false);
    expect(registry.size).toBe(0);
  });
});
