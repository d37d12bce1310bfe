import type Redis from 'ioredis';
import { RedisSampleCache, cacheKey, serializeReading } from '../../src/services/sample-cache';
import { createMockLogger } from '../helpers/mock-logger';

describe('sample cache encoding', () => {
  it('keys readings by device and timestamp', () => {
    expect(cacheKey('sensor-7', 1700000000)).toBe('metric:sensor-7:1700000000');
  });

  it('stores readings in the posted shape', () => {
    const json = serializeReading({ timestamp: 5, entityId: 'sensor-7', value: 41.5 }, { rate: 12, memory: 256 });

    expect(json).toBe('{"timestamp":5,"device_id":"sensor-7","cpu":41.5,"rps":12,"memory":256}');
  });

  it('zero-fills missing context', () => {
    expect(JSON.parse(serializeReading({ timestamp: 5, entityId: 'a', value: 1 }))).toEqual({
      timestamp: 5,
      device_id: 'a',
      cpu: 1,
      rps: 0,
      memory: 0,
    });
  });
});

describe('RedisSampleCache', () => {
  const createClient = () => ({
    set: jest.fn().mockResolvedValue('OK'),
    connect: jest.fn().mockResolvedValue(undefined),
    ping: jest.fn().mockResolvedValue('PONG'),
    disconnect: jest.fn(),
  });

  it('writes readings with a ten minute expiry by default', async () => {
    const client = createClient();
    const cache = new RedisSampleCache(client as unknown as Redis);

    await cache.store({ timestamp: 1, entityId: 'd', value: 2 });

    expect(client.set).toHaveBeenCalledWith(
      'metric:d:1',
      '{"timestamp":1,"device_id":"d","cpu":2,"rps":0,"memory":0}',
      'EX',
      600
    );
  });

  it('honours a custom expiry', async () => {
    const client = createClient();
    const cache = new RedisSampleCache(client as unknown as Redis, 30);

    await cache.store({ timestamp: 7, entityId: 'd', value: 2 }, { rate: 3, memory: 4 });

    expect(client.set).toHaveBeenCalledWith(
      'metric:d:7',
      '{"timestamp":7,"device_id":"d","cpu":2,"rps":3,"memory":4}',
      'EX',
      30
    );
  });

  it('reports a successful connection', async () => {
    const logger = createMockLogger();
    const cache = new RedisSampleCache(createClient() as unknown as Redis);

    await expect(cache.connect(logger)).resolves.toBe(true);
    expect(logger.info).toHaveBeenCalledWith('Successfully connected to Redis');
  });

  it('continues without Redis when the first connection fails', async () => {
    const logger = createMockLogger();
    const client = createClient();
    client.connect.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const cache = new RedisSampleCache(client as unknown as Redis);

    await expect(cache.connect(logger)).resolves.toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Redis connection failed, continuing without Redis', {
      error: 'connect ECONNREFUSED',
    });
  });

  it('answers health pings', async () => {
    const client = createClient();
    const cache = new RedisSampleCache(client as unknown as Redis);

    await expect(cache.ping()).resolves.toBe(true);

    client.ping.mockRejectedValue(new Error('Connection is closed.'));
    await expect(cache.ping()).resolves.toBe(false);
  });
});
