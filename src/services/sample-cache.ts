/**
 * Sample cache
 *
 * Short-lived Redis copy of every accepted reading, keyed by device and
 * timestamp. Best effort: callers log failures and carry on.
 */

import Redis from 'ioredis';
import type { IngestContext, Sample } from '../analytics/types';
import { errorMessage, type ServiceLogger } from '../utils/logger';

export const DEFAULT_CACHE_TTL_SECONDS = 600;

export interface SampleCache {
  store(sample: Sample, context?: IngestContext): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export interface RedisCacheOptions {
  host: string;
  port: number;
  password?: string;
  ttlSeconds?: number;
}

export function cacheKey(entityId: string, timestamp: number): string {
  return `metric:${entityId}:${timestamp}`;
}

/**
 * Cached record, in the same shape devices post it
 */
export function serializeReading(sample: Sample, context: IngestContext = {}): string {
  return JSON.stringify({
    timestamp: sample.timestamp,
    device_id: sample.entityId,
    cpu: sample.value,
    rps: context.rate ?? 0,
    memory: context.memory ?? 0,
  });
}

export class RedisSampleCache implements SampleCache {
  constructor(
    private readonly client: Redis,
    private readonly ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS,
  ) {}

  /**
   * Build a client that fails commands fast while Redis is unreachable
   * instead of queueing them.
   */
  static create(options: RedisCacheOptions, logger: ServiceLogger): RedisSampleCache {
    const client = new Redis({
      host: options.host,
      port: options.port,
      password: options.password,
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
    });

    client.on('error', (error: Error) => {
      logger.debug('Redis client error', { error: error.message });
    });

    return new RedisSampleCache(client, options.ttlSeconds);
  }

  /**
   * Returns false when the first connection attempt fails.
   * The client keeps reconnecting in the background.
   */
  async connect(logger: ServiceLogger): Promise<boolean> {
    try {
      await this.client.connect();
      await this.client.ping();
      logger.info('Successfully connected to Redis');
      return true;
    } catch (error: unknown) {
      logger.warn('Redis connection failed, continuing without Redis', {
        error: errorMessage(error),
      });
      return false;
    }
  }

  async store(sample: Sample, context?: IngestContext): Promise<void> {
    await this.client.set(
      cacheKey(sample.entityId, sample.timestamp),
      serializeReading(sample, context),
      'EX',
      this.ttlSeconds,
    );
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.ping();
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    this.client.disconnect();
  }
}
