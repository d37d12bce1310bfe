/**
 * Service configuration
 *
 * Loaded from environment variables (dotenv populates them from .env).
 */

import {
  DEFAULT_BUFFER_CAPACITY,
  DEFAULT_DRAIN_TIMEOUT_MS,
  DEFAULT_EVENT_QUEUE_CAPACITY,
  DEFAULT_WINDOW_SIZE,
} from './analytics/types';
import { DEFAULT_CACHE_TTL_SECONDS } from './services/sample-cache';

export interface ServiceConfig {
  port: number;
  host: string;
  redis: {
    host: string;
    port: number;
    password?: string;
  };
  analytics: {
    bufferCapacity: number;
    windowSize: number;
    eventQueueCapacity: number;
    drainTimeoutMs: number;
  };
  cacheTtlSeconds: number;
}

/**
 * Split "host:port". The port defaults to 6379 when omitted.
 */
export function parseRedisAddress(address: string): { host: string; port: number } {
  const separator = address.lastIndexOf(':');
  if (separator === -1) {
    return { host: address, port: 6379 };
  }
  return {
    host: address.slice(0, separator) || 'localhost',
    port: Number(address.slice(separator + 1)),
  };
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const redisAddress = parseRedisAddress(env.REDIS_ADDR || 'localhost:6379');

  return {
    port: Number(env.PORT || '8080'),
    host: env.HOST || '0.0.0.0',
    redis: {
      ...redisAddress,
      password: env.REDIS_PASSWORD || undefined,
    },
    analytics: {
      bufferCapacity: Number(env.BUFFER_CAPACITY || String(DEFAULT_BUFFER_CAPACITY)),
      windowSize: Number(env.WINDOW_SIZE || String(DEFAULT_WINDOW_SIZE)),
      eventQueueCapacity: Number(env.EVENT_QUEUE_CAPACITY || String(DEFAULT_EVENT_QUEUE_CAPACITY)),
      drainTimeoutMs: Number(env.DRAIN_TIMEOUT_MS || String(DEFAULT_DRAIN_TIMEOUT_MS)),
    },
    cacheTtlSeconds: Number(env.CACHE_TTL_SECONDS || String(DEFAULT_CACHE_TTL_SECONDS)),
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function validateConfig(config: ServiceConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('PORT must be between 0 and 65535');
  }

  if (!Number.isInteger(config.redis.port) || config.redis.port <= 0 || config.redis.port > 65535) {
    errors.push('REDIS_ADDR must be host:port with a valid port');
  }

  if (!isPositiveInteger(config.analytics.bufferCapacity)) {
    errors.push('BUFFER_CAPACITY must be a positive integer');
  }

  if (!isPositiveInteger(config.analytics.windowSize)) {
    errors.push('WINDOW_SIZE must be a positive integer');
  }

  if (!isPositiveInteger(config.analytics.eventQueueCapacity)) {
    errors.push('EVENT_QUEUE_CAPACITY must be a positive integer');
  }

  if (!Number.isInteger(config.analytics.drainTimeoutMs) || config.analytics.drainTimeoutMs < 0) {
    errors.push('DRAIN_TIMEOUT_MS must be non-negative');
  }

  if (!isPositiveInteger(config.cacheTtlSeconds)) {
    errors.push('CACHE_TTL_SECONDS must be a positive integer');
  }

  return errors;
}

export function getConfigSummary(config: ServiceConfig): string {
  return `
Telemetry Analytics Configuration:
  Listen: ${config.host}:${config.port}
  Redis: ${config.redis.host}:${config.redis.port}
  Buffer Capacity: ${config.analytics.bufferCapacity}
  Window Size: ${config.analytics.windowSize}
  Event Queue Capacity: ${config.analytics.eventQueueCapacity}
  Drain Timeout: ${config.analytics.drainTimeoutMs}ms
  Cache TTL: ${config.cacheTtlSeconds}s
  `.trim();
}
