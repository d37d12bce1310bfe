/**
 * TELEMETRY ANALYTICS SERVICE - MAIN ORCHESTRATOR
 * =================================================
 *
 * Ingestion appends to the device buffer right away and hands caching and
 * classification to background tasks. Classification results go to a bounded
 * queue that the anomaly listing drains.
 */

import type { SampleCache } from '../services/sample-cache';
import type { BackgroundTaskRunner } from '../services/background-tasks';
import type { ServiceMetrics } from '../services/metrics';
import { errorMessage, type ServiceLogger } from '../utils/logger';
import { AnomalyClassifier } from './classifier';
import { ValidationError } from './errors';
import type { AnomalyEventQueue } from './event-queue';
import type { BufferRegistry } from './registry';
import {
  DEFAULT_DRAIN_TIMEOUT_MS,
  DEFAULT_WINDOW_SIZE,
  type AnalyticsResult,
  type AnomalyReport,
  type IngestContext,
  type IngestOutcome,
  type RollingAverageReport,
  type Sample,
} from './types';
import { parseTelemetryPayload, toIngestContext, toSample, validateSample } from './validation';

export interface TelemetryAnalyticsOptions {
  registry: BufferRegistry;
  queue: AnomalyEventQueue;
  tasks: BackgroundTaskRunner;
  logger: ServiceLogger;
  cache?: SampleCache;
  metrics?: ServiceMetrics;
  windowSize?: number;
  drainTimeoutMs?: number;
}

export class TelemetryAnalyticsService {
  readonly windowSize: number;

  private readonly registry: BufferRegistry;
  private readonly queue: AnomalyEventQueue;
  private readonly tasks: BackgroundTaskRunner;
  private readonly classifier: AnomalyClassifier;
  private readonly logger: ServiceLogger;
  private readonly cache?: SampleCache;
  private readonly metrics?: ServiceMetrics;
  private readonly drainTimeoutMs: number;

  constructor(options: TelemetryAnalyticsOptions) {
    this.registry = options.registry;
    this.queue = options.queue;
    this.tasks = options.tasks;
    this.logger = options.logger;
    this.cache = options.cache;
    this.metrics = options.metrics;
    this.windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    this.classifier = new AnomalyClassifier(this.registry, this.windowSize);
  }

  /**
   * Accept a sample. Returns before caching or classification run.
   */
  ingest(sample: Sample, context: IngestContext = {}): IngestOutcome {
    try {
      validateSample(sample);
    } catch (error: unknown) {
      return rejection(error);
    }

    this.registry.getOrCreate(sample.entityId).append(sample.value);

    this.metrics?.recordSampleProcessed();
    if (context.rate !== undefined) {
      this.metrics?.setCurrentRate(context.rate);
    }

    const cache = this.cache;
    if (cache) {
      this.tasks.submit('cache-sample', async () => {
        try {
          await cache.store(sample, context);
        } catch (error: unknown) {
          this.logger.warn('Failed to cache sample', {
            deviceId: sample.entityId,
            timestamp: sample.timestamp,
            error: errorMessage(error),
          });
        }
      });
    }

    this.tasks.submit('classify-sample', () => {
      this.analyze(sample);
    });

    return { status: 'accepted' };
  }

  /**
   * Parse an untrusted telemetry body and ingest it
   */
  ingestPayload(body: unknown): IngestOutcome {
    try {
      const payload = parseTelemetryPayload(body);
      return this.ingest(toSample(payload), toIngestContext(payload));
    } catch (error: unknown) {
      return rejection(error);
    }
  }

  queryRollingAverage(entityId: string): RollingAverageReport {
    if (!entityId) {
      throw new ValidationError('device_id parameter is required', 'entityId');
    }

    const buffer = this.registry.get(entityId);
    const rollingAverage = buffer ? buffer.windowStats(this.windowSize).mean : 0;

    return {
      entityId,
      rollingAverage,
      windowSize: this.windowSize,
    };
  }

  /**
   * Drain the event queue. Each call only sees results queued since the previous one.
   */
  async listAnomalies(): Promise<AnomalyReport> {
    const anomalies = await this.queue.drain(this.drainTimeoutMs);
    return {
      count: anomalies.length,
      anomalies,
    };
  }

  private analyze(sample: Sample): AnalyticsResult {
    const result = this.classifier.classify(sample.entityId, sample.value, sample.timestamp);

    if (result.isAnomaly) {
      this.metrics?.recordAnomaly();
      this.logger.warn('Anomaly detected', {
        deviceId: result.entityId,
        value: result.value,
        zScore: Number(result.zScore.toFixed(2)),
      });
    }

    if (!this.queue.tryEnqueue(result)) {
      this.logger.debug('Event queue full, dropping analytics result', {
        deviceId: result.entityId,
        timestamp: result.timestamp,
      });
    }

    return result;
  }
}

function rejection(error: unknown): IngestOutcome {
  if (error instanceof ValidationError) {
    return { status: 'rejected', reason: error.message, field: error.field };
  }
  throw error;
}

export { BufferRegistry } from './registry';
export { DeviceBuffer } from './buffer';
export { AnomalyEventQueue } from './event-queue';
export { AnomalyClassifier, scoreValue } from './classifier';
export { windowStats } from './statistics';
export { ValidationError } from './errors';
export * from './types';
