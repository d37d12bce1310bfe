import 'dotenv/config';
import type { Server } from 'http';
import {
  AnomalyEventQueue,
  BufferRegistry,
  TelemetryAnalyticsService,
} from './analytics';
import { createApp } from './app';
import { getConfigSummary, loadConfigFromEnv, validateConfig } from './config';
import { BackgroundTaskRunner } from './services/background-tasks';
import { ServiceMetrics } from './services/metrics';
import { RedisSampleCache } from './services/sample-cache';
import { errorMessage, logger } from './utils/logger';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function start(): Promise<void> {
  logger.info('Starting Telemetry Analytics Service');

  const config = loadConfigFromEnv();
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    logger.error('Invalid configuration', { errors: configErrors });
    process.exit(1);
  }
  logger.info(getConfigSummary(config));

  const cache = RedisSampleCache.create(
    { ...config.redis, ttlSeconds: config.cacheTtlSeconds },
    logger
  );
  await cache.connect(logger);

  const metrics = new ServiceMetrics({ collectDefaults: true });
  const tasks = new BackgroundTaskRunner(logger);
  const service = new TelemetryAnalyticsService({
    registry: new BufferRegistry(config.analytics.bufferCapacity),
    queue: new AnomalyEventQueue(config.analytics.eventQueueCapacity),
    tasks,
    logger,
    cache,
    metrics,
    windowSize: config.analytics.windowSize,
    drainTimeoutMs: config.analytics.drainTimeoutMs,
  });

  const app = createApp({ service, logger, metrics, cache });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Telemetry Analytics Service listening on ${config.host}:${config.port}`);
    logger.info('Endpoints: /api/metrics (POST), /api/analyze (GET), /api/anomalies (GET), /health (GET), /metrics (Prometheus)');
  });

  server.on('error', (error: Error) => {
    logger.error('HTTP server error', { error: error.message });
    process.exit(1);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`);

    try {
      await closeServer(server);
      await tasks.idle();
      await cache.close();
      process.exit(0);
    } catch (error: unknown) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

start().catch((error: unknown) => {
  logger.error('Failed to start service', { error: errorMessage(error) });
  process.exit(1);
});
