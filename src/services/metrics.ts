/**
 * Prometheus metrics
 *
 * Request, ingestion and anomaly counters exposed on /metrics.
 * Each instance owns its registry so several services (and tests) can coexist.
 */

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type Endpoint = '/metrics' | '/analyze' | '/anomalies';

export interface ServiceMetricsOptions {
  collectDefaults?: boolean;
}

export class ServiceMetrics {
  readonly registry = new Registry();

  private readonly requestsTotal: Counter<'endpoint'>;
  private readonly requestDuration: Histogram<'endpoint'>;
  private readonly anomaliesDetected: Counter;
  private readonly samplesProcessed: Counter;
  private readonly currentRate: Gauge;

  constructor(options: ServiceMetricsOptions = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.requestsTotal = new Counter({
      name: 'highload_requests_total',
      help: 'Total number of requests',
      labelNames: ['endpoint'] as const,
      registers: [this.registry],
    });

    this.requestDuration = new Histogram({
      name: 'highload_request_duration_seconds',
      help: 'Request duration in seconds',
      labelNames: ['endpoint'] as const,
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [this.registry],
    });

    this.anomaliesDetected = new Counter({
      name: 'highload_anomalies_detected_total',
      help: 'Total number of anomalies detected',
      registers: [this.registry],
    });

    this.samplesProcessed = new Counter({
      name: 'highload_metrics_processed_total',
      help: 'Total number of metrics processed',
      registers: [this.registry],
    });

    this.currentRate = new Gauge({
      name: 'highload_current_rps',
      help: 'Current RPS value',
      registers: [this.registry],
    });
  }

  /**
   * Count a request and start its latency timer. Call the returned function
   * when the response is finished.
   */
  trackRequest(endpoint: Endpoint): () => void {
    this.requestsTotal.inc({ endpoint });
    const end = this.requestDuration.startTimer({ endpoint });
    return () => {
      end();
    };
  }

  recordSampleProcessed(): void {
    this.samplesProcessed.inc();
  }

  recordAnomaly(): void {
    this.anomaliesDetected.inc();
  }

  setCurrentRate(rate: number): void {
    this.currentRate.set(rate);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  exposition(): Promise<string> {
    return this.registry.metrics();
  }
}
