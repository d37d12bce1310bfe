/**
 * TELEMETRY ANALYTICS - TYPE DEFINITIONS
 * ========================================
 *
 * Per-device rolling statistics and z-score classification of telemetry samples
 */

/**
 * A single numeric reading for one device
 */
export interface Sample {
  timestamp: number;        // Unix timestamp (seconds)
  entityId: string;         // Device the reading belongs to
  value: number;
}

/**
 * Optional extras carried alongside a sample on ingestion.
 * Not analysed, only cached and exported as metrics.
 */
export interface IngestContext {
  rate?: number;            // Requests per second reported by the device
  memory?: number;
}

/**
 * Mean and population standard deviation over the most recent window of samples
 */
export interface WindowedStatistics {
  mean: number;
  stdDev: number;
  sampleCount: number;
}

/**
 * Classification of one ingested sample
 */
export interface AnalyticsResult {
  entityId: string;
  rollingAverage: number;
  zScore: number;
  isAnomaly: boolean;
  timestamp: number;
  value: number;
}

export type IngestOutcome =
  | { status: 'accepted' }
  | { status: 'rejected'; reason: string; field?: string };

export interface RollingAverageReport {
  entityId: string;
  rollingAverage: number;
  windowSize: number;
}

export interface AnomalyReport {
  count: number;
  anomalies: AnalyticsResult[];
}

export const DEFAULT_BUFFER_CAPACITY = 1000;
export const DEFAULT_WINDOW_SIZE = 50;
export const DEFAULT_EVENT_QUEUE_CAPACITY = 100;
export const DEFAULT_DRAIN_TIMEOUT_MS = 100;

/**
 * |z| above this marks a sample as anomalous. Fixed, not configurable.
 */
export const ZSCORE_THRESHOLD = 2.0;
