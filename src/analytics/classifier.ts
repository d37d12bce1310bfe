/**
 * ANOMALY CLASSIFIER - Z-SCORE
 * =============================
 *
 * Scores a sample against its device's window. The sample is expected to be
 * in the buffer already, so it contributes to its own mean and deviation.
 */

import type { BufferRegistry } from './registry';
import { EMPTY_STATISTICS } from './statistics';
import {
  DEFAULT_WINDOW_SIZE,
  ZSCORE_THRESHOLD,
  type AnalyticsResult,
  type WindowedStatistics,
} from './types';

export interface Score {
  zScore: number;
  isAnomaly: boolean;
}

/**
 * z = (value - mean) / stdDev, or 0 when the window cannot give a deviation
 * (fewer than two samples, or all samples equal).
 */
export function scoreValue(value: number, stats: WindowedStatistics): Score {
  if (stats.sampleCount < 2 || stats.stdDev === 0) {
    return { zScore: 0, isAnomaly: false };
  }

  const zScore = (value - stats.mean) / stats.stdDev;
  return {
    zScore,
    isAnomaly: Math.abs(zScore) > ZSCORE_THRESHOLD,
  };
}

export class AnomalyClassifier {
  constructor(
    private readonly registry: BufferRegistry,
    private readonly windowSize: number = DEFAULT_WINDOW_SIZE,
  ) {}

  /**
   * Read-only: never creates a buffer for an unseen device.
   */
  classify(entityId: string, value: number, timestamp: number): AnalyticsResult {
    const buffer = this.registry.get(entityId);
    const stats = buffer ? buffer.windowStats(this.windowSize) : EMPTY_STATISTICS;
    const { zScore, isAnomaly } = scoreValue(value, stats);

    return {
      entityId,
      rollingAverage: stats.mean,
      zScore,
      isAnomaly,
      timestamp,
      value,
    };
  }
}
