/**
 * ROLLING STATISTICS
 * ===================
 *
 * Mean and population standard deviation over the last W values of a series.
 */

import type { WindowedStatistics } from './types';

export const EMPTY_STATISTICS: Readonly<WindowedStatistics> = Object.freeze({
  mean: 0,
  stdDev: 0,
  sampleCount: 0,
});

/**
 * Compute statistics over values[max(0, n - window):n].
 *
 * An empty slice yields zeros and a single value has a standard deviation of 0.
 * Variance divides by the sample count (population formula).
 */
export function windowStats(values: readonly number[], window: number): WindowedStatistics {
  if (!Number.isInteger(window) || window <= 0) {
    throw new RangeError(`Window size must be a positive integer, got ${window}`);
  }

  const start = Math.max(0, values.length - window);
  const count = values.length - start;

  if (count === 0) {
    return { ...EMPTY_STATISTICS };
  }

  let sum = 0;
  for (let i = start; i < values.length; i++) {
    sum += values[i];
  }
  const mean = sum / count;

  if (count === 1) {
    return { mean, stdDev: 0, sampleCount: 1 };
  }

  let variance = 0;
  for (let i = start; i < values.length; i++) {
    const diff = values[i] - mean;
    variance += diff * diff;
  }
  variance /= count;

  return {
    mean,
    stdDev: Math.sqrt(variance),
    sampleCount: count,
  };
}
