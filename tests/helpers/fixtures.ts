import type { AnalyticsResult } from '../../src/analytics/types';

export function createResult(overrides: Partial<AnalyticsResult> = {}): AnalyticsResult {
  return {
    entityId: 'device-1',
    rollingAverage: 10,
    zScore: 0,
    isAnomaly: false,
    timestamp: 1700000000,
    value: 10,
    ...overrides,
  };
}
