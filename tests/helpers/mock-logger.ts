import type { ServiceLogger } from '../../src/utils/logger';

export function createMockLogger(): jest.Mocked<ServiceLogger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };
}
