import { LoggerService } from '../../src/shared/types';

export function createTestLogger(): LoggerService {
  return {
    app: 'test-app',
    log: jest.fn().mockResolvedValue(undefined),
    warn: jest.fn().mockResolvedValue(undefined),
    debug: jest.fn().mockResolvedValue(undefined),
    error: jest.fn().mockResolvedValue(undefined),
  };
}
