import { LokiLoggerService } from './loki-logger.service';
import winston from 'winston';
import LokiTransport from 'winston-loki';

// Mock winston and winston-loki
jest.mock('winston', () => ({
  createLogger: jest.fn().mockReturnValue({
    info: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
  }),
  transports: {
    Console: jest.fn(),
  },
  format: {
    combine: jest.fn((...args: unknown[]) => args),
    colorize: jest.fn(() => ({ mock: 'colorize' })),
    simple: jest.fn(() => ({ mock: 'simple' })),
    json: jest.fn(() => ({ mock: 'json' })),
  },
}));

jest.mock('winston-loki', () => {
  return jest.fn().mockImplementation(() => ({}));
});

describe('LokiLoggerService', () => {
  let loggerService: LokiLoggerService;
  let isoSpy: jest.SpyInstance<string, []>;
  const fixedTimestamp = '2025-01-25T16:58:54.519Z';

  const mockStack =
    'Error: Test error\n    at Object.<anonymous> (test.js:10:15)';
  const expectedLog = JSON.stringify({
    timestamp: fixedTimestamp,
    level: 'error',
    job: 'test-job',
    message: '❌ [ERROR] Test error message',
    stack: 'Error: Test error\n    (test.js:10:15)',
  });

  beforeEach(() => {
    isoSpy = jest
      .spyOn(Date.prototype, 'toISOString')
      .mockReturnValue(fixedTimestamp);
    loggerService = new LokiLoggerService('test-job', 'test-app', null);
  });

  afterEach(() => {
    isoSpy.mockRestore();
    jest.clearAllMocks();
  });

  it('should expose the app label', () => {
    expect(loggerService.app).toBe('test-app');
  });

  it('should log an info message', async () => {
    await loggerService.log('Test info message');
    expect(loggerService['logger'].info).toHaveBeenCalledWith('ℹ️ [LOG] Test info message');
  });

  it('should log a warning message', async () => {
    await loggerService.warn('Test warning message');
    expect(loggerService['logger'].warn).toHaveBeenCalledWith('⚠️ [WARN] Test warning message');
  });

  it('should log a debug message outside production', async () => {
    await loggerService.debug('Test debug message');
    expect(loggerService['logger'].debug).toHaveBeenCalledWith('🐛 [DEBUG] Test debug message');
  });

  it('should log an error message with a cleaned stack trace', async () => {
    await loggerService.error('Test error message', mockStack);
    expect(loggerService['logger'].error).toHaveBeenCalledWith(expectedLog);
  });

  it('should clean stack traces by removing node_modules and limiting depth', () => {
    const rawStack = `
      Error: Test error
          at Object.<anonymous> (/Users/test/project/node_modules/some-package/index.js:10:15)
          at Object.<anonymous> (/Users/test/project/src/test.js:5:10)
          at Module._compile (internal/modules/cjs/loader.js:1158:30)
          at Object.Module._extensions..js (internal/modules/cjs/loader.js:1178:10)
          at Module.load (internal/modules/cjs/loader.js:1002:32)
    `;
    const cleanedStack = loggerService['cleanStackTrace'](rawStack);
    expect(cleanedStack).toBe(
      'Error: Test error\n    (some-package/index.js:10:15)\n    (project/src/test.js:5:10)',
    );
  });

  it('should fall back to a console transport when no Loki host is configured', () => {
    expect(LokiTransport).not.toHaveBeenCalled();
    expect(winston.transports.Console).toHaveBeenCalledWith(
      expect.objectContaining({
        format: expect.anything(),
      }),
    );
  });

  it('should ship to Loki with job and app labels when a host is configured', () => {
    jest.clearAllMocks();

    new LokiLoggerService('test-job', 'test-app', 'http://loki.test:3100');

    expect(LokiTransport).toHaveBeenCalledWith(
      expect.objectContaining({
        host: 'http://loki.test:3100',
        labels: { job: 'test-job', app: 'test-app' },
      }),
    );
    expect(winston.transports.Console).not.toHaveBeenCalled();
  });
});
