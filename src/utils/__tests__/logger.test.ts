import { configureLogging, createLogger, isLogLevel } from '../logger';

describe('logger', () => {
  test('recognises pino level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  test('module loggers keep working after reconfiguration', () => {
    const logger = createLogger('logger-test');

    expect(() => logger.info('before', { step: 1 })).not.toThrow();
    configureLogging({ level: 'debug' });
    expect(() => logger.debug('after')).not.toThrow();
    expect(() => logger.fatal('still fine', { step: 2 })).not.toThrow();
  });
});
