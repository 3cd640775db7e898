import { ConsoleLogger, parseLogLevel } from '../../../src/adapters/sys/ConsoleLogger';

describe('ConsoleLogger', () => {
  let debugSpy: jest.SpyInstance;
  let infoSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => {});
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('debug logs message and meta when the level allows it', () => {
    const logger = new ConsoleLogger({ level: 'debug' });
    logger.debug('hello', { a: 1 });
    expect(debugSpy).toHaveBeenCalledWith('hello {"a":1}');
  });

  test('debug is suppressed at the default info level', () => {
    const logger = new ConsoleLogger();
    logger.debug('hidden');
    expect(debugSpy).not.toHaveBeenCalled();
  });

  test('info logs message only when no meta', () => {
    new ConsoleLogger().info('world');
    expect(infoSpy).toHaveBeenCalledWith('world');
  });

  test('warn threshold drops info but keeps warn and error', () => {
    const logger = new ConsoleLogger({ level: 'warn' });
    logger.info('quiet');
    logger.warn('careful');
    logger.error('oops', { reason: 'bad' });

    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('careful');
    expect(errorSpy).toHaveBeenCalledWith('oops {"reason":"bad"}');
  });

  test('empty meta is not appended', () => {
    new ConsoleLogger().warn('plain', {});
    expect(warnSpy).toHaveBeenCalledWith('plain');
  });
});

describe('parseLogLevel', () => {
  test('accepts known levels case-insensitively', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
  });

  test('falls back for unknown or missing values', () => {
    expect(parseLogLevel(undefined)).toBe('info');
    expect(parseLogLevel('verbose', 'error')).toBe('error');
  });
});
