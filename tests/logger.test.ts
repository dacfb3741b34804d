import { createLogger, describeError, LogEntry, LogLevel, resetLogging, setLogHandler, setLogLevel } from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    resetLogging();
  });

  test('suppresses entries below the minimum level', () => {
    const log = createLogger();
    log.debug('hidden');
    log.info('shown');
    expect(entries.map((e) => e.message)).toEqual(['shown']);

    setLogLevel(LogLevel.Debug);
    log.debug('now shown');
    expect(entries.map((e) => e.message)).toEqual(['shown', 'now shown']);
  });

  test('child loggers merge their context over the parent', () => {
    const log = createLogger({ component: 'test', scope: 'parent' }).child({ scope: 'child' });
    log.warn('careful', { path: '/x' });
    expect(entries[0].level).toBe(LogLevel.Warn);
    expect(entries[0].context).toEqual({ component: 'test', scope: 'child', path: '/x' });
  });

  test('the default handler writes JSON to the console stream matching the level', () => {
    resetLogging();
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      const log = createLogger({ component: 'test' });
      log.warn('careful', { path: '/x' });
      log.error('failed');

      expect(warn).toHaveBeenCalledTimes(1);
      const written = JSON.parse(String(warn.mock.calls[0][0]));
      expect(written).toMatchObject({ level: 'warn', msg: 'careful', component: 'test', path: '/x' });
      expect(typeof written.ts).toBe('string');
      expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({ level: 'error', msg: 'failed' });
      expect(entries).toEqual([]);
    } finally {
      warn.mockRestore();
      error.mockRestore();
    }
  });

  test('describeError', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('Unknown error');
  });
});
