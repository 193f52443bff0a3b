import { LogEntry, LogLevel, createLogger, setLogHandler, setLogLevel } from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    setLogHandler();
    setLogLevel(LogLevel.Info);
  });

  test('child loggers merge their context over the parent', () => {
    const log = createLogger({ component: 'test', module: 'a' }).child({ module: 'b' });
    log.info('hello', { runId: 'run-1' });

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe(LogLevel.Info);
    expect(entries[0].message).toBe('hello');
    expect(entries[0].context).toEqual({ component: 'test', module: 'b', runId: 'run-1' });
  });

  test('messages below the minimum level are dropped', () => {
    const log = createLogger();
    log.debug('hidden');
    setLogLevel(LogLevel.Warn);
    log.info('also hidden');
    log.warn('shown');
    log.error('shown too');

    expect(entries.map((entry) => entry.message)).toEqual(['shown', 'shown too']);
  });

  test('the default sink writes one JSON line per entry', () => {
    setLogHandler();
    const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    createLogger({ module: 'sink' }).warn('careful', { n: 1 });

    expect(spy).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line).toMatchObject({ level: 'warn', msg: 'careful', module: 'sink', n: 1 });
    spy.mockRestore();
  });
});
