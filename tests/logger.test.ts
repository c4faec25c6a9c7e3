import { LogEntry, LogLevel, Logger, configureLogging, describeError, formatEntry, logger } from '../src/logger';

describe('Logger', () => {
  const entries: LogEntry[] = [];

  beforeEach(() => {
    entries.length = 0;
    configureLogging({ level: LogLevel.Info, sink: (entry) => entries.push(entry) });
  });

  afterAll(() => configureLogging({ level: LogLevel.Info, sink: null }));

  test('children carry the service name and their own context', () => {
    logger.child({ module: 'artifact-store' }).info('Artifact stored', { id: 'a1' });

    expect(entries).toHaveLength(1);
    expect(entries[0].context).toEqual({ service: 'md-render-service', module: 'artifact-store', id: 'a1' });
  });

  test('drops entries below the configured level', () => {
    const log = new Logger();
    log.debug('hidden');
    configureLogging({ level: LogLevel.Warn });
    log.info('hidden too');
    log.warn('shown');

    expect(entries.map((entry) => entry.message)).toEqual(['shown']);
  });
});

describe('describeError', () => {
  test('keeps message, name and code of error-like values', () => {
    const err = Object.assign(new Error('no such file'), { code: 'ENOENT' });

    expect(describeError(err)).toMatchObject({ message: 'no such file', name: 'Error', code: 'ENOENT' });
  });

  test('works on plain objects from another realm', () => {
    expect(describeError({ message: 'boom', code: 5 })).toEqual({ message: 'boom', code: 5 });
  });

  test('stringifies anything else', () => {
    expect(describeError('bare string')).toEqual({ message: 'bare string' });
  });
});

describe('formatEntry', () => {
  test('writes one JSON line with err expanded', () => {
    const line = formatEntry({
      level: LogLevel.Error,
      message: 'Expiry sweep failed',
      context: { module: 'artifact-store', err: { message: 'EIO' } },
      timestamp: '2026-01-01T00:00:00.000Z',
    });

    expect(JSON.parse(line)).toEqual({
      time: '2026-01-01T00:00:00.000Z',
      level: 'error',
      msg: 'Expiry sweep failed',
      module: 'artifact-store',
      err: { message: 'EIO' },
    });
  });
});
