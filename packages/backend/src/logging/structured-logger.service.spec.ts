import { StructuredLoggerService } from './structured-logger.service';

describe('StructuredLoggerService', () => {
  const originalLevel = process.env.LOG_LEVEL;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  const lastEntry = (spy: jest.SpyInstance): Record<string, unknown> => {
    const [line] = spy.mock.calls[spy.mock.calls.length - 1];
    return JSON.parse(String(line));
  };

  beforeEach(() => {
    process.env.LOG_LEVEL = 'info';
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  it('should write one JSON line per entry', () => {
    const logger = new StructuredLoggerService().setContext('ChatController').setCorrelationId('corr-1');

    logger.log('Turn processed', { sessionId: 'session-1', duration: 120 });

    expect(lastEntry(logSpy)).toMatchObject({
      level: 'info',
      message: 'Turn processed',
      service: 'ChatController',
      correlationId: 'corr-1',
      sessionId: 'session-1',
      duration: 120,
    });
  });

  it('should treat a string context as the service name', () => {
    new StructuredLoggerService().log('Mapped route', 'RouterExplorer');

    expect(lastEntry(logSpy).service).toBe('RouterExplorer');
  });

  it('should include the trace on errors', () => {
    new StructuredLoggerService().error('Failed', 'Error: boom\n    at x');

    expect(lastEntry(errorSpy)).toMatchObject({ level: 'error', message: 'Failed', trace: 'Error: boom\n    at x' });
  });

  it('should drop entries below LOG_LEVEL', () => {
    new StructuredLoggerService().debug('details');

    expect(debugSpy).not.toHaveBeenCalled();
  });

  it('should carry context into child loggers', () => {
    const parent = new StructuredLoggerService().setContext('ChatController');

    parent.child({ correlationId: 'corr-2', sessionId: 'session-9' }).warn('Client disconnected');

    expect(lastEntry(warnSpy)).toMatchObject({
      level: 'warn',
      service: 'ChatController',
      correlationId: 'corr-2',
      sessionId: 'session-9',
    });
  });

  it('should omit undefined values', () => {
    new StructuredLoggerService().log('hello', { sessionId: undefined });

    expect(Object.keys(lastEntry(logSpy))).not.toContain('sessionId');
  });

  it('should log and return the duration of a timed operation', () => {
    jest.useFakeTimers({ now: new Date('2024-01-01T00:00:00.000Z') });
    const logger = new StructuredLoggerService().setContext('ChatController');

    const done = logger.startTimer('turn', { sessionId: 'session-1' });
    jest.advanceTimersByTime(250);
    const duration = done({ completion: true });

    expect(duration).toBe(250);
    expect(lastEntry(logSpy)).toMatchObject({
      level: 'info',
      message: 'Completed: turn',
      sessionId: 'session-1',
      completion: true,
      duration: 250,
    });
  });
});
