import { ConsoleLogger, TestLogger, NoLogger, noLogger } from '../logger';

describe('ConsoleLogger', () => {
  let originalConsole: typeof console;
  let mockConsole: { [key: string]: jest.Mock };

  beforeEach(() => {
    originalConsole = { ...console };
    mockConsole = {
      log: jest.fn(),
      info: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
    };
    Object.assign(console, mockConsole);
  });

  afterEach(() => {
    Object.assign(console, originalConsole);
  });

  it('logs without prefix', () => {
    const logger = new ConsoleLogger();
    logger.info('test message', { data: 123 });
    expect(mockConsole.info).toHaveBeenCalledWith('test message', { data: 123 });
  });

  it('logs with prefix', () => {
    const logger = new ConsoleLogger('TestPrefix');
    logger.info('test message', { data: 123 });
    expect(mockConsole.info).toHaveBeenCalledWith('[TestPrefix] test message', { data: 123 });
  });

  it('omits data when none is given', () => {
    const logger = new ConsoleLogger('TestPrefix');
    logger.info('bare message');
    expect(mockConsole.info).toHaveBeenCalledWith('[TestPrefix] bare message');
  });

  it('logs error with prefix', () => {
    const logger = new ConsoleLogger('TestPrefix');
    logger.error('error message', new Error('test error'));
    expect(mockConsole.error).toHaveBeenCalledWith(
      '[TestPrefix] error message',
      new Error('test error'),
    );
  });

  it('logs warning with prefix', () => {
    const logger = new ConsoleLogger('TestPrefix');
    logger.warn('warning message', { warning: true });
    expect(mockConsole.warn).toHaveBeenCalledWith('[TestPrefix] warning message', {
      warning: true,
    });
  });

  it('logs debug with prefix', () => {
    const logger = new ConsoleLogger('TestPrefix');
    logger.debug('debug message', { debug: true });
    expect(mockConsole.debug).toHaveBeenCalledWith('[TestPrefix] debug message', { debug: true });
  });

  it('creates deeply nested logger', () => {
    const logger = new ConsoleLogger('Root');
    const level2 = logger.createNested('Level1').createNested('Level2');
    level2.debug('test message');
    expect(mockConsole.debug).toHaveBeenCalledWith('[Root:Level1:Level2] test message');
  });

  it('writes to an injected console', () => {
    const target = { ...console, warn: jest.fn() };
    const logger = new ConsoleLogger('Injected', target);
    logger.warn('careful');
    expect(target.warn).toHaveBeenCalledWith('[Injected] careful');
    expect(mockConsole.warn).not.toHaveBeenCalled();
  });
});

describe('TestLogger', () => {
  it('captures each level with its data', () => {
    const logger = new TestLogger();
    logger.info('info message', { data: 1 });
    logger.warn('warn message');
    logger.error('error message', 'boom');
    logger.debug('debug message', { data: 2 });
    expect(logger.getLogs()).toEqual([
      { level: 'info', message: 'info message', data: { data: 1 } },
      { level: 'warn', message: 'warn message', data: undefined },
      { level: 'error', message: 'error message', data: 'boom' },
      { level: 'debug', message: 'debug message', data: { data: 2 } },
    ]);
  });

  it('clears logs', () => {
    const logger = new TestLogger();
    logger.info('test message');
    logger.clear();
    expect(logger.getLogs()).toEqual([]);
  });

  it('shares logs between nested loggers', () => {
    const parent = new TestLogger('Parent');
    const child = parent.createNested('Child');

    parent.info('parent message');
    child.info('child message');

    expect(parent.getLogs().map((log) => log.message)).toEqual([
      'parent message',
      'child message',
    ]);
    expect(child.getLogs()).toBe(parent.getLogs());
  });

  it('keeps sharing logs after a clear', () => {
    const parent = new TestLogger('Parent');
    const child = parent.createNested('Child');
    parent.clear();
    child.debug('after clear');
    expect(parent.getLogs()).toHaveLength(1);
  });

  it('prints logs to console', () => {
    const originalLog = console.log;
    const mockLog = jest.fn();
    console.log = mockLog;

    const logger = new TestLogger('Test');
    logger.info('first');
    logger.debug('second', { n: 2 });
    logger.print();

    expect(mockLog).toHaveBeenCalledWith('[INFO] [Test] first\n[DEBUG] [Test] second {"n":2}');

    console.log = originalLog;
  });
});

describe('NoLogger', () => {
  it('silently ignores all log calls', () => {
    const originalConsole = { ...console };
    const mockInfo = jest.fn();
    const mockError = jest.fn();
    const mockWarn = jest.fn();
    const mockDebug = jest.fn();
    Object.assign(console, { info: mockInfo, error: mockError, warn: mockWarn, debug: mockDebug });

    noLogger.info('test');
    noLogger.error('test');
    noLogger.warn('test');
    noLogger.debug('test');

    expect(mockInfo).not.toHaveBeenCalled();
    expect(mockError).not.toHaveBeenCalled();
    expect(mockWarn).not.toHaveBeenCalled();
    expect(mockDebug).not.toHaveBeenCalled();

    Object.assign(console, originalConsole);
  });

  it('returns itself when nested', () => {
    expect(noLogger.createNested('test')).toBe(noLogger);
    expect(NoLogger.getInstance()).toBe(noLogger);
  });
});
