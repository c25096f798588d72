import { LogLevel, NotifierLogger, parseLogLevel } from '../../src/notifier/utils/logger';

describe('NotifierLogger', () => {
  let info: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix messages with level, module and operation', () => {
    new NotifierLogger({ moduleName: 'notifier' }).createSubLogger('dispatcher').info('Run finished', undefined, 'run');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(/^\S+ INFO  \[notifier\.dispatcher\] \[run\] Run finished$/);
  });

  it('should share its level with sub-loggers created earlier', () => {
    const root = new NotifierLogger();
    const child = root.createSubLogger('content');

    root.setMinLevel(LogLevel.ERROR);
    child.info('hidden');
    child.error('shown', new Error('boom'));

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][0]).toContain('shown\nError: boom');
    expect(child.getMinLevel()).toBe(LogLevel.ERROR);
  });

  it('should stay quiet without console output', () => {
    new NotifierLogger({ consoleOutput: false }).error('nothing', new Error('x'));
    expect(error).not.toHaveBeenCalled();
  });

  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
