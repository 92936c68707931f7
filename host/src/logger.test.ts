import { Logger, LogLevel, getLogger } from './logger';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

describe('Logger', () => {
  let testLogFile: string;
  let logger: Logger;

  beforeEach(() => {
    testLogFile = path.join(os.tmpdir(), `mic-remote-test-${Date.now()}-${Math.random().toString(36).slice(2)}.log`);
    logger = new Logger({
      level: LogLevel.DEBUG,
      enableConsole: false,
      enableFile: true,
      logFile: testLogFile,
      maxFileSize: 1024 * 1024, // 1MB
      maxBackups: 2
    });
  });

  afterEach(() => {
    logger.shutdown();
    for (const file of [testLogFile, `${testLogFile}.1`, `${testLogFile}.2`]) {
      if (fs.existsSync(file)) {
        fs.unlinkSync(file);
      }
    }
  });

  test('should create log file and write messages', () => {
    logger.info('Test message', { data: 'test' });

    expect(fs.existsSync(testLogFile)).toBe(true);

    const logContent = fs.readFileSync(testLogFile, 'utf8');
    expect(logContent).toContain('[INFO] Test message {"data":"test"}');
  });

  test('should include the context tag', () => {
    logger.warn('Port busy', { port: 8765 }, 'ControlServer');

    const logContent = fs.readFileSync(testLogFile, 'utf8');
    expect(logContent).toContain('[WARN] [ControlServer] Port busy {"port":8765}');
  });

  test('should log errors with codes', () => {
    const testError = Object.assign(new Error('Test error'), { code: 'EADDRINUSE' });
    logger.error('Error occurred', testError);

    const logContent = fs.readFileSync(testLogFile, 'utf8');
    expect(logContent).toContain('[ERROR] Error occurred ERROR: Test error CODE: EADDRINUSE');
  });

  test('should respect log levels', () => {
    const infoLogger = new Logger({
      level: LogLevel.INFO,
      enableConsole: false,
      enableFile: true,
      logFile: testLogFile
    });

    infoLogger.debug('Debug message');
    infoLogger.info('Info message');

    const logContent = fs.readFileSync(testLogFile, 'utf8');
    expect(logContent).not.toContain('Debug message');
    expect(logContent).toContain('Info message');

    infoLogger.shutdown();
  });

  test('should measure performance with timers', async () => {
    const perfLogger = new Logger({
      level: LogLevel.DEBUG,
      enableConsole: false,
      enableFile: true,
      logFile: testLogFile,
      enablePerformance: true
    });

    const result = await perfLogger.timeAsync('test-operation', async () => {
      await new Promise(resolve => setTimeout(resolve, 10));
      return 'completed';
    });

    expect(result).toBe('completed');

    const logContent = fs.readFileSync(testLogFile, 'utf8');
    expect(logContent).toContain('PERF: test-operation took');

    perfLogger.shutdown();
  });

  test('should rethrow failures from timed operations', async () => {
    await expect(
      logger.timeAsync('failing-operation', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    const logContent = fs.readFileSync(testLogFile, 'utf8');
    expect(logContent).toContain('[ERROR] Operation failing-operation failed ERROR: boom');
  });

  test('should sanitize sensitive data', () => {
    logger.info('Login attempt', {
      username: 'testuser',
      password: 'test-secret',
      token: 'test-token'
    });

    const logContent = fs.readFileSync(testLogFile, 'utf8');
    expect(logContent).toContain('{"username":"testuser","password":"[REDACTED]","token":"[REDACTED]"}');
  });

  test('should keep recent entries in memory', () => {
    logger.info('one');
    logger.debug('two', undefined, 'Bridge');

    const entries = logger.recent(2);
    expect(entries.map(entry => entry.message)).toEqual(['one', 'two']);
    expect(entries[1].level).toBe('DEBUG');
    expect(entries[1].context).toBe('Bridge');
    expect(entries[1].line).toMatch(/\[DEBUG\] \[Bridge\] two$/);
  });

  test('should cap the in-memory history', () => {
    const smallLogger = new Logger({
      level: LogLevel.DEBUG,
      enableConsole: false,
      enableFile: false,
      historySize: 3
    });

    smallLogger.info('a');
    smallLogger.info('b');
    smallLogger.info('c');
    smallLogger.info('d');

    expect(smallLogger.recent().map(entry => entry.message)).toEqual(['b', 'c', 'd']);
    expect(smallLogger.recent(0)).toEqual([]);
  });

  test('should get singleton logger instance', () => {
    const logger1 = getLogger({ enableConsole: false, enableFile: false });
    const logger2 = getLogger();

    expect(logger1).toBe(logger2);
  });
});

describe('Logger Debug Mode', () => {
  const original = process.env.MIC_REMOTE_DEBUG;

  beforeEach(() => {
    delete process.env.MIC_REMOTE_DEBUG;
  });

  afterAll(() => {
    if (original === undefined) {
      delete process.env.MIC_REMOTE_DEBUG;
    } else {
      process.env.MIC_REMOTE_DEBUG = original;
    }
  });

  test('should enable debug mode when environment variable is set', () => {
    process.env.MIC_REMOTE_DEBUG = 'true';

    const debugLogger = new Logger({ enableConsole: false, enableFile: false });

    expect(debugLogger['config'].level).toBe(LogLevel.DEBUG);
    expect(debugLogger['config'].enablePerformance).toBe(true);
  });

  test('should use info level when debug mode is not set', () => {
    const normalLogger = new Logger({ enableConsole: false, enableFile: false });

    expect(normalLogger['config'].level).toBe(LogLevel.INFO);
    expect(normalLogger['config'].enablePerformance).toBe(false);
  });
});
