import { Logger } from '../../../services/core/Logger';

describe('Logger', () => {
  let logger: Logger;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  let consoleWarnSpy: jest.SpyInstance;

  beforeEach(() => {
    logger = new Logger('TestService');
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    consoleWarnSpy = jest.spyOn(console, 'warn').mockImplementation();
  });

  afterEach(() => {
    delete process.env.LOG_LEVEL;
    jest.restoreAllMocks();
  });

  describe('info', () => {
    it('should log info messages with structured format', () => {
      logger.info('Test message', { key: 'value' });

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const callArg = consoleLogSpy.mock.calls[0][0];
      // Format: [timestamp] [LEVEL] [service] message {metadata}
      expect(callArg).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+Z\] \[INFO\] \[TestService\] Test message \{"key":"value"\}$/);
    });

    it('should omit the metadata block when there is none', () => {
      logger.info('Simple message');

      const callArg = consoleLogSpy.mock.calls[0][0];
      expect(callArg).toMatch(/\[INFO\] \[TestService\] Simple message$/);
    });
  });

  describe('error', () => {
    it('should log error messages to console.error', () => {
      logger.error('Error message', { error: 'test error' });

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      const callArg = consoleErrorSpy.mock.calls[0][0];
      expect(callArg).toContain('[ERROR] [TestService] Error message');
      expect(callArg).toContain('"error":"test error"');
    });
  });

  describe('warn', () => {
    it('should log warning messages to console.warn', () => {
      logger.warn('Warning message', { warning: 'test' });

      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      const callArg = consoleWarnSpy.mock.calls[0][0];
      expect(callArg).toContain('[WARN] [TestService] Warning message {"warning":"test"}');
    });
  });

  describe('debug', () => {
    it('should not log debug messages at the default level', () => {
      logger.debug('Debug message');

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('should log debug messages when LOG_LEVEL=debug', () => {
      process.env.LOG_LEVEL = 'debug';

      logger.debug('Debug message');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0][0]).toContain('[DEBUG] [TestService] Debug message');
    });
  });

  describe('level threshold', () => {
    it('should drop messages below an explicit minimum level', () => {
      const quiet = new Logger('QuietService', undefined, 'warn');

      quiet.info('dropped');
      quiet.warn('kept');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
    });

    it('should prefer the explicit level over LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'debug';
      const quiet = new Logger('QuietService', undefined, 'error');

      quiet.debug('dropped');
      quiet.warn('dropped');
      quiet.error('kept');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    it('should fall back to info for an unrecognised LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'verbose';

      logger.debug('dropped');
      logger.info('kept');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0][0]).toContain('kept');
    });
  });

  describe('context', () => {
    it('should merge default context under per-call metadata', () => {
      const withContext = new Logger('CtxService', { requestId: 'req-1', userName: 'a' });

      withContext.info('hello', { userName: 'b' });

      expect(consoleLogSpy.mock.calls[0][0]).toContain('hello {"requestId":"req-1","userName":"b"}');
    });

    it('should replace context with setContext', () => {
      logger.setContext({ requestId: 'req-2' });

      logger.info('hello');

      expect(consoleLogSpy.mock.calls[0][0]).toContain('hello {"requestId":"req-2"}');
    });
  });
});
