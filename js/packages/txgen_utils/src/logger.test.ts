import {
  configureLogger,
  createLogger,
  disableLogging,
  enableDebugLogging,
  resetLogger,
  setGlobalLogLevel,
  setNamespaceLogLevel,
} from './logger';
import { LogLevel } from './types';

describe('@txgen/utils - Logger', () => {
  let consoleMocks: {
    debug: jest.SpyInstance;
    info: jest.SpyInstance;
    warn: jest.SpyInstance;
    error: jest.SpyInstance;
  };

  beforeEach(() => {
    resetLogger();
    consoleMocks = {
      debug: jest.spyOn(console, 'debug').mockImplementation(),
      info: jest.spyOn(console, 'info').mockImplementation(),
      warn: jest.spyOn(console, 'warn').mockImplementation(),
      error: jest.spyOn(console, 'error').mockImplementation(),
    };
  });

  afterEach(() => {
    Object.values(consoleMocks).forEach((mock) => mock.mockRestore());
    resetLogger();
  });

  describe('levels', () => {
    it('only logs errors by default', () => {
      const logger = createLogger('txgen:test');

      logger.debug('debug');
      logger.info('info');
      logger.warn('warn');
      logger.error('error');

      expect(consoleMocks.debug).not.toHaveBeenCalled();
      expect(consoleMocks.info).not.toHaveBeenCalled();
      expect(consoleMocks.warn).not.toHaveBeenCalled();
      expect(consoleMocks.error).toHaveBeenCalledTimes(1);
    });

    it('respects the global log level', () => {
      setGlobalLogLevel(LogLevel.WARN);
      const logger = createLogger('txgen:test');

      logger.info('info');
      logger.warn('warn');

      expect(consoleMocks.info).not.toHaveBeenCalled();
      expect(consoleMocks.warn).toHaveBeenCalledTimes(1);
    });

    it('reports enabled levels', () => {
      setGlobalLogLevel(LogLevel.WARN);
      const logger = createLogger('txgen:test');

      expect(logger.isLevelEnabled(LogLevel.DEBUG)).toBe(false);
      expect(logger.isLevelEnabled(LogLevel.INFO)).toBe(false);
      expect(logger.isLevelEnabled(LogLevel.WARN)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.ERROR)).toBe(true);
    });
  });

  describe('formatting', () => {
    it('prints level, namespace and message without colours or timestamps', () => {
      configureLogger({ level: LogLevel.INFO, colors: false, timestamps: false });
      createLogger('txgen:tx').info('built');

      expect(consoleMocks.info).toHaveBeenCalledWith('[INFO] [txgen:tx] built');
    });

    it('passes the context object as a second argument', () => {
      configureLogger({ level: LogLevel.INFO, colors: false, timestamps: false });
      const context = { inputs: 2, fee: '1' };

      createLogger('txgen:tx').info('built', context);

      expect(consoleMocks.info).toHaveBeenCalledWith('[INFO] [txgen:tx] built', context);
    });

    it('omits an empty context', () => {
      configureLogger({ level: LogLevel.INFO, colors: false, timestamps: false });
      createLogger('txgen:tx').info('built', {});

      expect(consoleMocks.info).toHaveBeenCalledWith('[INFO] [txgen:tx] built');
    });

    it('uses a custom formatter', () => {
      configureLogger({
        level: LogLevel.DEBUG,
        formatter: (level, namespace, message) => `${namespace}|${level}|${message}`,
      });
      createLogger('txgen:utxo').debug('tick');

      expect(consoleMocks.debug).toHaveBeenCalledWith('txgen:utxo|DEBUG|tick');
    });
  });

  describe('namespace-based log levels', () => {
    it('respects a namespace-specific level', () => {
      setGlobalLogLevel(LogLevel.WARN);
      setNamespaceLogLevel('txgen:tx', LogLevel.DEBUG);

      createLogger('txgen:tx').debug('tx debug');
      createLogger('txgen:utxo').debug('utxo debug');

      expect(consoleMocks.debug).toHaveBeenCalledTimes(1);
      expect(consoleMocks.debug.mock.calls[0][0]).toContain('txgen:tx');
    });

    it('applies a parent namespace to its children', () => {
      setGlobalLogLevel(LogLevel.WARN);
      setNamespaceLogLevel('txgen:tx', LogLevel.DEBUG);

      createLogger('txgen:tx').debug('parent');
      createLogger('txgen:tx:generator').debug('child');

      expect(consoleMocks.debug).toHaveBeenCalledTimes(2);
    });

    it('supports wildcard patterns', () => {
      setGlobalLogLevel(LogLevel.WARN);
      setNamespaceLogLevel('txgen:utxo:*', LogLevel.DEBUG);

      createLogger('txgen:utxo:tracker').debug('tracker');
      createLogger('txgen:utxo:feed').debug('feed');
      createLogger('txgen:tx').debug('tx');

      expect(consoleMocks.debug).toHaveBeenCalledTimes(2);
    });

    it('uses the most specific match', () => {
      setGlobalLogLevel(LogLevel.ERROR);
      setNamespaceLogLevel('txgen:tx', LogLevel.WARN);
      setNamespaceLogLevel('txgen:tx:builder', LogLevel.DEBUG);

      createLogger('txgen:tx').debug('tx');
      createLogger('txgen:tx:builder').debug('builder');

      expect(consoleMocks.debug).toHaveBeenCalledTimes(1);
      expect(consoleMocks.debug.mock.calls[0][0]).toContain('builder');
    });

    it('configures several namespaces at once', () => {
      configureLogger({
        level: LogLevel.WARN,
        namespaces: {
          'txgen:tx': LogLevel.DEBUG,
          'txgen:utxo': LogLevel.INFO,
        },
      });

      createLogger('txgen:tx').debug('tx debug');
      createLogger('txgen:utxo').debug('utxo debug');
      createLogger('txgen:utxo').info('utxo info');
      createLogger('txgen:other').debug('other debug');

      expect(consoleMocks.debug).toHaveBeenCalledTimes(1);
      expect(consoleMocks.info).toHaveBeenCalledTimes(1);
    });
  });

  describe('child loggers', () => {
    it('extends the namespace', () => {
      configureLogger({ level: LogLevel.INFO, colors: false, timestamps: false });
      createLogger('txgen:tx').child('builder').info('child message');

      expect(consoleMocks.info).toHaveBeenCalledWith('[INFO] [txgen:tx:builder] child message');
    });
  });

  describe('error logging', () => {
    it('prints the stack of an Error separately', () => {
      createLogger('txgen:test').error('failed', new Error('boom'));

      expect(consoleMocks.error).toHaveBeenCalledTimes(2);
    });

    it('accepts a context instead of an Error', () => {
      configureLogger({ colors: false, timestamps: false });
      const context = { code: 'INSUFFICIENT_FUNDS' };

      createLogger('txgen:test').error('failed', context);

      expect(consoleMocks.error).toHaveBeenCalledTimes(1);
      expect(consoleMocks.error).toHaveBeenCalledWith('[ERROR] [txgen:test] failed', context);
    });

    it('accepts both an Error and a context', () => {
      const context = { run: 'abc' };

      createLogger('txgen:test').error('failed', new Error('boom'), context);

      expect(consoleMocks.error).toHaveBeenCalledTimes(2);
      expect(consoleMocks.error.mock.calls[0]).toContain(context);
    });
  });

  describe('utility functions', () => {
    it('disableLogging silences errors too', () => {
      disableLogging();
      createLogger('txgen:test').error('error');

      expect(consoleMocks.error).not.toHaveBeenCalled();
    });

    it('enableDebugLogging enables every level', () => {
      disableLogging();
      enableDebugLogging();
      createLogger('txgen:test').debug('debug');

      expect(consoleMocks.debug).toHaveBeenCalledTimes(1);
    });
  });
});
