import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { getLogger, configureLogging, LogLevel, resetLoggers, type Logger } from '../logger.js';

describe('Logger', () => {
  let output: Array<{ message: string; level: LogLevel }> = [];

  beforeEach(() => {
    resetLoggers();
    output = [];
    configureLogging({
      destination: (message, level) => output.push({ message, level }),
      includeTimestamp: false,
    });
  });

  afterEach(() => {
    resetLoggers();
  });

  describe('getLogger', () => {
    it('should return the same logger instance for the same name', () => {
      expect(getLogger('switchboard.test')).toBe(getLogger('switchboard.test'));
    });

    it('should create different loggers for different names', () => {
      expect(getLogger('switchboard.http')).not.toBe(getLogger('switchboard.registry'));
    });

    it('should throw if name does not start with switchboard', () => {
      expect(() => getLogger('invalid.name')).toThrow("Logger name must start with 'switchboard'");
    });
  });

  describe('Text format', () => {
    it('should write level, logger name, message and context', () => {
      getLogger('switchboard.text').info('Models synced', { provider: 'openrouter', models: 3 });
      expect(output).toEqual([
        {
          message: '[switchboard.text - INFO] Models synced {"provider":"openrouter","models":3}',
          level: LogLevel.INFO,
        },
      ]);
    });

    it('should omit the logger name when configured', () => {
      configureLogging({ includeLoggerName: false });
      getLogger('switchboard.noname').warn('Careful');
      expect(output[0]?.message).toBe('[WARN] Careful');
    });

    it('should include a timestamp by default', () => {
      configureLogging({ includeTimestamp: true });
      getLogger('switchboard.time').info('Test');
      expect(output[0]?.message).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} - switchboard\.time - INFO\] Test$/);
    });
  });

  describe('JSON format', () => {
    beforeEach(() => {
      configureLogging({ format: 'json' });
    });

    it('should output the entry as JSON', () => {
      getLogger('switchboard.json').info('Test', { key: 'value' });
      expect(JSON.parse(output[0]?.message ?? '')).toEqual({
        level: 'INFO',
        message: 'Test',
        logger: 'switchboard.json',
        context: { key: 'value' },
      });
    });

    it('should include error details', () => {
      getLogger('switchboard.json').error('Request failed', new TypeError('bad url'), { provider: 'local' });
      const parsed = JSON.parse(output[0]?.message ?? '');
      expect(parsed.context.provider).toBe('local');
      expect(parsed.context.error.name).toBe('TypeError');
      expect(parsed.context.error.message).toBe('bad url');
    });

    it('should describe non-Error values', () => {
      getLogger('switchboard.json').error('Rejected', 'plain reason');
      expect(JSON.parse(output[0]?.message ?? '').context.error).toEqual({ message: 'plain reason' });
    });
  });

  describe('Level filtering', () => {
    let logger: Logger;

    beforeEach(() => {
      logger = getLogger('switchboard.filter');
    });

    it('should filter debug messages at INFO', () => {
      logger.debug('hidden');
      logger.info('shown');
      expect(output.map((entry) => entry.level)).toEqual([LogLevel.INFO]);
      expect(logger.isLevelEnabled(LogLevel.DEBUG)).toBe(false);
    });

    it('should update existing loggers when the global level changes', () => {
      configureLogging({ level: LogLevel.ERROR });
      logger.warn('hidden');
      logger.error('shown');
      expect(output).toHaveLength(1);
      expect(output[0]?.level).toBe(LogLevel.ERROR);
    });

    it('should allow setting the level per logger', () => {
      const verbose = getLogger('switchboard.verbose');
      verbose.setLevel(LogLevel.DEBUG);
      verbose.debug('from verbose');
      logger.debug('from filter');
      expect(output).toHaveLength(1);
      expect(output[0]?.message).toContain('from verbose');
    });
  });

  describe('child', () => {
    it('should attach bound context to every entry', () => {
      const child = getLogger('switchboard.http').child({ provider: 'openrouter' });
      child.info('HTTP request', { method: 'POST' });
      expect(output[0]?.message).toBe(
        '[switchboard.http - INFO] HTTP request {"provider":"openrouter","method":"POST"}'
      );
    });

    it('should follow the parent level', () => {
      const parent = getLogger('switchboard.parent');
      const child = parent.child({ chatId: 42 });
      expect(child.isLevelEnabled(LogLevel.DEBUG)).toBe(false);
      parent.setLevel(LogLevel.DEBUG);
      expect(child.isLevelEnabled(LogLevel.DEBUG)).toBe(true);
    });
  });

  describe('resetLoggers', () => {
    it('should restore console output and the default level', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      configureLogging({ level: LogLevel.ERROR });
      resetLoggers();
      getLogger('switchboard.reset').info('back to defaults');
      expect(spy).toHaveBeenCalledTimes(1);
      expect(output).toHaveLength(0);
      spy.mockRestore();
    });
  });
});
