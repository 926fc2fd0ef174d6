import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, formatError, getLogLevel, redact, setLogLevel } from '../../../src/utils/logger.js';
import { StorageFault } from '../../../src/kernel/errors.js';

describe('Logger utilities', () => {
  const original = getLogLevel();

  afterEach(() => {
    setLogLevel(original);
  });

  describe('setLogLevel', () => {
    it('should update registered loggers', () => {
      const log = createLogger('test');
      setLogLevel('warn');

      expect(log.level).toBe('warn');
      expect(getLogLevel()).toBe('warn');
    });

    it('should leave loggers with a pinned level alone', () => {
      const log = createLogger('pinned', { level: 'error' });
      setLogLevel('debug');
      expect(log.level).toBe('error');
    });
  });

  describe('redact', () => {
    it('should mask sensitive keys at any depth', () => {
      expect(redact({
        botToken: 'test-token',
        openaiApiKey: 'test-secret',
        dbPath: 'offers.db',
        rateLimit: { perChat: 1 },
        nested: { password: 'x' },
      })).toEqual({
        botToken: '[REDACTED]',
        openaiApiKey: '[REDACTED]',
        dbPath: 'offers.db',
        rateLimit: { perChat: 1 },
        nested: { password: '[REDACTED]' },
      });
    });
  });

  describe('formatError', () => {
    it('should include the code of domain errors', () => {
      const formatted = formatError(new StorageFault('disk full', 'create'));
      expect(formatted.message).toBe('disk full');
      expect(formatted.name).toBe('StorageFault');
      expect(formatted.code).toBe('STORAGE_FAULT');
    });

    it('should stringify non-errors', () => {
      expect(formatError('plain')).toEqual({ message: 'plain' });
    });
  });
});
