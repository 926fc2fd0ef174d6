import { describe, it, expect } from 'vitest';
import { loadConfig, loadStorageConfig } from '../../../src/config/config.js';
import { ConfigError } from '../../../src/kernel/errors.js';

const REQUIRED = { BOT_TOKEN: 'test-token', OPENAI_API_KEY: 'test-secret' };

describe('Configuration', () => {
  describe('loadConfig', () => {
    it('should apply defaults', () => {
      const result = loadConfig(REQUIRED);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data).toEqual({
        dbPath: 'offers.db',
        logLevel: 'info',
        botToken: 'test-token',
        openaiApiKey: 'test-secret',
        openaiModel: 'gpt-4.1',
        interpreterTimeoutMs: 60_000,
        rateLimit: { perChat: 1, global: 30 },
      });
    });

    it('should read every optional variable', () => {
      const result = loadConfig({
        ...REQUIRED,
        DB_PATH: '/var/lib/offers.db',
        LOG_LEVEL: 'DEBUG',
        OPENAI_MODEL: 'gpt-4o-mini',
        INTERPRETER_TIMEOUT_MS: '5000',
        RATE_LIMIT_PER_CHAT: '3',
        RATE_LIMIT_GLOBAL: '50',
      });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.dbPath).toBe('/var/lib/offers.db');
      expect(result.data.logLevel).toBe('debug');
      expect(result.data.openaiModel).toBe('gpt-4o-mini');
      expect(result.data.interpreterTimeoutMs).toBe(5000);
      expect(result.data.rateLimit).toEqual({ perChat: 3, global: 50 });
    });

    it('should accept TELEGRAM_BOT_TOKEN as an alias', () => {
      const result = loadConfig({ TELEGRAM_BOT_TOKEN: 'alias-token', OPENAI_API_KEY: 'test-secret' });
      expect(result.success && result.data.botToken).toBe('alias-token');
    });

    it('should list every missing credential at once', () => {
      const result = loadConfig({ BOT_TOKEN: '  ' });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.missing).toEqual(['BOT_TOKEN', 'OPENAI_API_KEY']);
      expect(result.error.message).toBe('Missing required environment variables: BOT_TOKEN, OPENAI_API_KEY');
    });

    it('should reject an invalid timeout', () => {
      const result = loadConfig({ ...REQUIRED, INTERPRETER_TIMEOUT_MS: 'soon' });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.message).toMatch(/^Invalid configuration: interpreterTimeoutMs: /);
    });

    it('should reject an unknown log level', () => {
      const result = loadConfig({ ...REQUIRED, LOG_LEVEL: 'loud' });
      expect(result.success).toBe(false);
    });
  });

  describe('loadStorageConfig', () => {
    it('should not require credentials', () => {
      const result = loadStorageConfig({ DB_PATH: 'data/offers.db' });
      expect(result).toEqual({ success: true, data: { dbPath: 'data/offers.db', logLevel: 'info' } });
    });
  });
});
