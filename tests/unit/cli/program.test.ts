import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { buildProgram } from '../../../src/cli/program.js';
import { OfferStore } from '../../../src/integrations/offers/offer-store.js';

describe('CLI', () => {
  let dir: string;
  let dbPath: string;
  let out: string;
  let errOut: string;

  async function run(...args: string[]): Promise<void> {
    const program = buildProgram({
      env: { DB_PATH: dbPath, LOG_LEVEL: 'silent' },
      io: {
        out: (text) => { out += text; },
        err: (text) => { errOut += text; },
      },
    });
    await program.parseAsync(args, { from: 'user' });
  }

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'offer-cli-'));
    dbPath = path.join(dir, 'offers.db');
    out = '';
    errOut = '';
  });

  afterEach(() => {
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  describe('migrate', () => {
    it('should create the database', async () => {
      await run('migrate');

      expect(out).toBe(`Database ready: ${dbPath}\n`);
      expect(existsSync(dbPath)).toBe(true);
    });
  });

  describe('offers', () => {
    it('should report an empty database', async () => {
      await run('offers');
      expect(out).toBe('No offers yet.\n');
    });

    it('should print the latest offers as plain text', async () => {
      const store = new OfferStore(dbPath);
      store.init();
      store.create({ country: 'A' }, 'a');
      store.create({ country: 'B', feePercent: 2 }, 'b');

      await run('offers', '--limit', '1');

      expect(out).toBe('📋 Latest offers:\n\nID 2 — [—] B / — / 2% / rate ? — new\n');
    });

    it('should reject an out-of-range limit', async () => {
      await run('offers', '--limit', '0');

      expect(errOut).toBe('Error: Limit must be a number from 1 to 50\n');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('offer', () => {
    it('should print one offer', async () => {
      const store = new OfferStore(dbPath);
      store.init();
      store.create({ country: 'RU' }, 'RU <offer> text');

      await run('offer', '1');

      expect(out.split('\n')[0]).toBe('📄 Offer ID 1');
      expect(out.endsWith('Original text:\nRU <offer> text\n')).toBe(true);
    });

    it('should report a missing offer', async () => {
      await run('offer', '999');
      expect(out).toBe('Offer with ID 999 not found.\n');
    });

    it('should reject a non-numeric id', async () => {
      await run('offer', 'abc');

      expect(errOut).toBe('Error: ID must be a number\n');
      expect(process.exitCode).toBe(1);
    });
  });

  describe('start', () => {
    it('should refuse to start without credentials', async () => {
      await run('start');

      expect(errOut).toBe('Error: Missing required environment variables: BOT_TOKEN, OPENAI_API_KEY\n');
      expect(process.exitCode).toBe(1);
    });
  });
});
