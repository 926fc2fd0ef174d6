import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { DispatchService, REPLIES, parseOfferId } from '../../../../src/plugins/offer-bot/dispatch-service.js';
import { OfferStore } from '../../../../src/integrations/offers/offer-store.js';
import { EventBus } from '../../../../src/kernel/event-bus.js';
import { parseIntentResponse, type IntentSource } from '../../../../src/ai/intent-interpreter.js';
import { InterpretationError, ValidationError } from '../../../../src/kernel/errors.js';
import type { InterpretedIntent } from '../../../../src/types/index.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

function stubInterpreter(intent: InterpretedIntent): IntentSource {
  return { interpret: vi.fn().mockResolvedValue(intent) };
}

function rawInterpreter(content: string): IntentSource {
  return { interpret: async () => parseIntentResponse(content) };
}

// ─── Tests ──────────────────────────────────────────────────────────────────

describe('parseOfferId', () => {
  it('should accept integers', () => {
    expect(parseOfferId('12')).toBe(12);
    expect(parseOfferId(' +3 ')).toBe(3);
  });

  it('should reject everything else', () => {
    expect(parseOfferId('abc')).toBeNull();
    expect(parseOfferId('1.5')).toBeNull();
    expect(parseOfferId('12abc')).toBeNull();
    expect(parseOfferId('99999999999999999999')).toBeNull();
  });
});

describe('DispatchService', () => {
  let dir: string;
  let store: OfferStore;
  let eventBus: EventBus;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'dispatch-'));
    store = new OfferStore(path.join(dir, 'offers.db'));
    store.init();
    eventBus = new EventBus();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('handleText', () => {
    it('should save an offer and confirm its id', async () => {
      const created = vi.fn();
      eventBus.on('offer:created', created);
      const dispatch = new DispatchService({
        store,
        eventBus,
        interpreter: stubInterpreter({
          mode: 'offer',
          offer: { country: 'RU', method: 'SBP', feePercent: 1.8 },
          shortSummary: 'RU SBP at 1.8%',
        }),
      });

      const reply = await dispatch.handleText('RU SBP in 1.8%');

      expect(reply.split('\n')[0]).toBe('✅ Offer saved. ID: <b>1</b>');
      expect(reply).toContain('<b>Fee, %:</b> 1.8');
      expect(reply).toContain('<i>Summary:</i> RU SBP at 1.8%');
      expect(store.getById(1)?.rawText).toBe('RU SBP in 1.8%');
      expect(store.getById(1)?.status).toBe('new');
      expect(created).toHaveBeenCalledWith(expect.objectContaining({ offerId: 1, country: 'RU', method: 'SBP' }));
    });

    it('should list search results', async () => {
      store.create({ country: 'RU', method: 'SBP', feePercent: 1.8 }, 'RU SBP 1.8%');
      store.create({ country: 'India', method: 'UPI', feePercent: 4 }, 'India UPI 4%');
      const searched = vi.fn();
      eventBus.on('offer:searched', searched);

      const dispatch = new DispatchService({
        store,
        eventBus,
        interpreter: stubInterpreter({ mode: 'search', filter: { country: 'ru' } }),
      });

      const reply = await dispatch.handleText('show offers for Russia');

      expect(reply).toBe('📋 <b>Search results:</b>\n\nID <b>1</b> — [—] RU / SBP / 1.8% / rate ? — <i>new</i>');
      expect(searched).toHaveBeenCalledWith(expect.objectContaining({ resultCount: 1 }));
    });

    it('should say when nothing matches', async () => {
      const dispatch = new DispatchService({
        store,
        interpreter: stubInterpreter({ mode: 'search', filter: { country: 'india' } }),
      });

      expect(await dispatch.handleText('give me all offers for India')).toBe(REPLIES.noResults);
    });

    it('should explain an unrecognized message', async () => {
      const dispatch = new DispatchService({ store, interpreter: stubInterpreter({ mode: 'unrecognized' }) });

      expect(await dispatch.handleText('hello there')).toBe(REPLIES.unrecognized);
      expect(store.count()).toBe(0);
    });

    it('should report an unparsable interpreter response without writing', async () => {
      const failed = vi.fn();
      eventBus.on('offer:interpretation_failed', failed);
      const dispatch = new DispatchService({ store, eventBus, interpreter: rawInterpreter('<html>oops</html>') });

      const reply = await dispatch.handleText('RU SBP 1.8%');

      expect(reply.split('\n')[0]).toBe('❌ Could not understand the request:');
      expect(reply.endsWith('Response: &lt;html&gt;oops&lt;/html&gt;')).toBe(true);
      expect(store.count()).toBe(0);
      expect(failed).toHaveBeenCalledTimes(1);
    });

    it('should truncate long raw responses', async () => {
      const dispatch = new DispatchService({
        store,
        interpreter: { interpret: vi.fn().mockRejectedValue(new InterpretationError('bad', 'x'.repeat(800))) },
      });

      const reply = await dispatch.handleText('text');

      expect(reply).toBe(`❌ Could not understand the request:\nbad\n\nResponse: ${'x'.repeat(500)}`);
    });

    it('should return validation messages as they are', async () => {
      const dispatch = new DispatchService({
        store,
        interpreter: { interpret: vi.fn().mockRejectedValue(new ValidationError('Nothing to interpret: the message is empty')) },
      });

      expect(await dispatch.handleText(' ')).toBe('Nothing to interpret: the message is empty');
    });

    it('should report storage faults with a fixed message', async () => {
      const uninitialized = new OfferStore(path.join(dir, 'other.db'));
      const dispatch = new DispatchService({
        store: uninitialized,
        interpreter: stubInterpreter({ mode: 'offer', offer: { country: 'RU' } }),
      });

      expect(await dispatch.handleText('RU offer')).toBe(REPLIES.storageFailure);
    });

    it('should report unexpected failures', async () => {
      const dispatch = new DispatchService({
        store,
        interpreter: { interpret: vi.fn().mockRejectedValue(new Error('boom <x>')) },
      });

      expect(await dispatch.handleText('text')).toBe('❌ Processing failed:\nboom &lt;x&gt;');
    });
  });

  describe('handleListRecent', () => {
    it('should say when there are no offers', () => {
      const dispatch = new DispatchService({ store, interpreter: stubInterpreter({ mode: 'unrecognized' }) });
      expect(dispatch.handleListRecent()).toBe(REPLIES.noOffers);
    });

    it('should list the newest offers first', () => {
      store.create({ country: 'A' }, 'a');
      store.create({ country: 'B' }, 'b');
      store.create({ country: 'C' }, 'c');
      const dispatch = new DispatchService({ store, interpreter: stubInterpreter({ mode: 'unrecognized' }) });

      const lines = dispatch.handleListRecent(2).split('\n');

      expect(lines[0]).toBe('📋 <b>Latest offers:</b>');
      expect(lines.slice(2)).toEqual([
        'ID <b>3</b> — [—] C / — / — / rate ? — <i>new</i>',
        'ID <b>2</b> — [—] B / — / — / rate ? — <i>new</i>',
      ]);
    });
  });

  describe('handleGetById', () => {
    let dispatch: DispatchService;

    beforeEach(() => {
      dispatch = new DispatchService({ store, interpreter: stubInterpreter({ mode: 'unrecognized' }) });
    });

    it('should show usage without an argument', () => {
      expect(dispatch.handleGetById(undefined)).toBe(REPLIES.offerUsage);
      expect(dispatch.handleGetById('  ')).toBe(REPLIES.offerUsage);
    });

    it('should reject a non-numeric id', () => {
      expect(dispatch.handleGetById('abc')).toBe(REPLIES.offerIdNotInteger);
    });

    it('should report a missing offer', () => {
      expect(dispatch.handleGetById('999')).toBe('Offer with ID 999 not found.');
    });

    it('should show the offer card', () => {
      store.create({ country: 'RU' }, 'RU offer text');
      const card = dispatch.handleGetById('1');

      expect(card.split('\n')[0]).toBe('📄 <b>Offer ID 1</b>');
      expect(card.endsWith('<b>Original text:</b>\nRU offer text')).toBe(true);
    });
  });

  describe('handleStats', () => {
    it('should count offers', () => {
      store.create({}, 'a');
      const dispatch = new DispatchService({ store, interpreter: stubInterpreter({ mode: 'unrecognized' }) });

      expect(dispatch.handleStats()).toContain('<b>Total:</b> 1\n<i>new</i>: 1');
    });
  });
});
