import type { EventBus } from '../../kernel/event-bus.js';
import type { IntentSource } from '../../ai/intent-interpreter.js';
import type { OfferStore } from '../../integrations/offers/offer-store.js';
import { DEFAULT_RECENT_LIMIT, DEFAULT_SEARCH_LIMIT } from '../../integrations/offers/offer-store.js';
import type { InterpretedIntent } from '../../types/index.js';
import {
  InterpretationError,
  StorageFault,
  ValidationError,
  errorMessage,
} from '../../kernel/errors.js';
import { createLogger, formatError } from '../../utils/logger.js';
import { escapeHtml } from './format.js';
import {
  formatOfferCard,
  formatOfferCreated,
  formatOfferList,
  formatStats,
} from './formatters.js';

const log = createLogger('dispatch');

// ═══════════════════════════════════════════════════════════════════════════════
// REPLY TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export const REPLIES = {
  unrecognized:
    'I could not tell whether this is an offer or a search 🤔\n' +
    'Try rephrasing, or start with something like:\n' +
    '— "show offers for ..."\n' +
    '— or just send the offer itself.',
  noResults: 'Nothing found for this request 🤷',
  noOffers: 'No offers yet. Send the text of the first one.',
  offerUsage: 'Usage: /offer &lt;id&gt;',
  offerIdNotInteger: 'ID must be a number, for example: /offer 12',
  storageFailure: '❌ Storage error. The request was not completed, please try again later.',
} as const;

const MAX_RAW_DETAIL = 500;

export interface DispatchDependencies {
  store: OfferStore;
  interpreter: IntentSource;
  eventBus?: EventBus;
}

/**
 * Parses a command argument as an offer id. Digits only, with an optional sign.
 */
export function parseOfferId(raw: string): number | null {
  const text = raw.trim();
  if (!/^[+-]?\d+$/.test(text)) return null;
  const id = Number(text);
  return Number.isSafeInteger(id) ? id : null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCH SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Routes operator text to the store: interpret → create or search → reply.
 * Every public handler returns a reply and never throws.
 */
export class DispatchService {
  private readonly store: OfferStore;
  private readonly interpreter: IntentSource;
  private readonly eventBus: EventBus | undefined;

  constructor(deps: DispatchDependencies) {
    this.store = deps.store;
    this.interpreter = deps.interpreter;
    this.eventBus = deps.eventBus;
  }

  async handleText(text: string): Promise<string> {
    try {
      const intent = await this.interpreter.interpret(text);
      return this.route(intent, text);
    } catch (error) {
      if (error instanceof InterpretationError) {
        this.eventBus?.emit('offer:interpretation_failed', {
          reason: error.message,
          timestamp: new Date().toISOString(),
        });
      }
      return this.errorReply('handleText', error);
    }
  }

  handleListRecent(limit: number = DEFAULT_RECENT_LIMIT): string {
    try {
      const offers = this.store.listRecent(limit);
      if (offers.length === 0) return REPLIES.noOffers;
      return formatOfferList('Latest offers:', offers);
    } catch (error) {
      return this.errorReply('handleListRecent', error);
    }
  }

  /**
   * @param rawId - the command argument as typed, possibly empty
   */
  handleGetById(rawId: string | undefined): string {
    if (rawId === undefined || rawId.trim() === '') return REPLIES.offerUsage;

    const id = parseOfferId(rawId);
    if (id === null) {
      return this.errorReply('handleGetById', new ValidationError(REPLIES.offerIdNotInteger));
    }

    try {
      const offer = this.store.getById(id);
      if (!offer) return `Offer with ID ${id} not found.`;
      return formatOfferCard(offer);
    } catch (error) {
      return this.errorReply('handleGetById', error);
    }
  }

  handleStats(): string {
    try {
      return formatStats(this.store.count(), this.store.countByStatus());
    } catch (error) {
      return this.errorReply('handleStats', error);
    }
  }

  // ── Private ────────────────────────────────────────────────────────

  private route(intent: InterpretedIntent, text: string): string {
    switch (intent.mode) {
      case 'offer': {
        const offerId = this.store.create(intent.offer, text);
        this.eventBus?.emit('offer:created', {
          offerId,
          kind: intent.offer.kind,
          country: intent.offer.country,
          method: intent.offer.method,
          timestamp: new Date().toISOString(),
        });
        return formatOfferCreated(offerId, intent.offer, intent.shortSummary);
      }

      case 'search': {
        const offers = this.store.search(intent.filter, DEFAULT_SEARCH_LIMIT);
        this.eventBus?.emit('offer:searched', {
          filter: intent.filter,
          resultCount: offers.length,
          timestamp: new Date().toISOString(),
        });
        if (offers.length === 0) return REPLIES.noResults;
        return formatOfferList('Search results:', offers);
      }

      case 'unrecognized':
        return REPLIES.unrecognized;
    }
  }

  private errorReply(operation: string, error: unknown): string {
    if (error instanceof ValidationError) {
      log.warn({ operation, reason: error.message }, 'Rejected operator input');
      return escapeHtml(error.message);
    }

    if (error instanceof InterpretationError) {
      log.error({ operation, err: formatError(error), rawContent: error.rawContent }, 'Interpretation failed');
      const lines = ['❌ Could not understand the request:', escapeHtml(error.message)];
      if (error.rawContent) {
        lines.push('', `Response: ${escapeHtml(error.rawContent.slice(0, MAX_RAW_DETAIL))}`);
      }
      return lines.join('\n');
    }

    if (error instanceof StorageFault) {
      log.error({ operation, storageOperation: error.operation, err: formatError(error) }, 'Storage fault');
      return REPLIES.storageFailure;
    }

    log.error({ operation, err: formatError(error) }, 'Unexpected error while handling message');
    return `❌ Processing failed:\n${escapeHtml(errorMessage(error))}`;
  }
}
