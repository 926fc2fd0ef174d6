/**
 * IntentInterpreter — Offer / Search Classification
 *
 * Sends operator text to the OpenAI Chat Completions API in JSON mode and
 * validates the answer into a closed union. Past this point nothing in the
 * bot reasons about free text again.
 *
 * No retries and no caching: each call is independent, and a failed or
 * malformed answer is an InterpretationError rather than a guessed mode.
 */

import OpenAI from 'openai';
import {
  OfferDraftSchema,
  SearchFilterSchema,
  coerceText,
  type InterpretedIntent,
} from '../types/index.js';
import { InterpretationError, ValidationError, errorMessage } from '../kernel/errors.js';
import { createLogger } from '../utils/logger.js';
import { OFFER_INTENT_PROMPT } from '../prompts/offer-intent.js';

const log = createLogger('intent-interpreter');

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface IntentInterpreterOptions {
  apiKey: string;
  model: string;
  timeoutMs?: number;
  systemPrompt?: string;
}

/**
 * Anything that can turn text into an intent. The dispatch service only
 * depends on this, which keeps the OpenAI client out of its tests.
 */
export interface IntentSource {
  interpret(text: string): Promise<InterpretedIntent>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_LOGGED_CONTENT = 2_000;

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates the raw completion content and maps the snake_case payload onto
 * the domain types. Throws InterpretationError on any shape problem.
 */
export function parseIntentResponse(content: string | null | undefined): InterpretedIntent {
  if (content === null || content === undefined || content.trim() === '') {
    throw new InterpretationError('Interpreter returned an empty response', content ?? undefined);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InterpretationError(
      `Interpreter response is not valid JSON: ${errorMessage(error)}`,
      content,
      error,
    );
  }

  if (!isPlainObject(parsed)) {
    throw new InterpretationError('Interpreter response JSON is not an object', content);
  }

  const { mode } = parsed;
  if (typeof mode !== 'string') {
    throw new InterpretationError('Interpreter response has no "mode" field', content);
  }

  switch (mode.trim().toLowerCase()) {
    case 'offer': {
      const payload = isPlainObject(parsed.offer) ? parsed.offer : {};
      const summary = coerceText(payload.short_summary);
      return {
        mode: 'offer',
        offer: OfferDraftSchema.parse({
          country: payload.country,
          method: payload.method,
          fee: payload.fee,
          feePercent: payload.fee_percent,
          rate: payload.rate,
          limits: payload.limits,
          conditions: payload.conditions,
          kind: payload.kind,
        }),
        ...(summary !== undefined ? { shortSummary: summary } : {}),
      };
    }
    case 'search': {
      const payload = isPlainObject(parsed.search) ? parsed.search : {};
      return {
        mode: 'search',
        filter: SearchFilterSchema.parse({
          country: payload.country,
          method: payload.method,
          status: payload.status,
          kind: payload.kind,
          minFeePercent: payload.min_fee_percent,
          maxFeePercent: payload.max_fee_percent,
        }),
      };
    }
    default:
      return { mode: 'unrecognized' };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// INTENT INTERPRETER
// ═══════════════════════════════════════════════════════════════════════════════

export class IntentInterpreter implements IntentSource {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly systemPrompt: string;

  constructor(options: IntentInterpreterOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAI API key required: set OPENAI_API_KEY');
    }

    this.model = options.model;
    this.systemPrompt = options.systemPrompt ?? OFFER_INTENT_PROMPT;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async interpret(text: string): Promise<InterpretedIntent> {
    if (text.trim() === '') {
      throw new ValidationError('Nothing to interpret: the message is empty');
    }

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: this.systemPrompt },
          { role: 'user', content: text },
        ],
      });
      content = response.choices[0]?.message.content;
    } catch (error) {
      log.error({ model: this.model, err: error }, 'Interpreter request failed');
      throw new InterpretationError(`Interpreter request failed: ${errorMessage(error)}`, undefined, error);
    }

    log.debug({ model: this.model, content: content?.slice(0, MAX_LOGGED_CONTENT) }, 'Interpreter response');

    const intent = parseIntentResponse(content);
    log.info({ model: this.model, mode: intent.mode }, 'Text interpreted');
    return intent;
  }
}
