/**
 * Offer Desk — Core Type Definitions
 *
 * Domain types and schemas for offers, search filters and configuration.
 * Uses Zod for runtime validation with TypeScript inference.
 *
 * @module types
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPE
// ═══════════════════════════════════════════════════════════════════════════

export type Result<T, E = Error> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

// ═══════════════════════════════════════════════════════════════════════════
// ENUMS
// ═══════════════════════════════════════════════════════════════════════════

export const OfferKindSchema = z.enum(['channel', 'merchant']);
export type OfferKind = z.infer<typeof OfferKindSchema>;

export const OfferStatusSchema = z.enum(['new', 'active', 'paused', 'closed']);
export type OfferStatus = z.infer<typeof OfferStatusSchema>;

export const OFFER_STATUSES: readonly OfferStatus[] = OfferStatusSchema.options;

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// LENIENT COERCION
// ═══════════════════════════════════════════════════════════════════════════

const NUMERIC_TEXT = /^[+-]?(?:\d+(?:[.,]\d*)?|[.,]\d+)(?:[eE][+-]?\d+)?\s*%?$/;

/**
 * Coerce an extracted commission into a finite number.
 * Accepts numbers and numeric strings ("1.8", "1,8", "11%"); anything else is absent.
 */
export function coerceFeePercent(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;

  const text = value.trim();
  if (!NUMERIC_TEXT.test(text)) return undefined;

  const parsed = Number(text.replace('%', '').replace(',', '.').trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function coerceText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return undefined;
}

const optionalText = z.unknown().transform(coerceText);
const optionalPercent = z.unknown().transform(coerceFeePercent);
const lowerText = z.unknown().transform((value) => coerceText(value)?.toLowerCase());

const optionalKind = lowerText.transform((value) => {
  const parsed = OfferKindSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
});

// ═══════════════════════════════════════════════════════════════════════════
// OFFER SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Best-effort offer fields as extracted from free text.
 * Parsing never fails for an object input: malformed fields become absent.
 */
export const OfferDraftSchema = z.object({
  country: optionalText,
  method: optionalText,
  fee: optionalText,
  feePercent: optionalPercent,
  rate: optionalText,
  limits: optionalText,
  conditions: optionalText,
  kind: optionalKind,
});
export type OfferDraftInput = z.input<typeof OfferDraftSchema>;
export type OfferDraft = z.output<typeof OfferDraftSchema>;

export interface Offer {
  id: number;
  rawText: string;
  country?: string;
  method?: string;
  fee?: string;
  feePercent?: number;
  rate?: string;
  limits?: string;
  conditions?: string;
  kind?: OfferKind;
  status: OfferStatus;
  createdAt: string;
  updatedAt: string;
}

export type OfferSummary = Omit<Offer, 'rawText' | 'limits' | 'conditions' | 'updatedAt'>;

// ═══════════════════════════════════════════════════════════════════════════
// SEARCH FILTER
// ═══════════════════════════════════════════════════════════════════════════

export const SearchFilterSchema = z.object({
  country: optionalText,
  method: optionalText,
  status: lowerText,
  kind: lowerText,
  minFeePercent: optionalPercent,
  maxFeePercent: optionalPercent,
});
export type SearchFilterInput = z.input<typeof SearchFilterSchema>;
export type SearchFilter = z.output<typeof SearchFilterSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// INTERPRETER RESULT
// ═══════════════════════════════════════════════════════════════════════════

export type InterpretedIntent =
  | { mode: 'offer'; offer: OfferDraft; shortSummary?: string }
  | { mode: 'search'; filter: SearchFilter }
  | { mode: 'unrecognized' };

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const positiveInt = z.coerce.number().int().positive();

export const StorageConfigSchema = z.object({
  dbPath: z.string().min(1).default('offers.db'),
  logLevel: LogLevelSchema.default('info'),
});
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const AppConfigSchema = StorageConfigSchema.extend({
  botToken: z.string().min(1),
  openaiApiKey: z.string().min(1),
  openaiModel: z.string().min(1).default('gpt-4.1'),
  interpreterTimeoutMs: positiveInt.default(60_000),
  rateLimit: z.object({
    perChat: positiveInt.default(1),
    global: positiveInt.default(30),
  }).default({}),
});
export type AppConfig = z.infer<typeof AppConfigSchema>;
