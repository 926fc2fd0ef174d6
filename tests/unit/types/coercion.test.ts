import { describe, it, expect } from 'vitest';
import {
  OfferDraftSchema,
  SearchFilterSchema,
  coerceFeePercent,
  coerceText,
} from '../../../src/types/index.js';

describe('Lenient coercion', () => {
  describe('coerceFeePercent', () => {
    it('should keep finite numbers', () => {
      expect(coerceFeePercent(1.8)).toBe(1.8);
      expect(coerceFeePercent(0)).toBe(0);
    });

    it('should parse numeric strings', () => {
      expect(coerceFeePercent('1.8')).toBe(1.8);
      expect(coerceFeePercent(' 11 ')).toBe(11);
      expect(coerceFeePercent('1,5')).toBe(1.5);
      expect(coerceFeePercent('11%')).toBe(11);
      expect(coerceFeePercent('.5')).toBe(0.5);
    });

    it('should treat everything else as absent', () => {
      expect(coerceFeePercent('unknown')).toBeUndefined();
      expect(coerceFeePercent('')).toBeUndefined();
      expect(coerceFeePercent('1.8 rub')).toBeUndefined();
      expect(coerceFeePercent(Number.POSITIVE_INFINITY)).toBeUndefined();
      expect(coerceFeePercent(null)).toBeUndefined();
      expect(coerceFeePercent({ value: 1 })).toBeUndefined();
    });
  });

  describe('coerceText', () => {
    it('should trim strings and drop blanks', () => {
      expect(coerceText('  RU ')).toBe('RU');
      expect(coerceText('   ')).toBeUndefined();
    });

    it('should stringify numbers and booleans', () => {
      expect(coerceText(98)).toBe('98');
      expect(coerceText(true)).toBe('true');
    });

    it('should drop other values', () => {
      expect(coerceText(null)).toBeUndefined();
      expect(coerceText(['RU'])).toBeUndefined();
    });
  });

  describe('OfferDraftSchema', () => {
    it('should never fail on malformed fields', () => {
      const draft = OfferDraftSchema.parse({
        country: null,
        method: 42,
        feePercent: 'n/a',
        kind: 'CHANNEL',
        rate: '',
      });

      expect(draft).toEqual({
        country: undefined,
        method: '42',
        fee: undefined,
        feePercent: undefined,
        rate: undefined,
        limits: undefined,
        conditions: undefined,
        kind: 'channel',
      });
    });
  });

  describe('SearchFilterSchema', () => {
    it('should lowercase status and kind', () => {
      const filter = SearchFilterSchema.parse({ status: ' Active ', kind: 'Merchant', maxFeePercent: '11' });
      expect(filter.status).toBe('active');
      expect(filter.kind).toBe('merchant');
      expect(filter.maxFeePercent).toBe(11);
    });
  });
});
