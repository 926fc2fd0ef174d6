import type { Offer, OfferDraft, OfferStatus, OfferSummary } from '../../types/index.js';
import { OFFER_STATUSES } from '../../types/index.js';
import { bold, escapeHtml, italic } from './format.js';

// ═══════════════════════════════════════════════════════════════════════════════
// OFFER FORMATTERS — Telegram HTML
// ═══════════════════════════════════════════════════════════════════════════════

export const PLACEHOLDER = '—';
const UNKNOWN_RATE = 'rate ?';

function field(value: string | undefined): string {
  return value ? escapeHtml(value) : PLACEHOLDER;
}

/**
 * Prefers the free-text fee, then the numeric commission, then the placeholder.
 */
export function formatFee(fee: string | undefined, feePercent: number | undefined): string {
  if (fee) return escapeHtml(fee);
  if (feePercent !== undefined) return `${feePercent}%`;
  return PLACEHOLDER;
}

export function formatOfferLine(offer: OfferSummary): string {
  return (
    `ID ${bold(String(offer.id))} — [${field(offer.kind)}] ` +
    `${field(offer.country)} / ${field(offer.method)} / ` +
    `${formatFee(offer.fee, offer.feePercent)} / ${offer.rate ? escapeHtml(offer.rate) : UNKNOWN_RATE} — ` +
    italic(offer.status)
  );
}

export function formatOfferCreated(id: number, offer: OfferDraft, shortSummary?: string): string {
  const lines = [
    `✅ Offer saved. ID: ${bold(String(id))}`,
    '',
    `${bold('Kind:')} ${field(offer.kind)}`,
    `${bold('Country:')} ${field(offer.country)}`,
    `${bold('Method:')} ${field(offer.method)}`,
    `${bold('Fee:')} ${field(offer.fee)}`,
    `${bold('Rate:')} ${field(offer.rate)}`,
    `${bold('Limits:')} ${field(offer.limits)}`,
    `${bold('Conditions:')} ${field(offer.conditions)}`,
  ];

  if (offer.feePercent !== undefined) {
    lines.push(`${bold('Fee, %:')} ${offer.feePercent}`);
  }

  if (shortSummary) {
    lines.push('', `${italic('Summary:')} ${escapeHtml(shortSummary)}`);
  }

  return lines.join('\n');
}

export function formatOfferCard(offer: Offer): string {
  return [
    `📄 ${bold(`Offer ID ${offer.id}`)}`,
    `Kind: ${italic(field(offer.kind))}`,
    `Status: ${italic(offer.status)}`,
    '',
    `${bold('Country:')} ${field(offer.country)}`,
    `${bold('Method:')} ${field(offer.method)}`,
    `${bold('Fee:')} ${formatFee(offer.fee, offer.feePercent)}`,
    `${bold('Rate:')} ${field(offer.rate)}`,
    `${bold('Limits:')} ${field(offer.limits)}`,
    `${bold('Conditions:')} ${field(offer.conditions)}`,
    '',
    `${bold('Created:')} ${offer.createdAt}`,
    `${bold('Updated:')} ${offer.updatedAt}`,
    '',
    bold('Original text:'),
    escapeHtml(offer.rawText),
  ].join('\n');
}

export function formatOfferList(title: string, offers: OfferSummary[]): string {
  return [`📋 ${bold(title)}`, '', ...offers.map(formatOfferLine)].join('\n');
}

export function formatStats(total: number, byStatus: Record<OfferStatus, number>): string {
  return [
    `📊 ${bold('Offer statistics')}`,
    '',
    `${bold('Total:')} ${total}`,
    ...OFFER_STATUSES.map((status) => `${italic(status)}: ${byStatus[status]}`),
  ].join('\n');
}
