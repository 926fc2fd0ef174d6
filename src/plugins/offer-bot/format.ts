/**
 * Telegram HTML delivery helpers
 *
 * Replies are built as Telegram HTML (<b>, <i>). Every interpolated value is
 * escaped first. If Telegram still refuses the markup, the same text goes
 * out again as plain text.
 */

import { GrammyError, type Context } from 'grammy';

export const TELEGRAM_MAX_LENGTH = 4096;

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>]/g, (char) => HTML_ENTITIES[char] ?? char);
}

export function bold(text: string): string {
  return `<b>${text}</b>`;
}

export function italic(text: string): string {
  return `<i>${text}</i>`;
}

/**
 * Strip tags and decode the entities escapeHtml produces.
 */
export function htmlToPlainText(html: string): string {
  return html
    .replace(/<\/?[a-z][^>]*>/gi, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

/**
 * Split on line boundaries so each chunk fits Telegram's limit. A single line
 * longer than the limit is cut hard.
 */
export function splitTelegramMessage(text: string, maxLength: number = TELEGRAM_MAX_LENGTH): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  let current = '';

  for (const line of text.split('\n')) {
    const candidate = current === '' ? line : `${current}\n${line}`;
    if (candidate.length <= maxLength) {
      current = candidate;
      continue;
    }

    if (current !== '') chunks.push(current);

    let rest = line;
    while (rest.length > maxLength) {
      chunks.push(rest.slice(0, maxLength));
      rest = rest.slice(maxLength);
    }
    current = rest;
  }

  if (current !== '') chunks.push(current);
  return chunks;
}

export function isEntityParseError(error: unknown): boolean {
  return error instanceof GrammyError && /can't parse entities/i.test(error.description);
}

/**
 * Send an HTML reply, falling back to plain text when Telegram rejects the markup.
 */
export async function replyHtml(ctx: Context, html: string): Promise<void> {
  for (const chunk of splitTelegramMessage(html)) {
    try {
      await ctx.reply(chunk, { parse_mode: 'HTML' });
    } catch (error) {
      if (!isEntityParseError(error)) throw error;
      await ctx.reply(htmlToPlainText(chunk));
    }
  }
}
