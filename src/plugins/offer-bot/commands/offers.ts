import type { Context } from 'grammy';
import type { DispatchService } from '../dispatch-service.js';
import { DEFAULT_RECENT_LIMIT } from '../../../integrations/offers/offer-store.js';
import { replyHtml } from '../format.js';
import { commandArgument } from './args.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /offers [count] — Latest offers
// ═══════════════════════════════════════════════════════════════════════════════

export const MAX_LIST_LIMIT = 50;

/**
 * Parses the optional count. Returns null when it is present but unusable.
 */
export function parseListLimit(raw: string): number | null {
  if (raw === '') return DEFAULT_RECENT_LIMIT;
  if (!/^\d+$/.test(raw)) return null;
  const limit = Number(raw);
  return limit >= 1 && limit <= MAX_LIST_LIMIT ? limit : null;
}

export async function handleOffers(ctx: Context, dispatch: DispatchService): Promise<void> {
  const limit = parseListLimit(commandArgument(ctx));
  if (limit === null) {
    await ctx.reply(`Usage: /offers [count], count from 1 to ${MAX_LIST_LIMIT}`);
    return;
  }

  await replyHtml(ctx, dispatch.handleListRecent(limit));
}
