import type { Context } from 'grammy';

// ═══════════════════════════════════════════════════════════════════════════════
// /start, /help — Usage examples
// ═══════════════════════════════════════════════════════════════════════════════

export const HELP_TEXT =
  '👋 <b>Offer Desk</b> — the aggregator CRM bot.\n\n' +
  'I can:\n' +
  '1) Take offers (channels or merchants) and save them.\n' +
  '2) Search saved offers from a plain-language request.\n\n' +
  '<b>Examples</b>\n' +
  '— RU SBP in 1.8% rate 98 limits 10k–300k\n' +
  '— give me all offers for India\n' +
  '— SBP offers in Russia cheaper than 11%\n\n' +
  '<b>Commands</b>\n' +
  '/offers [count] — latest offers\n' +
  '/offer &lt;id&gt; — one offer in full\n' +
  '/stats — offer counts by status\n' +
  '/version — build information';

export async function handleStart(ctx: Context): Promise<void> {
  await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' });
}
