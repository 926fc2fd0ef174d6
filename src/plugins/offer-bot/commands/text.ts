import type { Context } from 'grammy';
import type { DispatchService } from '../dispatch-service.js';
import { replyHtml } from '../format.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Free text — offer submission or search
// ═══════════════════════════════════════════════════════════════════════════════

export const THINKING_TEXT = '⏳ Thinking about your request...';
export const UNKNOWN_COMMAND_TEXT = 'Unknown command. Send /help to see what I can do.';

export async function handleText(ctx: Context, dispatch: DispatchService): Promise<void> {
  const text = ctx.message?.text ?? '';
  if (text.trim() === '') return;

  // Registered commands are handled earlier; anything else with a slash is not an offer
  if (text.trimStart().startsWith('/')) {
    await ctx.reply(UNKNOWN_COMMAND_TEXT);
    return;
  }

  await ctx.reply(THINKING_TEXT);
  await replyHtml(ctx, await dispatch.handleText(text));
}
