import type { Context } from 'grammy';
import type { DispatchService } from '../dispatch-service.js';
import { replyHtml } from '../format.js';
import { commandArgument } from './args.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /offer <id> — One offer in full
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleOffer(ctx: Context, dispatch: DispatchService): Promise<void> {
  const [firstArg] = commandArgument(ctx).split(/\s+/);
  await replyHtml(ctx, dispatch.handleGetById(firstArg));
}
