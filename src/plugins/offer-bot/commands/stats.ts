import type { Context } from 'grammy';
import type { DispatchService } from '../dispatch-service.js';
import { replyHtml } from '../format.js';

export async function handleStats(ctx: Context, dispatch: DispatchService): Promise<void> {
  await replyHtml(ctx, dispatch.handleStats());
}
