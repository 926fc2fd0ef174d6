import type { Context, NextFunction } from 'grammy';
import type { EventBus } from '../../../kernel/event-bus.js';
import type { RateLimitConfig } from '../types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RATE LIMIT MIDDLEWARE — Per-chat + global, 1 second sliding window
// ═══════════════════════════════════════════════════════════════════════════════

const WINDOW_MS = 1000;

export const RATE_LIMIT_NOTICE =
  '⏳ Too many messages at once. Please resend the last one in a moment.';

/**
 * Timestamps of accepted updates inside the current window.
 */
class SlidingWindow {
  private hits: number[] = [];

  constructor(private readonly capacity: number) {}

  isFull(now: number): boolean {
    this.hits = this.hits.filter((t) => t > now - WINDOW_MS);
    return this.hits.length >= this.capacity;
  }

  record(now: number): void {
    this.hits.push(now);
  }

  isIdle(now: number): boolean {
    return this.hits.every((t) => t <= now - WINDOW_MS);
  }
}

/**
 * A limited update is not processed, but the chat is told to resend.
 * At most one notice per chat per window, so a burst gets one reply.
 */
export function createRateLimitMiddleware(
  config: RateLimitConfig,
  eventBus: EventBus,
  clock: () => number = Date.now,
) {
  const global = new SlidingWindow(config.global);
  const perChat = new Map<number, SlidingWindow>();
  const noticedAt = new Map<number, number>();

  const prune = (now: number): void => {
    for (const [id, window] of perChat) {
      if (window.isIdle(now)) perChat.delete(id);
    }
    for (const [id, at] of noticedAt) {
      if (at <= now - WINDOW_MS) noticedAt.delete(id);
    }
  };

  const reject = async (ctx: Context, scope: 'chat' | 'global', now: number): Promise<void> => {
    const chatId = ctx.chat?.id ?? 0;
    eventBus.emit('telegram:rate_limited', {
      userId: ctx.from?.id ?? 0,
      chatId,
      scope,
      timestamp: new Date(now).toISOString(),
    });

    if (ctx.chat && !noticedAt.has(chatId)) {
      noticedAt.set(chatId, now);
      await ctx.reply(RATE_LIMIT_NOTICE);
    }
  };

  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const chatId = ctx.chat?.id ?? 0;
    const now = clock();
    prune(now);

    // Global limit is checked before a chat window is allocated
    if (global.isFull(now)) {
      await reject(ctx, 'global', now);
      return;
    }

    const chatWindow = perChat.get(chatId) ?? new SlidingWindow(config.perChat);
    perChat.set(chatId, chatWindow);
    if (chatWindow.isFull(now)) {
      await reject(ctx, 'chat', now);
      return;
    }

    global.record(now);
    chatWindow.record(now);
    await next();
  };
}
