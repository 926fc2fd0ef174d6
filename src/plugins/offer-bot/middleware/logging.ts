import type { Context, NextFunction } from 'grammy';
import type { EventBus } from '../../../kernel/event-bus.js';
import { createLogger } from '../../../utils/logger.js';

const log = createLogger('offer-bot');

// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MIDDLEWARE — Command events + per-update timing
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extracts "offer" from "/offer@my_bot 12". Returns null for plain text.
 */
export function extractCommand(text: string): string | null {
  if (!text.startsWith('/')) return null;
  const token = text.slice(1).split(/\s/, 1)[0] ?? '';
  const command = token.split('@', 1)[0] ?? '';
  return command === '' ? null : command;
}

export function createLoggingMiddleware(eventBus: EventBus) {
  return async (ctx: Context, next: NextFunction): Promise<void> => {
    const userId = ctx.from?.id ?? 0;
    const chatId = ctx.chat?.id ?? 0;
    const command = extractCommand(ctx.message?.text ?? '');

    if (command) {
      eventBus.emit('telegram:command_received', {
        command,
        userId,
        chatId,
        timestamp: new Date().toISOString(),
      });
    }

    const startedAt = Date.now();
    await next();
    log.debug(
      { updateId: ctx.update?.update_id, chatId, command, durationMs: Date.now() - startedAt },
      'Update handled',
    );
  };
}
