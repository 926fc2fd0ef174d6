import { Bot } from 'grammy';
import type { EventBus } from '../../kernel/event-bus.js';
import { createLogger, formatError } from '../../utils/logger.js';
import type { DispatchService } from './dispatch-service.js';
import type { BuildInfo } from '../../utils/build-info.js';
import type { OfferBotConfig } from './types.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createRateLimitMiddleware } from './middleware/rate-limit.js';
import { handleStart } from './commands/start.js';
import { handleOffers } from './commands/offers.js';
import { handleOffer } from './commands/offer.js';
import { handleStats } from './commands/stats.js';
import { handleVersion } from './commands/version.js';
import { handleText } from './commands/text.js';

const log = createLogger('offer-bot');

// ═══════════════════════════════════════════════════════════════════════════════
// TELEGRAM BOT SETUP
// ═══════════════════════════════════════════════════════════════════════════════

export interface BotDependencies {
  eventBus: EventBus;
  dispatch: DispatchService;
  buildInfo: BuildInfo;
  config: OfferBotConfig;
}

/**
 * Creates and configures the grammY bot with middleware chain:
 * logging → rate-limit → commands → free-text dispatch
 */
export function createBot(deps: BotDependencies): Bot {
  const { eventBus, dispatch, buildInfo, config } = deps;

  if (!config.botToken) {
    throw new Error('Telegram bot token not configured. Set BOT_TOKEN.');
  }

  const bot = new Bot(config.botToken);

  // ── Middleware chain ──────────────────────────────────────────────

  bot.use(createLoggingMiddleware(eventBus));
  bot.use(createRateLimitMiddleware(config.rateLimit, eventBus));

  // ── Command handlers ──────────────────────────────────────────────

  bot.command(['start', 'help'], (ctx) => handleStart(ctx));
  bot.command('offers', (ctx) => handleOffers(ctx, dispatch));
  bot.command('offer', (ctx) => handleOffer(ctx, dispatch));
  bot.command('stats', (ctx) => handleStats(ctx, dispatch));
  bot.command('version', (ctx) => handleVersion(ctx, buildInfo));

  // ── Free text ─────────────────────────────────────────────────────

  bot.on('message:text', (ctx) => handleText(ctx, dispatch));

  // ── Last line of defence ──────────────────────────────────────────

  bot.catch((error) => {
    log.error(
      { updateId: error.ctx.update.update_id, err: formatError(error.error) },
      'Unhandled error while processing update',
    );
  });

  return bot;
}
