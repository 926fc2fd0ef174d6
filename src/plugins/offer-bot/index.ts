import type { Bot } from 'grammy';
import type { EventBus } from '../../kernel/event-bus.js';
import { createLogger } from '../../utils/logger.js';
import type { DispatchService } from './dispatch-service.js';
import { OfferBotConfigSchema } from './types.js';
import type { BuildInfo } from '../../utils/build-info.js';
import type { OfferBotConfigInput, PluginStatus } from './types.js';
import { createBot } from './bot.js';

const log = createLogger('offer-bot');

// ═══════════════════════════════════════════════════════════════════════════════
// OFFER BOT PLUGIN
// ═══════════════════════════════════════════════════════════════════════════════

export interface OfferBotDependencies {
  eventBus: EventBus;
  dispatch: DispatchService;
  buildInfo: BuildInfo;
  config: OfferBotConfigInput;
}

export class OfferBotPlugin {
  private status: PluginStatus = 'registered';
  private eventBus: EventBus | null = null;
  private bot: Bot | null = null;
  private polling = false;

  // ── Lifecycle ──────────────────────────────────────────────────────

  async initialize(deps: OfferBotDependencies): Promise<void> {
    this.eventBus = deps.eventBus;
    const config = OfferBotConfigSchema.parse(deps.config);

    if (!config.botToken) {
      this.status = 'error';
      log.error('Bot token missing, offer bot not started');
      return;
    }

    try {
      this.bot = createBot({
        eventBus: deps.eventBus,
        dispatch: deps.dispatch,
        buildInfo: deps.buildInfo,
        config,
      });

      await this.startPolling(this.bot, deps.eventBus);
      this.status = 'active';
    } catch (error) {
      this.status = 'error';
      throw error;
    }
  }

  async shutdown(): Promise<void> {
    if (this.bot && this.polling) {
      this.polling = false;
      await this.bot.stop();

      this.eventBus?.emit('telegram:bot_stopped', {
        reason: 'shutdown',
        timestamp: new Date().toISOString(),
      });
    }
    this.status = 'shutdown';
  }

  getStatus(): PluginStatus {
    return this.status;
  }

  async healthCheck(): Promise<{ healthy: boolean; details?: string }> {
    if (!this.bot) {
      return { healthy: false, details: 'Bot not initialized' };
    }

    try {
      const me = await this.bot.api.getMe();
      return { healthy: true, details: `Bot: @${me.username}` };
    } catch (error) {
      return {
        healthy: false,
        details: `Bot API error: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  // ── Private ────────────────────────────────────────────────────────

  private async startPolling(bot: Bot, eventBus: EventBus): Promise<void> {
    // Fails fast on a bad token before polling starts
    await bot.init();
    eventBus.emit('telegram:bot_started', {
      botUsername: bot.botInfo.username,
      timestamp: new Date().toISOString(),
    });
    log.info({ botUsername: bot.botInfo.username }, 'Offer bot polling started');

    // Long polling runs in the background until shutdown()
    this.polling = true;
    bot.start({ drop_pending_updates: false }).catch((error: unknown) => {
      if (!this.polling) return;
      this.polling = false;
      this.status = 'error';
      log.error({ err: error }, 'Polling stopped unexpectedly');
      eventBus.emit('telegram:bot_stopped', {
        reason: error instanceof Error ? error.message : 'polling error',
        timestamp: new Date().toISOString(),
      });
    });
  }
}
