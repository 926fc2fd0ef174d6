/**
 * Offer Desk — Command Line Interface
 *
 * Runs the bot and offers a few read-only views of the offer database.
 *
 * @module cli
 */

import { Command } from 'commander';
import { loadConfig, loadStorageConfig } from '../config/config.js';
import { EventBus } from '../kernel/event-bus.js';
import { OfferStore } from '../integrations/offers/index.js';
import { IntentInterpreter } from '../ai/intent-interpreter.js';
import { DispatchService, parseOfferId } from '../plugins/offer-bot/dispatch-service.js';
import { OfferBotPlugin } from '../plugins/offer-bot/index.js';
import { formatOfferCard, formatOfferList } from '../plugins/offer-bot/formatters.js';
import { htmlToPlainText } from '../plugins/offer-bot/format.js';
import { parseListLimit, MAX_LIST_LIMIT } from '../plugins/offer-bot/commands/offers.js';
import { collectBuildInfo } from '../utils/build-info.js';
import { createLogger, formatError, redact, setLogLevel } from '../utils/logger.js';
import { errorMessage } from '../kernel/errors.js';
import type { StorageConfig } from '../types/index.js';

const log = createLogger('cli');

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface ProgramOptions {
  env?: Record<string, string | undefined>;
  io?: CliIO;
}

const processIO: CliIO = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

export function buildProgram(options: ProgramOptions = {}): Command {
  const env = options.env ?? process.env;
  const io = options.io ?? processIO;

  const fail = (message: string): void => {
    io.err(`Error: ${message}\n`);
    process.exitCode = 1;
  };

  /**
   * Storage config plus an initialized store, or null after reporting the failure.
   */
  const openStore = (): { config: StorageConfig; store: OfferStore } | null => {
    const result = loadStorageConfig(env);
    if (!result.success) {
      fail(result.error.message);
      return null;
    }
    setLogLevel(result.data.logLevel);

    try {
      const store = new OfferStore(result.data.dbPath);
      store.init();
      return { config: result.data, store };
    } catch (error) {
      fail(errorMessage(error));
      return null;
    }
  };

  const program = new Command();

  program
    .name('offer-desk')
    .description('Offer Desk — files payment offers and searches them in plain language')
    .version('1.0.0');

  // ═════════════════════════════════════════════════════════════════════════
  // BOT
  // ═════════════════════════════════════════════════════════════════════════

  program
    .command('start')
    .description('Run the Telegram bot in the foreground')
    .action(async () => {
      const configResult = loadConfig(env);
      if (!configResult.success) {
        fail(configResult.error.message);
        return;
      }

      const config = configResult.data;
      setLogLevel(config.logLevel);
      log.info({ config: redact(config) }, 'Configuration loaded');

      const store = new OfferStore(config.dbPath);
      store.init();

      const eventBus = new EventBus();
      eventBus.on('offer:created', (event) => log.info(event, 'Offer created'));
      eventBus.on('offer:searched', (event) => log.info(event, 'Offers searched'));
      eventBus.on('offer:interpretation_failed', (event) => log.warn(event, 'Interpretation failed'));
      eventBus.on('telegram:rate_limited', (event) => log.warn(event, 'Update rate limited'));

      const dispatch = new DispatchService({
        store,
        interpreter: new IntentInterpreter({
          apiKey: config.openaiApiKey,
          model: config.openaiModel,
          timeoutMs: config.interpreterTimeoutMs,
        }),
        eventBus,
      });

      const plugin = new OfferBotPlugin();
      try {
        await plugin.initialize({
          eventBus,
          dispatch,
          buildInfo: await collectBuildInfo(),
          config: { botToken: config.botToken, rateLimit: config.rateLimit },
        });
      } catch (error) {
        log.fatal({ err: formatError(error) }, 'Bot failed to start');
        fail(`Bot failed to start: ${errorMessage(error)}`);
        return;
      }

      const health = await plugin.healthCheck();
      log.info(health, 'Offer bot health check');

      io.out('Offer bot running. Press Ctrl+C to stop\n');

      const shutdown = (): void => {
        io.out('\nShutting down...\n');
        plugin.shutdown()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            log.error({ err: formatError(error) }, 'Shutdown failed');
            process.exit(1);
          });
      };

      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

  // ═════════════════════════════════════════════════════════════════════════
  // DATABASE
  // ═════════════════════════════════════════════════════════════════════════

  program
    .command('migrate')
    .description('Create the offers table and add any missing columns')
    .action(() => {
      const opened = openStore();
      if (!opened) return;
      io.out(`Database ready: ${opened.config.dbPath}\n`);
    });

  program
    .command('offers')
    .description('Print the latest offers')
    .option('-l, --limit <count>', `Number of offers (1-${MAX_LIST_LIMIT})`, '10')
    .action((opts: { limit: string }) => {
      const limit = parseListLimit(opts.limit.trim());
      if (limit === null) {
        fail(`Limit must be a number from 1 to ${MAX_LIST_LIMIT}`);
        return;
      }

      const opened = openStore();
      if (!opened) return;

      try {
        const offers = opened.store.listRecent(limit);
        io.out(offers.length === 0
          ? 'No offers yet.\n'
          : `${htmlToPlainText(formatOfferList('Latest offers:', offers))}\n`);
      } catch (error) {
        fail(errorMessage(error));
      }
    });

  program
    .command('offer')
    .description('Print one offer in full')
    .argument('<id>', 'Offer id')
    .action((rawId: string) => {
      const id = parseOfferId(rawId);
      if (id === null) {
        fail('ID must be a number');
        return;
      }

      const opened = openStore();
      if (!opened) return;

      try {
        const offer = opened.store.getById(id);
        if (!offer) {
          io.out(`Offer with ID ${id} not found.\n`);
          return;
        }
        io.out(`${htmlToPlainText(formatOfferCard(offer))}\n`);
      } catch (error) {
        fail(errorMessage(error));
      }
    });

  return program;
}
