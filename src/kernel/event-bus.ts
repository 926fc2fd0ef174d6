import type { OfferKind, SearchFilter } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('event-bus');

/**
 * EventMap interface defining event name to payload mappings.
 */
export interface EventMap {
  // ── Offer events ───────────────────────────────────────────────────────
  'offer:created': { offerId: number; kind?: OfferKind; country?: string; method?: string; timestamp: string };
  'offer:searched': { filter: SearchFilter; resultCount: number; timestamp: string };
  'offer:interpretation_failed': { reason: string; timestamp: string };

  // ── Telegram events ────────────────────────────────────────────────────
  'telegram:command_received': { command: string; userId: number; chatId: number; timestamp: string };
  'telegram:rate_limited': { userId: number; chatId: number; scope: 'chat' | 'global'; timestamp: string };
  'telegram:bot_started': { botUsername: string; timestamp: string };
  'telegram:bot_stopped': { reason: string; timestamp: string };

  // ── System events ──────────────────────────────────────────────────────
  'system:handler_error': { event: string; error: string; handler: string; timestamp: Date };
}

type Handler<K extends keyof EventMap> = (payload: EventMap[K]) => void;

/**
 * Typed in-process pub/sub. Handler exceptions are isolated so one
 * subscriber cannot break delivery to the others.
 */
export class EventBus {
  private listeners: { [K in keyof EventMap]?: Set<Handler<K>> } = {};

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends keyof EventMap>(event: K, handler: Handler<K>): () => void {
    const handlers: Set<Handler<K>> = this.listeners[event] ?? new Set<Handler<K>>();
    handlers.add(handler);
    const listeners: { [P in K]?: Set<Handler<P>> } = this.listeners;
    listeners[event] = handlers;
    return () => this.off(event, handler);
  }

  off<K extends keyof EventMap>(event: K, handler: Handler<K>): void {
    const handlers: Set<Handler<K>> | undefined = this.listeners[event];
    if (!handlers) return;
    handlers.delete(handler);
    if (handlers.size === 0) {
      delete this.listeners[event];
    }
  }

  emit<K extends keyof EventMap>(event: K, payload: EventMap[K]): void {
    const handlers: Set<Handler<K>> | undefined = this.listeners[event];
    if (!handlers) return;

    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        log.error({ event, err: error }, 'Error in event handler');

        // Guard against recursion from handler_error subscribers
        if (event !== 'system:handler_error') {
          this.emit('system:handler_error', {
            event,
            error: error instanceof Error ? error.message : String(error),
            handler: handler.name || 'anonymous',
            timestamp: new Date(),
          });
        }
      }
    }
  }
}
