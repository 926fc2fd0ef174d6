import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// OFFER BOT PLUGIN TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const RateLimitConfigSchema = z.object({
  perChat: z.number().int().positive().default(1),     // msgs/sec per chat
  global: z.number().int().positive().default(30),     // msgs/sec overall
});
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;

export const OfferBotConfigSchema = z.object({
  botToken: z.string().min(1).optional(),
  rateLimit: RateLimitConfigSchema.default({}),
});
export type OfferBotConfig = z.infer<typeof OfferBotConfigSchema>;
export type OfferBotConfigInput = z.input<typeof OfferBotConfigSchema>;

export type PluginStatus = 'registered' | 'active' | 'error' | 'shutdown';
