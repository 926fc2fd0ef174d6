import type { Context } from 'grammy';

/**
 * Text after the command token: "/offer@bot  12 " → "12".
 */
export function commandArgument(ctx: Context): string {
  const text = ctx.message?.text ?? '';
  return text.replace(/^\/\S+\s*/, '').trim();
}
