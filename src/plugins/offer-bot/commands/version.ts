import type { Context } from 'grammy';
import type { BuildInfo } from '../../../utils/build-info.js';
import { escapeHtml } from '../format.js';

// ═══════════════════════════════════════════════════════════════════════════════
// /version — Commit and start time
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleVersion(ctx: Context, buildInfo: BuildInfo): Promise<void> {
  const lines = [
    'ℹ️ <b>Bot version</b>',
    `Commit: <code>${escapeHtml(buildInfo.commitHash)}</code>`,
    `Started: ${escapeHtml(buildInfo.startedAt)}`,
  ];
  await ctx.reply(lines.join('\n'), { parse_mode: 'HTML' });
}
