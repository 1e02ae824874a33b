import { env } from '../config.js';
import { logger } from '../utils/logger.js';

const log = logger.child('telegram');

export interface DraftNotice {
  round: number;
  totalDrafts: number;
  engagementScore: number | null;
  plotHolesFound: boolean | null;
  sceneCount: number;
  durationSeconds: number;
}

export interface Notifier {
  info(msg: string): Promise<void>;
  error(msg: string): Promise<void>;
  draftComplete(notice: DraftNotice): Promise<void>;
}

export interface TelegramOptions {
  botToken?: string | undefined;
  chatId?: string | undefined;
  fetchFn?: typeof fetch;
}

export function formatDraftNotice(n: DraftNotice): string {
  return (
    `🎬 <b>Draft ${n.round} of ${n.totalDrafts} complete</b>\n` +
    `Score: ${n.engagementScore ?? 'n/a'}/10` +
    (n.plotHolesFound ? ' 🚨 plot holes' : '') + '\n' +
    `Scenes: ${n.sceneCount}\n` +
    `Time: ${n.durationSeconds.toFixed(1)}s`
  );
}

/** Without both a bot token and a chat id every call resolves without sending. */
export function createTelegramNotifier(options: TelegramOptions): Notifier {
  const { botToken, chatId, fetchFn = fetch } = options;

  async function send(text: string): Promise<void> {
    if (!botToken || !chatId) return;
    try {
      const res = await fetchFn(`https://api.telegram.org/bot${botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: chatId, text, parse_mode: 'HTML' }),
      });
      if (!res.ok) log.warn('Telegram send failed', { status: res.status });
    } catch (err) {
      log.warn('Telegram unreachable', { error: String(err) });
    }
  }

  return {
    info:  (msg) => send(`ℹ️ ${msg}`),
    error: (msg) => send(`🚨 ${msg}`),
    draftComplete: (notice) => send(formatDraftNotice(notice)),
  };
}

export const telegram = createTelegramNotifier({
  botToken: env.TELEGRAM_BOT_TOKEN,
  chatId: env.TELEGRAM_CHAT_ID,
});
