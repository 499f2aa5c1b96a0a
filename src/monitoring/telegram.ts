/**
 * Telegram run notifications.
 *
 * Fire-and-forget: failures are logged, never thrown, and everything is a
 * no-op until TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are both set.
 */
import { env } from '../config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Telegram');

async function send(text: string): Promise<void> {
  const token = env.TELEGRAM_BOT_TOKEN;
  const chatId = env.TELEGRAM_CHAT_ID;
  if (!token || !chatId) return;

  try {
    const res = await fetch(`https://api.telegram.org/bot${token}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: chatId, text, parse_mode: 'HTML' }),
      signal: AbortSignal.timeout(10_000),
    });
    if (!res.ok) log.warn('sendMessage failed', { status: res.status });
  } catch (err) {
    log.warn('unreachable', { error: err });
  }
}

export const telegram = {
  info:  (msg: string) => send(`ℹ️ ${msg}`),
  alert: (msg: string) => send(`⚠️ ${msg}`),
  error: (msg: string) => send(`🚨 ${msg}`),

  planSummary: (p: { requested: number; produced: number; discarded: number; catalogSize?: number }) => send(
    `🎞️ <b>Concatenation plan ready</b>\n` +
    `Produced: ${p.produced}/${p.requested}\n` +
    `Discarded attempts: ${p.discarded}\n` +
    (p.catalogSize !== undefined ? `Source videos: ${p.catalogSize}\n` : ''),
  ),
};
