import pino from 'pino';
import { escapeHtml } from '../../utils/html.js';
import type { AlertMessage, DeliveryResult, Notifier } from './types.js';

const log = pino({ name: 'telegram' });

const SEND_TIMEOUT_MS = 15_000;

export interface TelegramOptions {
  botToken?: string;
  chatId?: string;
}

/**
 * Admin-surface channel: posts alerts to the operators' Telegram chat.
 * The recipient argument is ignored; every alert goes to the configured chat.
 */
export function createTelegramNotifier(options: TelegramOptions): Notifier {
  const { botToken, chatId } = options;

  const isConfigured = (): boolean => !!(botToken && chatId);

  async function sendMessage(text: string): Promise<DeliveryResult> {
    if (!isConfigured()) {
      return { delivered: false, error: 'Telegram is not configured' };
    }

    try {
      const res = await fetch(`https://api.telegram.org/bot${botToken}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: chatId,
          text,
          parse_mode: 'HTML',
        }),
        signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
      });

      if (!res.ok) {
        const body = await res.text();
        log.warn({ status: res.status, body }, 'Telegram send failed');
        return { delivered: false, error: `Telegram responded ${res.status}` };
      }

      return { delivered: true };
    } catch (err) {
      log.error({ err }, 'Telegram send error');
      return { delivered: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  return {
    channel: 'admin',
    isConfigured,
    send: (_recipient: string | null, message: AlertMessage) =>
      sendMessage(`🚨 <b>${escapeHtml(message.subject)}</b>\n${escapeHtml(message.text)}`),
  };
}
