import pino from 'pino';
import type { AlertMessage, DeliveryResult, Notifier } from './types.js';

const log = pino({ name: 'email' });

const SEND_TIMEOUT_MS = 15_000;

export interface EmailOptions {
  apiUrl: string;
  apiKey?: string;
  from: string;
}

/**
 * Merchant e-mail channel over a transactional e-mail HTTP API
 * (Resend-compatible: POST { from, to, subject, text, html } with a bearer key).
 */
export function createEmailNotifier(options: EmailOptions): Notifier {
  const isConfigured = (): boolean => !!options.apiKey;

  return {
    channel: 'email',
    isConfigured,

    async send(recipient: string | null, message: AlertMessage): Promise<DeliveryResult> {
      if (!isConfigured()) {
        return { delivered: false, error: 'E-mail API is not configured' };
      }
      if (!recipient) {
        return { delivered: false, error: 'Tenant has no alert e-mail address' };
      }

      try {
        const res = await fetch(options.apiUrl, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${options.apiKey}`,
          },
          body: JSON.stringify({
            from: options.from,
            to: [recipient],
            subject: message.subject,
            text: message.text,
            html: message.html,
          }),
          signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
        });

        if (!res.ok) {
          const body = await res.text();
          log.warn({ status: res.status, body: body.slice(0, 500) }, 'E-mail send failed');
          return { delivered: false, error: `E-mail API responded ${res.status}` };
        }

        return { delivered: true };
      } catch (err) {
        log.error({ err }, 'E-mail send error');
        return { delivered: false, error: err instanceof Error ? err.message : String(err) };
      }
    },
  };
}
