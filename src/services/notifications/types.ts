import type { AlertChannel } from '../../types/index.js';

export interface AlertMessage {
  subject: string;
  text: string;
  html: string;
}

export interface DeliveryResult {
  delivered: boolean;
  error?: string;
}

/** Outbound delivery for one alert channel. */
export interface Notifier {
  readonly channel: AlertChannel;
  isConfigured(): boolean;
  send(recipient: string | null, message: AlertMessage): Promise<DeliveryResult>;
}
