export { createEmailNotifier } from './email.js';
export type { EmailOptions } from './email.js';
export { createTelegramNotifier } from './telegram.js';
export type { TelegramOptions } from './telegram.js';
export type { AlertMessage, DeliveryResult, Notifier } from './types.js';
