import pino from 'pino';
import type { AlertRepository } from '../../db/repositories/types.js';

const log = pino({ name: 'stale-alerts' });

export const STALE_ALERT_AFTER_MS = 10 * 60 * 1000;
export const STALE_ALERT_MESSAGE = 'delivery did not finish';

/**
 * Fail alert rows stuck in `pending`. A row only stays there when the
 * process died between claim and send; failing it lets the next qualifying
 * pass reclaim and deliver.
 */
export async function failStaleAlerts(alerts: AlertRepository, now: Date = new Date()): Promise<number> {
  const cutoff = new Date(now.getTime() - STALE_ALERT_AFTER_MS);
  const failed = await alerts.failStalePending(cutoff, STALE_ALERT_MESSAGE);
  if (failed > 0) {
    log.warn({ failed, cutoff }, 'Stale pending alerts marked failed');
  }
  return failed;
}
