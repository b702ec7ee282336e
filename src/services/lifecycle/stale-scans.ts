import pino from 'pino';
import type { ScanRunRepository } from '../../db/repositories/types.js';

const log = pino({ name: 'stale-scans' });

export const STALE_SCAN_AFTER_MS = 60 * 60 * 1000;
export const STALE_SCAN_MESSAGE = 'process exited before the scan finished';

/**
 * Fail scan runs stuck in `running` for over an hour. A run only stays
 * there when the process died mid-scan.
 */
export async function failStaleScans(scanRuns: ScanRunRepository, now: Date = new Date()): Promise<number> {
  const cutoff = new Date(now.getTime() - STALE_SCAN_AFTER_MS);
  const failed = await scanRuns.failStale(cutoff, STALE_SCAN_MESSAGE, now);
  if (failed > 0) {
    log.warn({ failed, cutoff }, 'Stale scan runs marked failed');
  }
  return failed;
}
