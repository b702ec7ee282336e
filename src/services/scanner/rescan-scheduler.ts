import pino from 'pino';
import type { Issue } from '../../types/index.js';

const log = pino({ name: 'rescan-scheduler' });

export const DEFAULT_RESCAN_DELAY_MINUTES = 30;

/**
 * Issues that need a second observation before they can alert: high
 * severity, seen once, not confirmed by AI.
 */
export function selectRescanIssues(issues: readonly Issue[]): Issue[] {
  return issues.filter(
    (i) => i.status !== 'resolved' && i.severity === 'high' && i.occurrenceCount === 1 && i.aiConfirmed !== true,
  );
}

export type RescanTrigger = (pageId: string, delayMs: number) => Promise<boolean>;

/**
 * Enqueue at most one delayed rescan of the page, no matter how many
 * issues asked for it. Returns whether one was scheduled.
 */
export async function scheduleRescanIfNeeded(
  pageId: string,
  touched: readonly Issue[],
  trigger: RescanTrigger,
  delayMinutes: number = DEFAULT_RESCAN_DELAY_MINUTES,
): Promise<boolean> {
  const pending = selectRescanIssues(touched);
  if (pending.length === 0) return false;

  const scheduled = await trigger(pageId, delayMinutes * 60_000);
  log.info(
    { pageId, issueIds: pending.map((i) => i.id), delayMinutes, scheduled },
    scheduled ? 'Confirmation rescan scheduled' : 'Confirmation rescan not scheduled',
  );
  return scheduled;
}
