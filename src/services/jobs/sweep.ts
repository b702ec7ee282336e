import pino from 'pino';
import type { PageRepository, TenantRepository } from '../../db/repositories/types.js';
import { isMonitoringAllowed } from '../scanner/eligibility.js';
import type { TriggerOptions, TriggerResult } from './scan-queue.js';

const log = pino({ name: 'sweep' });

export const DEFAULT_REFRESH_HOURS = 24;

export interface SweepDeps {
  pages: PageRepository;
  tenants: TenantRepository;
  trigger: (pageId: string, options?: TriggerOptions) => TriggerResult;
  refreshHours?: number;
  clock?: () => Date;
}

export interface SweepSummary {
  tenants: number;
  queued: number;
  skipped: number;
}

/**
 * Queue every due page of every tenant allowed to run scans. A page is due
 * when it has never been scanned or was last scanned before the refresh
 * window. Pages already queued or running are skipped by the queue.
 */
export async function triggerScheduledSweep(deps: SweepDeps): Promise<SweepSummary> {
  const now = (deps.clock ?? (() => new Date()))();
  const cutoff = new Date(now.getTime() - (deps.refreshHours ?? DEFAULT_REFRESH_HOURS) * 3_600_000);

  const eligible = (await deps.tenants.listAll()).filter(isMonitoringAllowed);
  const summary: SweepSummary = { tenants: eligible.length, queued: 0, skipped: 0 };

  for (const tenant of eligible) {
    const due = await deps.pages.listDue(tenant.id, cutoff, 'live');
    for (const page of due) {
      const result = deps.trigger(page.id);
      if (result.status === 'enqueued') summary.queued++;
      else summary.skipped++;
    }
    if (due.length > 0) {
      log.info({ tenantId: tenant.id, due: due.length }, 'Tenant pages queued');
    }
  }

  log.info(summary, 'Scheduled sweep complete');
  return summary;
}
