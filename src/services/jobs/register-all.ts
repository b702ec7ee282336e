import pino from 'pino';
import type { Repositories } from '../../db/repositories/types.js';
import { logAuditEvent } from '../audit/log-event.js';
import { failStaleAlerts } from '../lifecycle/stale-alerts.js';
import { failStaleScans } from '../lifecycle/stale-scans.js';
import { getErrorMessage } from '../../utils/errors.js';
import { registerJob } from './scheduler.js';
import type { SweepSummary } from './sweep.js';

const log = pino({ name: 'register-jobs' });

export interface JobDeps {
  repos: Pick<Repositories, 'scanRuns' | 'alerts'>;
  /** Same sweep the HTTP API runs on demand. */
  sweep: () => Promise<SweepSummary>;
  sweepCron: string;
}

/**
 * Wrap a job body so its outcome lands in job_log. Audit failures are
 * logged, never rethrown.
 */
async function audited(
  jobType: string,
  fn: () => Promise<Record<string, unknown>>,
  shouldPersist: (metadata: Record<string, unknown>) => boolean = () => true,
): Promise<void> {
  const start = Date.now();
  try {
    const metadata = await fn();
    if (shouldPersist(metadata)) {
      await logAuditEvent({ jobType, status: 'completed', durationMs: Date.now() - start, metadata })
        .catch((err) => log.warn({ err, jobType }, 'Failed to persist job audit event'));
    }
  } catch (err) {
    await logAuditEvent({ jobType, status: 'failed', durationMs: Date.now() - start, errorMessage: getErrorMessage(err) })
      .catch((auditErr) => log.warn({ err: auditErr, jobType }, 'Failed to persist job audit event'));
    throw err;
  }
}

/**
 * Register all background jobs.
 *
 *   Job               | Schedule            | Purpose
 *   ------------------|---------------------|-------------------------------------
 *   scheduled-sweep   | SWEEP_CRON (06:00)  | Queue due pages of eligible tenants
 *   stale-reaper      | Every 15 min        | Fail scan runs and pending alerts orphaned by a crash
 */
export function registerAllJobs(deps: JobDeps): void {
  log.info('Registering all background jobs');

  registerJob('scheduled-sweep', deps.sweepCron, () =>
    audited('scheduled_sweep', async () => ({ ...(await deps.sweep()) })),
  );

  // Only persisted when something was reaped
  registerJob('stale-reaper', '*/15 * * * *', () =>
    audited(
      'stale_reaper',
      async () => ({
        failedScans: await failStaleScans(deps.repos.scanRuns),
        failedAlerts: await failStaleAlerts(deps.repos.alerts),
      }),
      (metadata) => metadata.failedScans !== 0 || metadata.failedAlerts !== 0,
    ),
  );

  log.info('All background jobs registered');
}
