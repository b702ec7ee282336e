import { pool } from '../../db/pool.js';

/**
 * Persist a background job execution to the job_log table.
 *
 *   job_type     : event category (e.g. 'scheduled_sweep', 'stale_reaper')
 *   status       : 'completed' | 'failed'
 *   metadata     : JSONB with event-specific stats
 *   started_at / completed_at : for duration calculation
 */
export async function logAuditEvent(opts: {
  jobType: string;
  status: 'completed' | 'failed';
  durationMs: number;
  metadata?: Record<string, unknown>;
  errorMessage?: string;
}): Promise<void> {
  const startedAt = new Date(Date.now() - opts.durationMs);

  await pool.query(
    `INSERT INTO job_log (job_type, status, started_at, completed_at, error_message, metadata)
     VALUES ($1, $2, $3, NOW(), $4, $5)`,
    [
      opts.jobType,
      opts.status,
      startedAt,
      opts.errorMessage ?? null,
      opts.metadata ? JSON.stringify(opts.metadata) : null,
    ],
  );
}
