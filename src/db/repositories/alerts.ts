import type { Alert, AlertChannel } from '../../types/index.js';
import { NotFoundError } from '../../utils/errors.js';
import type { Queryable } from './db.js';
import type { AlertRepository } from './types.js';
import { toAlert } from './rows.js';
import type { AlertRow } from './rows.js';

const COLUMNS = 'id, issue_id, tenant_id, channel, delivery_status, sent_at, last_error, attempts';

export function createAlertRepository(db: Queryable): AlertRepository {
  return {
    async findSent(issueId: string, channel: AlertChannel): Promise<Alert | null> {
      const { rows } = await db.query<AlertRow>(
        `SELECT ${COLUMNS} FROM alerts WHERE issue_id = $1 AND channel = $2 AND delivery_status = 'sent'`,
        [issueId, channel],
      );
      return rows[0] ? toAlert(rows[0]) : null;
    },

    async claim(issueId: string, tenantId: string, channel: AlertChannel): Promise<Alert | null> {
      // No row comes back when the conflicting row is pending or sent
      const { rows } = await db.query<AlertRow>(
        `INSERT INTO alerts (issue_id, tenant_id, channel, delivery_status, attempts)
         VALUES ($1, $2, $3, 'pending', 1)
         ON CONFLICT (issue_id, channel) DO UPDATE
           SET delivery_status = 'pending',
               attempts = alerts.attempts + 1,
               updated_at = NOW()
           WHERE alerts.delivery_status = 'failed'
         RETURNING ${COLUMNS}`,
        [issueId, tenantId, channel],
      );
      return rows[0] ? toAlert(rows[0]) : null;
    },

    async markSent(alertId: string, at: Date): Promise<Alert> {
      const { rows } = await db.query<AlertRow>(
        `UPDATE alerts SET delivery_status = 'sent', sent_at = $2, last_error = NULL, updated_at = NOW()
         WHERE id = $1 RETURNING ${COLUMNS}`,
        [alertId, at],
      );
      if (!rows[0]) throw new NotFoundError('Alert', alertId);
      return toAlert(rows[0]);
    },

    async markFailed(alertId: string, error: string): Promise<Alert> {
      const { rows } = await db.query<AlertRow>(
        `UPDATE alerts SET delivery_status = 'failed', last_error = $2, updated_at = NOW()
         WHERE id = $1 RETURNING ${COLUMNS}`,
        [alertId, error],
      );
      if (!rows[0]) throw new NotFoundError('Alert', alertId);
      return toAlert(rows[0]);
    },

    async failStalePending(claimedBefore: Date, error: string): Promise<number> {
      const result = await db.query(
        `UPDATE alerts SET delivery_status = 'failed', last_error = $2, updated_at = NOW()
         WHERE delivery_status = 'pending' AND updated_at < $1`,
        [claimedBefore, error],
      );
      return result.rowCount ?? 0;
    },
  };
}
