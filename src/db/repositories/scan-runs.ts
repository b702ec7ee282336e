import type { AnalysisSummary, ScanDepth, ScanRun } from '../../types/index.js';
import { NotFoundError } from '../../utils/errors.js';
import type { Queryable } from './db.js';
import type { CompletedScanData, ScanRunRepository } from './types.js';
import { toScanRun } from './rows.js';
import type { ScanRunRow } from './rows.js';

const COLUMNS = `id, page_id, depth, status, started_at, completed_at, load_time_ms,
  js_errors, network_errors, console_logs, html_snapshot_ref, screenshot_ref,
  raw_findings, error_message, analysis_summary`;

export function createScanRunRepository(db: Queryable): ScanRunRepository {
  return {
    async countForPage(pageId: string): Promise<number> {
      const { rows } = await db.query<{ count: number }>(
        'SELECT COUNT(*)::int AS count FROM scan_runs WHERE page_id = $1',
        [pageId],
      );
      return rows[0]?.count ?? 0;
    },

    async start(pageId: string, depth: ScanDepth, at: Date): Promise<ScanRun> {
      const { rows } = await db.query<ScanRunRow>(
        `INSERT INTO scan_runs (page_id, depth, status, started_at)
         VALUES ($1, $2, 'running', $3)
         RETURNING ${COLUMNS}`,
        [pageId, depth, at],
      );
      return toScanRun(rows[0]);
    },

    async complete(scanRunId: string, data: CompletedScanData, at: Date): Promise<ScanRun> {
      // Arrays are stringified: pg would otherwise send them as Postgres arrays
      const { rows } = await db.query<ScanRunRow>(
        `UPDATE scan_runs
         SET status = 'completed', completed_at = $2, load_time_ms = $3,
             js_errors = $4, network_errors = $5, console_logs = $6,
             html_snapshot_ref = $7, screenshot_ref = $8, raw_findings = $9
         WHERE id = $1
         RETURNING ${COLUMNS}`,
        [
          scanRunId,
          at,
          data.loadTimeMs,
          JSON.stringify(data.jsErrors),
          JSON.stringify(data.networkErrors),
          JSON.stringify(data.consoleLogs),
          data.htmlSnapshotRef,
          data.screenshotRef,
          JSON.stringify(data.rawFindings),
        ],
      );
      if (!rows[0]) throw new NotFoundError('Scan run', scanRunId);
      return toScanRun(rows[0]);
    },

    async fail(scanRunId: string, errorMessage: string, at: Date): Promise<void> {
      await db.query(
        `UPDATE scan_runs SET status = 'failed', error_message = $2, completed_at = $3 WHERE id = $1`,
        [scanRunId, errorMessage, at],
      );
    },

    async saveAnalysisSummary(scanRunId: string, summary: AnalysisSummary): Promise<void> {
      await db.query('UPDATE scan_runs SET analysis_summary = $2 WHERE id = $1', [
        scanRunId,
        JSON.stringify(summary),
      ]);
    },

    async failStale(startedBefore: Date, errorMessage: string, at: Date): Promise<number> {
      const result = await db.query(
        `UPDATE scan_runs
         SET status = 'failed', error_message = $2, completed_at = $3
         WHERE status = 'running' AND started_at < $1`,
        [startedBefore, errorMessage, at],
      );
      return result.rowCount ?? 0;
    },
  };
}
