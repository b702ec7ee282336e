import type { MonitoredPage, PageStatus } from '../../types/index.js';
import type { Queryable } from './db.js';
import type { PageRepository, PageVisibility } from './types.js';
import { toPage } from './rows.js';
import type { PageRow } from './rows.js';

const COLUMNS = 'id, tenant_id, title, url, monitoring_enabled, last_scanned_at, status, deleted_at';

/** The soft-delete predicate every page query must state. */
export function visibilityClause(visibility: PageVisibility): string {
  return visibility === 'live' ? 'AND deleted_at IS NULL' : '';
}

export function createPageRepository(db: Queryable): PageRepository {
  return {
    async findById(pageId: string, visibility: PageVisibility): Promise<MonitoredPage | null> {
      const { rows } = await db.query<PageRow>(
        `SELECT ${COLUMNS} FROM monitored_pages WHERE id = $1 ${visibilityClause(visibility)}`,
        [pageId],
      );
      return rows[0] ? toPage(rows[0]) : null;
    },

    async listDue(tenantId: string, cutoff: Date, visibility: PageVisibility): Promise<MonitoredPage[]> {
      const { rows } = await db.query<PageRow>(
        `SELECT ${COLUMNS}
         FROM monitored_pages
         WHERE tenant_id = $1
           AND monitoring_enabled
           AND (last_scanned_at IS NULL OR last_scanned_at < $2)
           ${visibilityClause(visibility)}
         ORDER BY last_scanned_at NULLS FIRST`,
        [tenantId, cutoff],
      );
      return rows.map(toPage);
    },

    async updateStatus(pageId: string, status: PageStatus): Promise<void> {
      await db.query('UPDATE monitored_pages SET status = $2, updated_at = NOW() WHERE id = $1', [pageId, status]);
    },

    async markScanned(pageId: string, at: Date): Promise<void> {
      await db.query('UPDATE monitored_pages SET last_scanned_at = $2, updated_at = NOW() WHERE id = $1', [pageId, at]);
    },
  };
}
