import type { Tenant } from '../../types/index.js';
import type { Queryable } from './db.js';
import type { TenantRepository } from './types.js';
import { toTenant } from './rows.js';
import type { TenantRow } from './rows.js';

const COLUMNS = 'id, domain, alert_email, monitoring_allowed, email_alerts_enabled, admin_alerts_enabled';

export function createTenantRepository(db: Queryable): TenantRepository {
  return {
    async findById(tenantId: string): Promise<Tenant | null> {
      const { rows } = await db.query<TenantRow>(`SELECT ${COLUMNS} FROM tenants WHERE id = $1`, [tenantId]);
      return rows[0] ? toTenant(rows[0]) : null;
    },

    async listAll(): Promise<Tenant[]> {
      const { rows } = await db.query<TenantRow>(`SELECT ${COLUMNS} FROM tenants ORDER BY created_at`);
      return rows.map(toTenant);
    },
  };
}
