import type { Queryable } from './db.js';
import type { Repositories } from './types.js';
import { createAlertRepository } from './alerts.js';
import { createIssueRepository } from './issues.js';
import { createPageRepository } from './pages.js';
import { createScanRunRepository } from './scan-runs.js';
import { createTenantRepository } from './tenants.js';

export function createPgRepositories(db: Queryable): Repositories {
  return {
    pages: createPageRepository(db),
    tenants: createTenantRepository(db),
    scanRuns: createScanRunRepository(db),
    issues: createIssueRepository(db),
    alerts: createAlertRepository(db),
  };
}

export type { Queryable } from './db.js';
export * from './types.js';
