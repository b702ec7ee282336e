import type { MonitoredPage, Tenant } from '../../types/index.js';

export type SkipReason = 'monitoring_not_allowed' | 'monitoring_disabled';

/** The billing side owns this flag; the pipeline only reads it. */
export function isMonitoringAllowed(tenant: Tenant): boolean {
  return tenant.monitoringAllowed;
}

export function skipReasonFor(tenant: Tenant, page: MonitoredPage): SkipReason | null {
  if (!isMonitoringAllowed(tenant)) return 'monitoring_not_allowed';
  if (!page.monitoringEnabled) return 'monitoring_disabled';
  return null;
}
