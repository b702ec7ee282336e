import type { Issue, PageStatus } from '../../types/index.js';

/**
 * Roll open issues up into the page's health badge.
 * Acknowledged issues no longer count against the page.
 */
export function computePageStatus(issues: readonly Issue[]): PageStatus {
  const open = issues.filter((i) => i.status === 'open');
  if (open.some((i) => i.severity === 'high')) return 'critical';
  if (open.some((i) => i.severity === 'medium')) return 'warning';
  if (open.length === 0) return 'healthy';
  return 'warning';
}
