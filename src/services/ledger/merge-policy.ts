import type { Issue, IssueCandidate } from '../../types/index.js';
import { compareSeverity } from '../../types/severity.js';

export type MergeAction = 'create' | 'escalate' | 'refresh' | 'deescalate';

export type MergePlan =
  | { action: 'create' }
  | { action: Exclude<MergeAction, 'create'>; active: Issue };

/**
 * Decide how a candidate lands on the ledger given the active issue of the
 * same type (open or acknowledged), if there is one.
 *
 *   none              → create
 *   higher severity   → escalate (overwrite, count+1, clear AI annotation)
 *   equal severity    → refresh  (overwrite details, count+1, keep AI annotation)
 *   lower severity    → deescalate (resolve; the lower finding starts fresh next pass)
 */
export function planMerge(active: Issue | null, candidate: IssueCandidate): MergePlan {
  if (!active) return { action: 'create' };

  const diff = compareSeverity(candidate.severity, active.severity);
  if (diff > 0) return { action: 'escalate', active };
  if (diff < 0) return { action: 'deescalate', active };
  return { action: 'refresh', active };
}
