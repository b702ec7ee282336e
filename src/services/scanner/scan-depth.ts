import type { ScanDepth } from '../../types/index.js';

export interface ScanDepthInput {
  /** Caller override. Wins over every other rule. */
  forced?: ScanDepth;
  priorScanCount: number;
  hasOpenHighIssue: boolean;
  now: Date;
  /** 0 = Sunday … 6 = Saturday, UTC. */
  deepScanWeekday: number;
}

/**
 * deep: first scan ever, an open high-severity issue to re-verify, the
 * weekly deep-scan day, or a manual override. quick otherwise.
 */
export function determineScanDepth(input: ScanDepthInput): ScanDepth {
  if (input.forced) return input.forced;
  if (input.priorScanCount === 0) return 'deep';
  if (input.hasOpenHighIssue) return 'deep';
  if (input.now.getUTCDay() === input.deepScanWeekday) return 'deep';
  return 'quick';
}
