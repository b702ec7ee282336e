import type { Severity } from './index.js';

const SEVERITY_WEIGHT: Record<Severity, number> = {
  high: 3,
  medium: 2,
  low: 1,
};

export function severityWeight(severity: Severity): number {
  return SEVERITY_WEIGHT[severity];
}

/**
 * Orders severities by weight: positive when `a` outranks `b`,
 * negative when it ranks below, 0 when equal.
 */
export function compareSeverity(a: Severity, b: Severity): number {
  return severityWeight(a) - severityWeight(b);
}

export function severityLabel(severity: Severity): string {
  switch (severity) {
    case 'high':
      return 'High Priority';
    case 'medium':
      return 'Medium Priority';
    case 'low':
      return 'Low Priority';
  }
}
