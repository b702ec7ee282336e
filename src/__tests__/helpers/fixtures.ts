import type { Issue, RawFinding, Verdict } from '../../types/index.js';
import { EMPTY_AI_ANNOTATION } from '../../types/index.js';

export function finding(
  check: string,
  verdict: Verdict,
  confidence: number,
  overrides: Partial<RawFinding> = {},
): RawFinding {
  return {
    check,
    verdict,
    confidence,
    message: '',
    technicalDetails: {},
    suggestions: [],
    evidence: {},
    ...overrides,
  };
}

export function makeIssue(overrides: Partial<Issue> = {}): Issue {
  const seen = new Date('2026-03-02T06:00:00Z');
  return {
    ...EMPTY_AI_ANNOTATION,
    id: 'issue-1',
    pageId: 'page-1',
    scanRunId: 'scan-1',
    type: 'missing_purchase_control',
    severity: 'high',
    status: 'open',
    title: 'Add to Cart button may not be working',
    description: 'No add to cart button found',
    evidence: {},
    occurrenceCount: 1,
    firstSeenAt: seen,
    lastSeenAt: seen,
    acknowledgedAt: null,
    acknowledgedBy: null,
    resolvedAt: null,
    ...overrides,
  };
}
