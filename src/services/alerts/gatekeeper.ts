import type { Alert, Issue } from '../../types/index.js';

export interface AlertFacts {
  isOpen: boolean;
  isHighSeverity: boolean;
  /** A *sent* alert exists for (issue, email). Failed or pending rows do not count. */
  hasSentAlert: boolean;
  aiConfirmed: boolean;
  occurrenceCount: number;
}

export const MIN_UNCONFIRMED_OCCURRENCES = 2;

/**
 * open ∧ high ∧ no sent alert ∧ (AI-confirmed ∨ seen at least twice).
 *
 * AI-confirmed issues alert on first sight; unconfirmed ones wait for a
 * second independent observation.
 */
export function shouldAlert(facts: AlertFacts): boolean {
  return (
    facts.isOpen &&
    facts.isHighSeverity &&
    !facts.hasSentAlert &&
    (facts.aiConfirmed || facts.occurrenceCount >= MIN_UNCONFIRMED_OCCURRENCES)
  );
}

export function alertFactsFor(issue: Issue, sentEmailAlert: Alert | null): AlertFacts {
  return {
    isOpen: issue.status === 'open',
    isHighSeverity: issue.severity === 'high',
    hasSentAlert: sentEmailAlert !== null,
    aiConfirmed: issue.aiConfirmed === true,
    occurrenceCount: issue.occurrenceCount,
  };
}
