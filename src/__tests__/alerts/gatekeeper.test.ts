import { describe, expect, it } from 'vitest';
import { alertFactsFor, shouldAlert } from '../../services/alerts/index.js';
import type { AlertFacts } from '../../services/alerts/index.js';
import { makeIssue } from '../helpers/fixtures.js';

const BOOLS = [true, false] as const;

describe('shouldAlert', () => {
  it('fires only for open, high, unsent and confirmed-or-repeated issues', () => {
    for (const isOpen of BOOLS) {
      for (const isHighSeverity of BOOLS) {
        for (const hasSentAlert of BOOLS) {
          for (const aiConfirmed of BOOLS) {
            for (const occurrenceCount of [1, 2]) {
              const facts: AlertFacts = { isOpen, isHighSeverity, hasSentAlert, aiConfirmed, occurrenceCount };
              const expected = isOpen && isHighSeverity && !hasSentAlert && (aiConfirmed || occurrenceCount === 2);
              expect(shouldAlert(facts)).toBe(expected);
            }
          }
        }
      }
    }
  });

  it('treats any count of two or more as repeated', () => {
    const base = { isOpen: true, isHighSeverity: true, hasSentAlert: false, aiConfirmed: false };
    expect(shouldAlert({ ...base, occurrenceCount: 7 })).toBe(true);
  });
});

describe('alertFactsFor', () => {
  it('reads the gate inputs off the issue', () => {
    expect(alertFactsFor(makeIssue({ occurrenceCount: 3 }), null)).toEqual({
      isOpen: true,
      isHighSeverity: true,
      hasSentAlert: false,
      aiConfirmed: false,
      occurrenceCount: 3,
    });
  });

  it('does not count an acknowledged issue as open', () => {
    expect(alertFactsFor(makeIssue({ status: 'acknowledged' }), null).isOpen).toBe(false);
  });

  it('only counts an explicit AI confirmation', () => {
    expect(alertFactsFor(makeIssue({ aiConfirmed: false }), null).aiConfirmed).toBe(false);
    expect(alertFactsFor(makeIssue({ aiConfirmed: true }), null).aiConfirmed).toBe(true);
  });
});
