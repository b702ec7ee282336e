import { describe, expect, it } from 'vitest';
import { computePageStatus } from '../../services/scanner/index.js';
import { makeIssue } from '../helpers/fixtures.js';

describe('computePageStatus', () => {
  it('is healthy with no open issues', () => {
    expect(computePageStatus([])).toBe('healthy');
  });

  it('is critical when any open issue is high', () => {
    expect(computePageStatus([makeIssue({ severity: 'low' }), makeIssue({ severity: 'high' })])).toBe('critical');
  });

  it('is warning for medium or low issues only', () => {
    expect(computePageStatus([makeIssue({ severity: 'medium' })])).toBe('warning');
    expect(computePageStatus([makeIssue({ severity: 'low' })])).toBe('warning');
  });

  it('ignores acknowledged issues', () => {
    expect(computePageStatus([makeIssue({ status: 'acknowledged' })])).toBe('healthy');
    expect(
      computePageStatus([makeIssue({ status: 'acknowledged' }), makeIssue({ severity: 'low' })]),
    ).toBe('warning');
  });
});
