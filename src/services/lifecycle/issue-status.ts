import pino from 'pino';
import type { Issue, IssueStatus } from '../../types/index.js';
import type { IssueRepository, IssuePatch } from '../../db/repositories/types.js';
import { InvalidTransitionError, NotFoundError } from '../../utils/errors.js';

const log = pino({ name: 'issue-status' });

/**
 * Manual status transitions:
 *   open -> acknowledged   (merchant has seen it)
 *   open -> resolved       (merchant fixed it)
 *   acknowledged -> open   (reopen clears the acknowledgement)
 *   acknowledged -> resolved
 *   resolved -> open       (reopen, only while no other active issue of the type exists)
 *
 * Scans never move an acknowledged issue back to open; only reopen does.
 */
const VALID_TRANSITIONS: Record<IssueStatus, IssueStatus[]> = {
  open: ['acknowledged', 'resolved'],
  acknowledged: ['open', 'resolved'],
  resolved: ['open'],
};

export function canTransition(from: IssueStatus, to: IssueStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

async function transition(
  issues: IssueRepository,
  issueId: string,
  to: IssueStatus,
  buildPatch: (issue: Issue) => IssuePatch,
): Promise<Issue> {
  const issue = await issues.findById(issueId);
  if (!issue) {
    throw new NotFoundError('Issue', issueId);
  }

  if (!canTransition(issue.status, to)) {
    log.warn({ issueId, from: issue.status, to }, 'Invalid status transition');
    throw new InvalidTransitionError(issueId, issue.status, to);
  }

  const updated = await issues.update(issueId, { status: to, ...buildPatch(issue) });
  log.info({ issueId, from: issue.status, to }, 'Issue status updated');
  return updated;
}

export async function acknowledgeIssue(
  issues: IssueRepository,
  issueId: string,
  by: string | null,
  now: Date,
): Promise<Issue> {
  return transition(issues, issueId, 'acknowledged', () => ({
    acknowledgedAt: now,
    acknowledgedBy: by,
  }));
}

export async function resolveIssueManually(issues: IssueRepository, issueId: string, now: Date): Promise<Issue> {
  return transition(issues, issueId, 'resolved', () => ({ resolvedAt: now }));
}

/**
 * Reopen an acknowledged or resolved issue. A resolved issue can only come
 * back while the page has no other active issue of the same type.
 */
export async function reopenIssue(issues: IssueRepository, issueId: string): Promise<Issue> {
  const issue = await issues.findById(issueId);
  if (issue?.status === 'resolved') {
    const active = await issues.findActive(issue.pageId, issue.type);
    if (active && active.id !== issue.id) {
      throw new InvalidTransitionError(
        issueId,
        issue.status,
        'open',
        `Another ${issue.type} issue (${active.id}) is already active on this page`,
      );
    }
  }

  return transition(issues, issueId, 'open', () => ({
    acknowledgedAt: null,
    acknowledgedBy: null,
    resolvedAt: null,
  }));
}
