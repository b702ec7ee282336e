import pino from 'pino';
import type { Issue, IssueCandidate, IssueType } from '../../types/index.js';
import { EMPTY_AI_ANNOTATION } from '../../types/index.js';
import type { IssueRepository } from '../../db/repositories/types.js';
import type { ClassificationResult } from '../classifier/index.js';
import { planMerge } from './merge-policy.js';

const log = pino({ name: 'issue-ledger' });

export interface LedgerInput {
  pageId: string;
  scanRunId: string;
  classification: Pick<ClassificationResult, 'candidates' | 'passedTypes'>;
  now: Date;
}

export interface LedgerOutcome {
  /** Issues created, escalated or refreshed this pass, in candidate order. */
  touched: Issue[];
  resolved: Issue[];
  counts: {
    created: number;
    escalated: number;
    refreshed: number;
    deescalated: number;
    resolved: number;
  };
}

async function createIssue(
  issues: IssueRepository,
  input: LedgerInput,
  candidate: IssueCandidate,
): Promise<Issue> {
  return issues.create({
    pageId: input.pageId,
    scanRunId: input.scanRunId,
    type: candidate.type,
    severity: candidate.severity,
    title: candidate.title,
    description: candidate.description,
    evidence: candidate.evidence,
    at: input.now,
  });
}

async function resolveIssue(issues: IssueRepository, issue: Issue, now: Date): Promise<Issue> {
  return issues.update(issue.id, { status: 'resolved', resolvedAt: now });
}

/**
 * Merge one pass of classified candidates into the persistent issue ledger.
 *
 * Relies on the caller holding the page's single-flight key: the
 * find-then-write sequences here are not otherwise serialised.
 *
 * Not idempotent: replaying the same pass increments occurrence counts again.
 */
export async function mergeIntoLedger(issues: IssueRepository, input: LedgerInput): Promise<LedgerOutcome> {
  const outcome: LedgerOutcome = {
    touched: [],
    resolved: [],
    counts: { created: 0, escalated: 0, refreshed: 0, deescalated: 0, resolved: 0 },
  };
  const ctx = { pageId: input.pageId, scanRunId: input.scanRunId };

  for (const candidate of input.classification.candidates) {
    const plan = planMerge(await issues.findActive(input.pageId, candidate.type), candidate);

    switch (plan.action) {
      case 'create': {
        const created = await createIssue(issues, input, candidate);
        outcome.touched.push(created);
        outcome.counts.created++;
        log.info({ ...ctx, issueId: created.id, type: candidate.type, severity: candidate.severity }, 'Issue created');
        break;
      }

      case 'escalate': {
        const { active } = plan;
        const escalated = await issues.update(active.id, {
          ...EMPTY_AI_ANNOTATION,
          scanRunId: input.scanRunId,
          severity: candidate.severity,
          title: candidate.title,
          description: candidate.description,
          evidence: candidate.evidence,
          occurrenceCount: active.occurrenceCount + 1,
          lastSeenAt: input.now,
        });
        outcome.touched.push(escalated);
        outcome.counts.escalated++;
        log.info(
          { ...ctx, issueId: active.id, type: candidate.type, from: active.severity, to: candidate.severity },
          'Issue escalated, AI annotation cleared',
        );
        break;
      }

      case 'refresh': {
        const { active } = plan;
        const refreshed = await issues.update(active.id, {
          scanRunId: input.scanRunId,
          title: candidate.title,
          description: candidate.description,
          evidence: candidate.evidence,
          occurrenceCount: active.occurrenceCount + 1,
          lastSeenAt: input.now,
        });
        outcome.touched.push(refreshed);
        outcome.counts.refreshed++;
        log.debug(
          { ...ctx, issueId: active.id, type: candidate.type, occurrenceCount: refreshed.occurrenceCount },
          'Issue refreshed',
        );
        break;
      }

      case 'deescalate': {
        const { active } = plan;
        const resolved = await resolveIssue(issues, active, input.now);
        outcome.resolved.push(resolved);
        outcome.counts.deescalated++;
        log.info(
          { ...ctx, issueId: active.id, type: candidate.type, from: active.severity, to: candidate.severity },
          'Lower severity observed, resolving issue; finding will reopen fresh on its next observation',
        );
        break;
      }
    }
  }

  await resolvePassedTypes(issues, input, input.classification.passedTypes, outcome);

  return outcome;
}

async function resolvePassedTypes(
  issues: IssueRepository,
  input: LedgerInput,
  passedTypes: readonly IssueType[],
  outcome: LedgerOutcome,
): Promise<void> {
  for (const type of passedTypes) {
    const active = await issues.findActive(input.pageId, type);
    if (!active) continue;

    const resolved = await resolveIssue(issues, active, input.now);
    outcome.resolved.push(resolved);
    outcome.counts.resolved++;
    log.info({ pageId: input.pageId, issueId: active.id, type }, 'Check passed, issue resolved');
  }
}
