import pino from 'pino';
import type { Issue, MonitoredPage, ScanRun, Tenant } from '../../types/index.js';
import type { IssueRepository, ScanRunRepository } from '../../db/repositories/types.js';
import { ISSUE_CATALOG } from '../classifier/index.js';
import { attempt } from '../../utils/result.js';
import type { Result } from '../../utils/result.js';
import type { AiAnalyzer, AiPageFinding } from './types.js';

const log = pino({ name: 'ai-confirmation' });

export interface AiStepDeps {
  ai: AiAnalyzer;
  issues: IssueRepository;
  scanRuns: ScanRunRepository;
}

export interface AiStepContext {
  page: MonitoredPage;
  tenant: Tenant;
  scanRun: ScanRun;
  now: Date;
}

export interface PageAnalysisOutcome {
  /** The pass's issue list with confirmations applied and AI-only issues appended. */
  issues: Issue[];
  confirmed: number;
  created: number;
}

export interface IssueAiOutcome {
  issueId: string;
  result: Result<'analyzed' | 'skipped'>;
}

function confirmFromFinding(finding: AiPageFinding, now: Date) {
  return {
    aiConfirmed: true,
    aiConfidence: finding.confidence,
    aiReasoning: finding.description,
    aiExplanation: finding.merchantExplanation,
    aiSuggestedFix: finding.suggestedFix,
    aiVerifiedAt: now,
  };
}

async function applyFinding(
  deps: AiStepDeps,
  ctx: AiStepContext,
  issues: Issue[],
  finding: AiPageFinding,
): Promise<'confirmed' | 'created'> {
  const index = issues.findIndex((i) => i.type === finding.issueType);
  if (index >= 0) {
    issues[index] = await deps.issues.update(issues[index].id, confirmFromFinding(finding, ctx.now));
    log.info({ issueId: issues[index].id, type: finding.issueType }, 'AI confirmed detector finding');
    return 'confirmed';
  }

  // Not seen by the detectors this pass, but an active issue of the type may
  // still exist (e.g. acknowledged earlier). Confirm it rather than duplicate it.
  const active = await deps.issues.findActive(ctx.page.id, finding.issueType);
  if (active) {
    issues.push(await deps.issues.update(active.id, confirmFromFinding(finding, ctx.now)));
    log.info({ issueId: active.id, type: finding.issueType }, 'AI confirmed existing active issue');
    return 'confirmed';
  }

  const created = await deps.issues.create({
    pageId: ctx.page.id,
    scanRunId: ctx.scanRun.id,
    type: finding.issueType,
    severity: finding.severity,
    title: ISSUE_CATALOG[finding.issueType].title,
    description: finding.description || ISSUE_CATALOG[finding.issueType].description,
    evidence: { aiDetected: true, aiConfidence: finding.confidence, scanRunId: ctx.scanRun.id },
    at: ctx.now,
    aiConfirmed: true,
    aiConfidence: finding.confidence,
    aiReasoning: finding.description,
    aiExplanation: finding.merchantExplanation,
    aiSuggestedFix: finding.suggestedFix,
    aiVerifiedAt: ctx.now,
  });
  issues.push(created);
  log.info({ issueId: created.id, type: finding.issueType, severity: finding.severity }, 'AI-detected issue created');
  return 'created';
}

/**
 * Page-level analysis: the model looks at the screenshot alongside the
 * detector output. Findings confirm issues from this pass or open new,
 * already-confirmed ones the detectors missed.
 */
export async function runPageAnalysis(
  deps: AiStepDeps,
  ctx: AiStepContext,
  issues: readonly Issue[],
  screenshot: Buffer,
): Promise<Result<PageAnalysisOutcome>> {
  return attempt(async () => {
    const analysis = await deps.ai.analyzePage({
      page: ctx.page,
      tenant: ctx.tenant,
      screenshot,
      rawFindings: ctx.scanRun.rawFindings,
    });

    await deps.scanRuns.saveAnalysisSummary(ctx.scanRun.id, {
      summary: analysis.summary,
      pageHealthy: analysis.pageHealthy,
      findingsCount: analysis.findings.length,
    });

    const next = [...issues];
    const outcome: PageAnalysisOutcome = { issues: next, confirmed: 0, created: 0 };
    for (const finding of analysis.findings) {
      const applied = await applyFinding(deps, ctx, next, finding);
      outcome[applied]++;
    }
    return outcome;
  });
}

/**
 * Per-issue analysis: explanation and suggested fix for every issue not yet
 * verified, plus a confirmation verdict for high severity when a screenshot
 * is available. Issues verified earlier are skipped unless escalation
 * cleared their annotation.
 */
export async function runIssueAnalysis(
  deps: AiStepDeps,
  ctx: AiStepContext,
  issue: Issue,
  screenshot: Buffer | null,
): Promise<{ issue: Issue; outcome: IssueAiOutcome }> {
  if (issue.aiVerifiedAt !== null) {
    return { issue, outcome: { issueId: issue.id, result: { ok: true, value: 'skipped' } } };
  }

  const isHigh = issue.severity === 'high';
  let updated = issue;

  const result = await attempt(async () => {
    const analysis = await deps.ai.analyzeIssue({
      issue,
      page: ctx.page,
      tenant: ctx.tenant,
      screenshot: isHigh ? screenshot : null,
    });

    updated = await deps.issues.update(issue.id, {
      aiVerifiedAt: ctx.now,
      ...(analysis.explanation ? { aiExplanation: analysis.explanation } : {}),
      ...(analysis.suggestedFix ? { aiSuggestedFix: analysis.suggestedFix } : {}),
      ...(isHigh && analysis.confirmed !== null
        ? {
            aiConfirmed: analysis.confirmed,
            aiConfidence: analysis.confidence,
            aiReasoning: analysis.reasoning,
          }
        : {}),
    });
    return 'analyzed' as const;
  });

  if (!result.ok) {
    log.error({ issueId: issue.id, err: result.error }, 'AI analysis failed for issue, continuing without it');
  }

  return { issue: updated, outcome: { issueId: issue.id, result } };
}
