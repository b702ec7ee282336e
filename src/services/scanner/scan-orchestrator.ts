import pino from 'pino';
import type {
  AlertChannel,
  Issue,
  PageStatus,
  RawFinding,
  ScanDepth,
} from '../../types/index.js';
import type { Repositories } from '../../db/repositories/types.js';
import { NotFoundError, PageNotFoundError, ScanEngineError, getErrorMessage } from '../../utils/errors.js';
import { attempt } from '../../utils/result.js';
import type { Result } from '../../utils/result.js';
import { createScanContext } from '../logger/correlation.js';
import type { ScanContext } from '../logger/correlation.js';
import { classifyFindings, loadTimeFinding } from '../classifier/index.js';
import { mergeIntoLedger } from '../ledger/index.js';
import type { LedgerOutcome } from '../ledger/index.js';
import { runIssueAnalysis, runPageAnalysis } from '../ai/index.js';
import type { AiAnalyzer, AiStepContext, IssueAiOutcome, PageAnalysisOutcome, ScreenshotFetcher } from '../ai/index.js';
import { dispatchIssueAlerts } from '../alerts/index.js';
import type { IssueAlertOutcome } from '../alerts/index.js';
import type { Notifier } from '../notifications/index.js';
import { skipReasonFor } from './eligibility.js';
import type { SkipReason } from './eligibility.js';
import { determineScanDepth } from './scan-depth.js';
import type { ScanEngine, ScanEngineResult } from './scan-engine.js';
import { computePageStatus } from './page-health.js';
import { scheduleRescanIfNeeded } from './rescan-scheduler.js';
import type { RescanTrigger } from './rescan-scheduler.js';

const log = pino({ name: 'scan-orchestrator' });

export interface PipelineSettings {
  confidenceThreshold: number;
  slowPageThresholdMs: number;
  rescanDelayMinutes: number;
  deepScanWeekday: number;
  appHost: string;
}

export interface ScanDeps {
  repos: Repositories;
  engine: ScanEngine;
  /** Null when no AI backend is configured; every AI step is then skipped. */
  ai: AiAnalyzer | null;
  screenshots: ScreenshotFetcher | null;
  notifiers: Partial<Record<AlertChannel, Notifier>>;
  scheduleRescan: RescanTrigger;
  settings: PipelineSettings;
  clock?: () => Date;
}

export interface ScanOptions {
  depth?: ScanDepth;
}

export interface AlertStepOutcome {
  issueId: string;
  result: Result<IssueAlertOutcome>;
}

export type ScanOutcome =
  | { status: 'skipped'; pageId: string; reason: SkipReason }
  | {
      status: 'completed';
      pageId: string;
      scanRunId: string;
      depth: ScanDepth;
      ledger: LedgerOutcome['counts'];
      pageAnalysis: Result<PageAnalysisOutcome> | null;
      ai: IssueAiOutcome[];
      alerts: AlertStepOutcome[];
      rescanScheduled: boolean;
      pageStatus: PageStatus;
    };

/**
 * The load-time measurement becomes a detector finding of its own unless the
 * engine already reported one.
 */
function withLoadTimeFinding(findings: RawFinding[], loadTimeMs: number | null, thresholdMs: number): RawFinding[] {
  if (findings.some((f) => f.check === 'page_load_time')) return findings;
  const finding = loadTimeFinding(loadTimeMs, thresholdMs);
  return finding ? [...findings, finding] : findings;
}

/**
 * One full scan pass for a page: engine → classifier → ledger → AI →
 * health → alerts → rescan.
 *
 * Throws PageNotFoundError for missing or soft-deleted pages and
 * ScanEngineError when the page could not be scanned; everything after a
 * successful scan that talks to an external adapter fails open and is
 * reported in the outcome instead.
 *
 * Callers must hold the page's single-flight key.
 */
export async function runPageScan(pageId: string, options: ScanOptions, deps: ScanDeps): Promise<ScanOutcome> {
  const clock = deps.clock ?? (() => new Date());
  const { repos, settings } = deps;
  const ctx = createScanContext(pageId);
  const now = clock();

  const page = await repos.pages.findById(pageId, 'live');
  if (!page) {
    throw new PageNotFoundError(pageId);
  }

  const tenant = await repos.tenants.findById(page.tenantId);
  if (!tenant) {
    throw new NotFoundError('Tenant', page.tenantId);
  }

  const skipReason = skipReasonFor(tenant, page);
  if (skipReason) {
    log.info({ ...ctx, reason: skipReason }, 'Scan skipped');
    return { status: 'skipped', pageId, reason: skipReason };
  }

  const [priorScanCount, activeBefore] = await Promise.all([
    repos.scanRuns.countForPage(pageId),
    repos.issues.listActive(pageId),
  ]);
  const depth = determineScanDepth({
    forced: options.depth,
    priorScanCount,
    hasOpenHighIssue: activeBefore.some((i) => i.status === 'open' && i.severity === 'high'),
    now,
    deepScanWeekday: settings.deepScanWeekday,
  });

  const started = await repos.scanRuns.start(pageId, depth, now);
  ctx.scanRunId = started.id;
  log.info({ ...ctx, depth, url: page.url }, 'Scan started');

  // ── Engine ──────────────────────────────────────────────────────────────
  let engineResult: ScanEngineResult;
  let engineCause: unknown;
  try {
    engineResult = await deps.engine.run({ url: page.url, depth });
  } catch (e) {
    engineCause = e;
    engineResult = { success: false, error: getErrorMessage(e) };
  }

  if (!engineResult.success) {
    await repos.scanRuns.fail(started.id, engineResult.error, clock());
    await repos.pages.updateStatus(pageId, 'error');
    await repos.pages.markScanned(pageId, now);
    log.warn({ ...ctx, error: engineResult.error }, 'Scan engine failed');
    throw new ScanEngineError(engineResult.error, { pageId, scanRunId: started.id }, engineCause);
  }

  const rawFindings = withLoadTimeFinding(
    engineResult.rawFindings,
    engineResult.loadTimeMs,
    settings.slowPageThresholdMs,
  );
  const scanRun = await repos.scanRuns.complete(
    started.id,
    {
      loadTimeMs: engineResult.loadTimeMs,
      jsErrors: engineResult.jsErrors,
      networkErrors: engineResult.networkErrors,
      consoleLogs: engineResult.consoleLogs,
      htmlSnapshotRef: engineResult.htmlSnapshotRef,
      screenshotRef: engineResult.screenshotRef,
      rawFindings,
    },
    clock(),
  );
  await repos.pages.markScanned(pageId, now);

  // ── Classify + ledger ───────────────────────────────────────────────────
  const classification = classifyFindings(rawFindings, { confidenceThreshold: settings.confidenceThreshold });
  if (classification.unmapped.length > 0) {
    log.warn({ ...ctx, unmapped: classification.unmapped }, 'Unmapped detector checks ignored');
  }

  const ledger = await mergeIntoLedger(repos.issues, {
    pageId,
    scanRunId: scanRun.id,
    classification,
    now,
  });
  log.info({ ...ctx, ...ledger.counts, dropped: classification.dropped.length }, 'Ledger updated');

  // ── AI enrichment ───────────────────────────────────────────────────────
  let touched: Issue[] = ledger.touched;
  let pageAnalysis: Result<PageAnalysisOutcome> | null = null;
  const aiOutcomes: IssueAiOutcome[] = [];

  if (deps.ai) {
    const aiDeps = { ai: deps.ai, issues: repos.issues, scanRuns: repos.scanRuns };
    const aiCtx: AiStepContext = { page, tenant, scanRun, now };
    const screenshot = await loadScreenshot(deps.screenshots, scanRun.screenshotRef, ctx);

    if (screenshot) {
      pageAnalysis = await runPageAnalysis(aiDeps, aiCtx, touched, screenshot);
      if (pageAnalysis.ok) {
        touched = pageAnalysis.value.issues;
      } else {
        log.error({ ...ctx, err: pageAnalysis.error }, 'AI page analysis failed, continuing without it');
      }
    }

    const enriched: Issue[] = [];
    for (const issue of touched) {
      const step = await runIssueAnalysis(aiDeps, aiCtx, issue, screenshot);
      enriched.push(step.issue);
      aiOutcomes.push(step.outcome);
    }
    touched = enriched;
  }

  // ── Page health ─────────────────────────────────────────────────────────
  const pageStatus = computePageStatus(await repos.issues.listActive(pageId));
  await repos.pages.updateStatus(pageId, pageStatus);

  // ── Alerts ──────────────────────────────────────────────────────────────
  const alertDeps = { alerts: repos.alerts, notifiers: deps.notifiers, appHost: settings.appHost };
  const alerts: AlertStepOutcome[] = [];
  for (const issue of touched) {
    const result = await attempt(() => dispatchIssueAlerts(alertDeps, issue, page, tenant, now));
    if (!result.ok) {
      log.error({ ...ctx, issueId: issue.id, err: result.error }, 'Alert evaluation failed');
    }
    alerts.push({ issueId: issue.id, result });
  }

  // ── Confirmation rescan ─────────────────────────────────────────────────
  const rescanScheduled = await scheduleRescanIfNeeded(
    pageId,
    touched,
    deps.scheduleRescan,
    settings.rescanDelayMinutes,
  );

  log.info({ ...ctx, depth, pageStatus, touched: touched.length, rescanScheduled }, 'Scan completed');

  return {
    status: 'completed',
    pageId,
    scanRunId: scanRun.id,
    depth,
    ledger: ledger.counts,
    pageAnalysis,
    ai: aiOutcomes,
    alerts,
    rescanScheduled,
    pageStatus,
  };
}

async function loadScreenshot(
  fetcher: ScreenshotFetcher | null,
  ref: string | null,
  ctx: ScanContext,
): Promise<Buffer | null> {
  if (!fetcher || !ref) return null;
  const result = await attempt(() => fetcher.fetch(ref));
  if (!result.ok) {
    log.warn({ ...ctx, err: result.error }, 'Screenshot unavailable, skipping page analysis');
    return null;
  }
  return result.value;
}
