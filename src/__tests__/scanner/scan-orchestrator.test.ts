import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { runPageScan } from '../../services/scanner/index.js';
import type { RescanTrigger, ScanDeps, ScanEngine, ScanEngineResult } from '../../services/scanner/index.js';
import type { AiAnalyzer, PageAnalysis } from '../../services/ai/index.js';
import type { Notifier } from '../../services/notifications/types.js';
import type { MonitoredPage, RawFinding } from '../../types/index.js';
import { PageNotFoundError, ScanEngineError } from '../../utils/errors.js';
import { MemoryStore } from '../helpers/memory-repositories.js';
import { finding } from '../helpers/fixtures.js';

vi.mock('pino', () => ({
  default: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() }),
}));

const NOW = new Date('2026-03-04T06:00:00Z');

function loaded(rawFindings: RawFinding[], extra: { screenshotRef?: string } = {}): ScanEngineResult {
  return {
    success: true,
    loadTimeMs: 1200,
    rawFindings,
    jsErrors: [],
    networkErrors: [],
    consoleLogs: [],
    htmlSnapshotRef: null,
    screenshotRef: extra.screenshotRef ?? null,
  };
}

describe('runPageScan', () => {
  let store: MemoryStore;
  let page: MonitoredPage;
  let engine: { run: Mock<ScanEngine['run']> };
  let email: Notifier;
  let scheduleRescan: Mock<RescanTrigger>;
  let deps: ScanDeps;

  beforeEach(() => {
    store = new MemoryStore();
    page = store.addPage(store.addTenant().id);
    engine = { run: vi.fn<ScanEngine['run']>() };
    email = { channel: 'email', isConfigured: () => true, send: vi.fn(async () => ({ delivered: true })) };
    scheduleRescan = vi.fn<RescanTrigger>(async () => true);
    deps = {
      repos: store,
      engine,
      ai: null,
      screenshots: null,
      notifiers: { email },
      scheduleRescan,
      settings: {
        confidenceThreshold: 0.7,
        slowPageThresholdMs: 5_000,
        rescanDelayMinutes: 30,
        deepScanWeekday: 0,
        appHost: 'https://app.example.test',
      },
      clock: () => NOW,
    };
  });

  it('records a first sighting without alerting and schedules a confirmation rescan', async () => {
    engine.run.mockResolvedValue(loaded([finding('add_to_cart', 'fail', 0.9)]));

    const outcome = await runPageScan(page.id, {}, deps);

    expect(outcome).toMatchObject({
      status: 'completed',
      depth: 'deep',
      ledger: { created: 1, escalated: 0, refreshed: 0, deescalated: 0, resolved: 0 },
      rescanScheduled: true,
      pageStatus: 'critical',
    });
    const [issue] = store.issuesFor(page.id);
    expect(issue).toMatchObject({ type: 'missing_purchase_control', severity: 'high', status: 'open', occurrenceCount: 1 });
    expect(email.send).not.toHaveBeenCalled();
    expect(scheduleRescan).toHaveBeenCalledWith(page.id, 1_800_000);
    expect(store.pageRows.get(page.id)).toMatchObject({ status: 'critical', lastScannedAt: NOW });
  });

  it('stores the load-time measurement as a finding on the run', async () => {
    engine.run.mockResolvedValue(loaded([]));

    const outcome = await runPageScan(page.id, {}, deps);

    const [run] = store.scanRunsFor(page.id);
    expect(run).toMatchObject({ status: 'completed', loadTimeMs: 1200, completedAt: NOW });
    expect(run.rawFindings.map((f) => [f.check, f.verdict])).toEqual([['page_load_time', 'pass']]);
    expect(outcome).toMatchObject({ pageStatus: 'healthy', rescanScheduled: false });
  });

  it('alerts exactly once when the rescan sees the issue again', async () => {
    engine.run.mockResolvedValue(loaded([finding('add_to_cart', 'fail', 0.9)]));

    await runPageScan(page.id, {}, deps);
    const second = await runPageScan(page.id, {}, deps);
    await runPageScan(page.id, {}, deps);

    expect(second).toMatchObject({ status: 'completed', depth: 'deep', rescanScheduled: false });
    const [issue] = store.issuesFor(page.id);
    expect(issue.occurrenceCount).toBe(3);
    expect(email.send).toHaveBeenCalledTimes(1);
    expect(store.alertsFor(issue.id)).toEqual([expect.objectContaining({ channel: 'email', deliveryStatus: 'sent' })]);
    expect(scheduleRescan).toHaveBeenCalledTimes(1);
  });

  it('resolves the issue when the check passes and sends nothing', async () => {
    engine.run.mockResolvedValueOnce(loaded([finding('add_to_cart', 'fail', 0.9)]));
    engine.run.mockResolvedValueOnce(loaded([finding('add_to_cart', 'pass', 1)]));

    await runPageScan(page.id, {}, deps);
    const outcome = await runPageScan(page.id, {}, deps);

    expect(outcome).toMatchObject({ ledger: { resolved: 1 }, alerts: [], pageStatus: 'healthy' });
    expect(store.issuesFor(page.id)[0]).toMatchObject({ status: 'resolved', resolvedAt: NOW });
    expect(email.send).not.toHaveBeenCalled();
  });

  it('alerts on first sight when AI confirms the finding', async () => {
    const analysis: PageAnalysis = {
      findings: [
        {
          issueType: 'missing_purchase_control',
          severity: 'high',
          confidence: 0.95,
          description: 'No button rendered',
          merchantExplanation: 'Shoppers cannot add this shoe to their cart.',
          suggestedFix: 'Check the product template.',
        },
      ],
      summary: 'Cart button missing',
      pageHealthy: false,
    };
    const ai = {
      analyzePage: vi.fn<AiAnalyzer['analyzePage']>(async () => analysis),
      analyzeIssue: vi.fn<AiAnalyzer['analyzeIssue']>(),
    };
    deps = { ...deps, ai, screenshots: { fetch: async () => Buffer.from('png-bytes') } };
    engine.run.mockResolvedValue(
      loaded([finding('add_to_cart', 'fail', 0.9)], { screenshotRef: 'https://cdn.example.test/shot.png' }),
    );

    const outcome = await runPageScan(page.id, {}, deps);

    expect(outcome).toMatchObject({ status: 'completed', rescanScheduled: false });
    expect(ai.analyzeIssue).not.toHaveBeenCalled();
    expect(email.send).toHaveBeenCalledTimes(1);
    expect(vi.mocked(email.send).mock.calls[0][1].text).toContain('Shoppers cannot add this shoe to their cart.');
    expect(scheduleRescan).not.toHaveBeenCalled();
  });

  it('carries on without AI when the model fails', async () => {
    const ai = {
      analyzePage: vi.fn<AiAnalyzer['analyzePage']>(async () => {
        throw new Error('model overloaded');
      }),
      analyzeIssue: vi.fn<AiAnalyzer['analyzeIssue']>(async () => {
        throw new Error('model overloaded');
      }),
    };
    deps = { ...deps, ai, screenshots: { fetch: async () => Buffer.from('png-bytes') } };
    engine.run.mockResolvedValue(
      loaded([finding('add_to_cart', 'fail', 0.9)], { screenshotRef: 'https://cdn.example.test/shot.png' }),
    );

    const outcome = await runPageScan(page.id, {}, deps);

    expect(outcome).toMatchObject({
      status: 'completed',
      pageAnalysis: { ok: false, error: 'model overloaded' },
      rescanScheduled: true,
      pageStatus: 'critical',
    });
    expect(store.issuesFor(page.id)[0].aiVerifiedAt).toBeNull();
  });

  it('marks the run failed and the page errored when the engine cannot load the page', async () => {
    engine.run.mockResolvedValue({ success: false, error: 'Navigation timeout' });

    await expect(runPageScan(page.id, {}, deps)).rejects.toThrow('Scan engine failure: Navigation timeout');

    expect(store.scanRunsFor(page.id)[0]).toMatchObject({ status: 'failed', errorMessage: 'Navigation timeout' });
    expect(store.pageRows.get(page.id)).toMatchObject({ status: 'error', lastScannedAt: NOW });
    expect(store.issuesFor(page.id)).toEqual([]);
  });

  it('treats a thrown engine error the same way', async () => {
    engine.run.mockRejectedValue(new Error('socket hang up'));

    await expect(runPageScan(page.id, {}, deps)).rejects.toBeInstanceOf(ScanEngineError);
    expect(store.scanRunsFor(page.id)[0]).toMatchObject({ status: 'failed', errorMessage: 'socket hang up' });
  });

  it('skips pages of tenants without monitoring', async () => {
    const other = store.addPage(store.addTenant({ monitoringAllowed: false }).id);

    expect(await runPageScan(other.id, {}, deps)).toEqual({
      status: 'skipped',
      pageId: other.id,
      reason: 'monitoring_not_allowed',
    });
    expect(store.scanRunsFor(other.id)).toEqual([]);
    expect(engine.run).not.toHaveBeenCalled();
  });

  it('skips pages with monitoring switched off', async () => {
    const off = store.addPage(page.tenantId, { monitoringEnabled: false });

    expect(await runPageScan(off.id, {}, deps)).toMatchObject({ status: 'skipped', reason: 'monitoring_disabled' });
  });

  it('throws PageNotFoundError for a soft-deleted page', async () => {
    const gone = store.addPage(page.tenantId, { deletedAt: new Date('2026-03-01T00:00:00Z') });

    await expect(runPageScan(gone.id, {}, deps)).rejects.toBeInstanceOf(PageNotFoundError);
    expect(store.scanRunsFor(gone.id)).toEqual([]);
  });

  it('honours a forced depth', async () => {
    engine.run.mockResolvedValue(loaded([]));

    const outcome = await runPageScan(page.id, { depth: 'quick' }, deps);

    expect(outcome).toMatchObject({ depth: 'quick' });
    expect(engine.run).toHaveBeenCalledWith({ url: page.url, depth: 'quick' });
  });
});
