import { beforeEach, describe, expect, it, vi } from 'vitest';
import { dispatchIssueAlerts, enabledChannels } from '../../services/alerts/index.js';
import type { AlertDeps } from '../../services/alerts/index.js';
import type { DeliveryResult, Notifier } from '../../services/notifications/types.js';
import type { AlertChannel, Issue, MonitoredPage, Tenant } from '../../types/index.js';
import { MemoryStore } from '../helpers/memory-repositories.js';

vi.mock('pino', () => ({
  default: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() }),
}));

const NOW = new Date('2026-03-05T06:30:00Z');

function fakeNotifier(channel: AlertChannel, results: DeliveryResult[] = [{ delivered: true }]) {
  const queue = [...results];
  const notifier: Notifier = {
    channel,
    isConfigured: () => true,
    send: vi.fn(async () => queue.shift() ?? { delivered: true }),
  };
  return notifier;
}

describe('dispatchIssueAlerts', () => {
  let store: MemoryStore;
  let tenant: Tenant;
  let page: MonitoredPage;

  beforeEach(() => {
    store = new MemoryStore();
    tenant = store.addTenant();
    page = store.addPage(tenant.id);
  });

  async function highIssue(occurrences: number): Promise<Issue> {
    const issue = await store.issues.create({
      pageId: page.id,
      scanRunId: 'scan-a',
      type: 'missing_purchase_control',
      severity: 'high',
      title: 'Add to Cart button may not be working',
      description: 'No add to cart button found',
      evidence: {},
      at: NOW,
    });
    return store.issues.update(issue.id, { occurrenceCount: occurrences });
  }

  function deps(notifiers: AlertDeps['notifiers']): AlertDeps {
    return { alerts: store.alerts, notifiers, appHost: 'https://app.example.test' };
  }

  it('does nothing for an issue seen once without AI confirmation', async () => {
    const email = fakeNotifier('email');
    const issue = await highIssue(1);

    const outcome = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);

    expect(outcome).toEqual({ issueId: issue.id, eligible: false, deliveries: [] });
    expect(email.send).not.toHaveBeenCalled();
  });

  it('sends once to the tenant address and never again for the same issue', async () => {
    const email = fakeNotifier('email');
    const issue = await highIssue(2);

    const first = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);
    const second = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);

    expect(first.deliveries).toEqual([{ channel: 'email', result: { ok: true, value: 'sent' } }]);
    expect(second.eligible).toBe(false);
    expect(email.send).toHaveBeenCalledTimes(1);
    expect(vi.mocked(email.send).mock.calls[0][0]).toBe('owner@example.test');
    expect(store.alertsFor(issue.id)).toEqual([
      expect.objectContaining({ channel: 'email', deliveryStatus: 'sent', sentAt: NOW, attempts: 1 }),
    ]);
  });

  it('records a failed delivery and retries it on the next pass', async () => {
    const email = fakeNotifier('email', [{ delivered: false, error: 'E-mail API responded 503' }, { delivered: true }]);
    const issue = await highIssue(2);

    const first = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);
    expect(first.deliveries).toEqual([{ channel: 'email', result: { ok: false, error: 'E-mail API responded 503' } }]);
    expect(store.alertsFor(issue.id)[0]).toMatchObject({ deliveryStatus: 'failed', lastError: 'E-mail API responded 503' });

    const second = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);
    expect(second.deliveries).toEqual([{ channel: 'email', result: { ok: true, value: 'sent' } }]);
    expect(store.alertsFor(issue.id)).toEqual([
      expect.objectContaining({ deliveryStatus: 'sent', attempts: 2, lastError: null }),
    ]);
  });

  it('fails the claimed row when the notifier throws, so the next pass sends', async () => {
    const email = fakeNotifier('email');
    vi.mocked(email.send).mockRejectedValueOnce(new Error('socket hang up'));
    const issue = await highIssue(2);

    const first = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);
    expect(first.deliveries).toEqual([{ channel: 'email', result: { ok: false, error: 'socket hang up' } }]);
    expect(store.alertsFor(issue.id)[0]).toMatchObject({ deliveryStatus: 'failed', lastError: 'socket hang up' });

    const second = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);
    expect(second.deliveries).toEqual([{ channel: 'email', result: { ok: true, value: 'sent' } }]);
    expect(email.send).toHaveBeenCalledTimes(2);
  });

  it('fails the claimed row when recording the send fails', async () => {
    const email = fakeNotifier('email');
    vi.spyOn(store.alerts, 'markSent').mockRejectedValueOnce(new Error('connection terminated'));
    const issue = await highIssue(2);

    const outcome = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);

    expect(outcome.deliveries).toEqual([{ channel: 'email', result: { ok: false, error: 'connection terminated' } }]);
    expect(store.alertsFor(issue.id)[0]).toMatchObject({ deliveryStatus: 'failed', lastError: 'connection terminated' });
  });

  it('skips a channel whose alert row is already pending', async () => {
    const email = fakeNotifier('email');
    const issue = await highIssue(2);
    await store.alerts.claim(issue.id, tenant.id, 'email');

    const outcome = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);

    expect(outcome.deliveries).toEqual([{ channel: 'email', result: { ok: true, value: 'claimed_elsewhere' } }]);
    expect(email.send).not.toHaveBeenCalled();
  });

  it('reports a channel without a notifier and claims nothing for it', async () => {
    tenant = { ...tenant, adminAlertsEnabled: true };
    const email = fakeNotifier('email');
    const issue = await highIssue(2);

    const outcome = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);

    expect(outcome.deliveries).toEqual([
      { channel: 'email', result: { ok: true, value: 'sent' } },
      { channel: 'admin', result: { ok: true, value: 'not_configured' } },
    ]);
    expect(store.alertsFor(issue.id).map((a) => a.channel)).toEqual(['email']);
  });

  it('sends an AI-confirmed issue on first sight', async () => {
    const email = fakeNotifier('email');
    const issue = await store.issues.update((await highIssue(1)).id, { aiConfirmed: true });

    const outcome = await dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW);

    expect(outcome.eligible).toBe(true);
    expect(email.send).toHaveBeenCalledTimes(1);
  });

  it('lets only one of two concurrent passes deliver', async () => {
    const email = fakeNotifier('email');
    const issue = await highIssue(2);

    const outcomes = await Promise.all([
      dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW),
      dispatchIssueAlerts(deps({ email }), issue, page, tenant, NOW),
    ]);

    const statuses = outcomes.flatMap((o) => o.deliveries.map((d) => (d.result.ok ? d.result.value : 'error')));
    expect(statuses.sort()).toEqual(['claimed_elsewhere', 'sent']);
    expect(email.send).toHaveBeenCalledTimes(1);
  });
});

describe('enabledChannels', () => {
  it('lists email before admin', () => {
    const store = new MemoryStore();
    expect(enabledChannels(store.addTenant({ adminAlertsEnabled: true }))).toEqual(['email', 'admin']);
    expect(enabledChannels(store.addTenant({ emailAlertsEnabled: false }))).toEqual([]);
  });
});
