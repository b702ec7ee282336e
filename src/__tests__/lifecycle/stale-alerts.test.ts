import { describe, expect, it, vi } from 'vitest';
import { failStaleAlerts, STALE_ALERT_MESSAGE } from '../../services/lifecycle/stale-alerts.js';
import { MemoryStore } from '../helpers/memory-repositories.js';

vi.mock('pino', () => ({
  default: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() }),
}));

describe('failStaleAlerts', () => {
  it('fails alerts pending past the cutoff and leaves fresh claims and sent rows', async () => {
    const store = new MemoryStore();
    const tenant = store.addTenant();
    const now = new Date('2026-03-05T12:00:00Z');

    const stuck = await store.alerts.claim('issue-a', tenant.id, 'email');
    const fresh = await store.alerts.claim('issue-b', tenant.id, 'email');
    const sent = await store.alerts.claim('issue-c', tenant.id, 'email');
    if (!stuck || !fresh || !sent) throw new Error('claim failed');
    store.alertClaimedAt.set(stuck.id, new Date('2026-03-05T11:30:00Z'));
    store.alertClaimedAt.set(fresh.id, new Date('2026-03-05T11:55:00Z'));
    store.alertClaimedAt.set(sent.id, new Date('2026-03-05T11:00:00Z'));
    await store.alerts.markSent(sent.id, new Date('2026-03-05T11:00:05Z'));

    expect(await failStaleAlerts(store.alerts, now)).toBe(1);

    expect(store.alertRows.get(stuck.id)).toMatchObject({ deliveryStatus: 'failed', lastError: STALE_ALERT_MESSAGE });
    expect(store.alertRows.get(fresh.id)?.deliveryStatus).toBe('pending');
    expect(store.alertRows.get(sent.id)?.deliveryStatus).toBe('sent');
  });
});
