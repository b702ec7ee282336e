import { describe, expect, it } from 'vitest';
import { failStaleScans, STALE_SCAN_MESSAGE } from '../../services/lifecycle/stale-scans.js';
import { MemoryStore } from '../helpers/memory-repositories.js';

describe('failStaleScans', () => {
  it('fails runs left in running for over an hour and leaves recent ones', async () => {
    const store = new MemoryStore();
    const page = store.addPage(store.addTenant().id);
    const now = new Date('2026-03-05T12:00:00Z');

    const stuck = await store.scanRuns.start(page.id, 'quick', new Date('2026-03-05T10:30:00Z'));
    const recent = await store.scanRuns.start(page.id, 'quick', new Date('2026-03-05T11:30:00Z'));

    expect(await failStaleScans(store.scanRuns, now)).toBe(1);

    expect(store.scanRunRows.get(stuck.id)).toMatchObject({
      status: 'failed',
      errorMessage: STALE_SCAN_MESSAGE,
      completedAt: now,
    });
    expect(store.scanRunRows.get(recent.id)?.status).toBe('running');
  });

  it('returns 0 when nothing is stuck', async () => {
    expect(await failStaleScans(new MemoryStore().scanRuns)).toBe(0);
  });
});
