import { describe, expect, it, vi } from 'vitest';
import { scheduleRescanIfNeeded, selectRescanIssues } from '../../services/scanner/index.js';
import type { RescanTrigger } from '../../services/scanner/index.js';
import { makeIssue } from '../helpers/fixtures.js';

vi.mock('pino', () => ({
  default: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), child: vi.fn().mockReturnThis() }),
}));

describe('selectRescanIssues', () => {
  it('keeps unconfirmed high issues seen once', () => {
    const pending = makeIssue({ id: 'a' });
    const issues = [
      pending,
      makeIssue({ id: 'b', occurrenceCount: 2 }),
      makeIssue({ id: 'c', aiConfirmed: true }),
      makeIssue({ id: 'd', severity: 'medium' }),
      makeIssue({ id: 'e', status: 'resolved' }),
      makeIssue({ id: 'f', aiConfirmed: false }),
    ];

    expect(selectRescanIssues(issues).map((i) => i.id)).toEqual(['a', 'f']);
  });
});

describe('scheduleRescanIfNeeded', () => {
  it('triggers one delayed rescan however many issues need it', async () => {
    const trigger = vi.fn<RescanTrigger>(async () => true);

    const scheduled = await scheduleRescanIfNeeded('page-1', [makeIssue({ id: 'a' }), makeIssue({ id: 'b' })], trigger, 30);

    expect(scheduled).toBe(true);
    expect(trigger).toHaveBeenCalledTimes(1);
    expect(trigger).toHaveBeenCalledWith('page-1', 1_800_000);
  });

  it('does not trigger when nothing needs confirming', async () => {
    const trigger = vi.fn<RescanTrigger>(async () => true);

    expect(await scheduleRescanIfNeeded('page-1', [makeIssue({ occurrenceCount: 2 })], trigger)).toBe(false);
    expect(trigger).not.toHaveBeenCalled();
  });

  it('reports when the queue declined the rescan', async () => {
    const trigger = vi.fn<RescanTrigger>(async () => false);

    expect(await scheduleRescanIfNeeded('page-1', [makeIssue()], trigger)).toBe(false);
  });
});
