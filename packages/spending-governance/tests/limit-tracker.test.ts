// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { LimitTracker, toLimitStatus } from '../src/limits/tracker.js';
import { PolicyStore } from '../src/policy/store.js';
import { ManualClock } from '../src/clock.js';
import { KeyedMutex } from '../src/concurrency/keyed-mutex.js';
import { parseEngineConfig } from '../src/config.js';
import { MemoryStorageAdapter } from '../src/storage/memory.js';
import { START } from './fakes.js';

async function makeTracker() {
  const clock = new ManualClock(START);
  const store = new MemoryStorageAdapter();
  const mutex = new KeyedMutex();
  const policy = new PolicyStore({ store, mutex, clock, defaults: parseEngineConfig({}).defaults });
  const tracker = new LimitTracker({ store, policy, mutex, clock });
  await policy.upsertSpendingLimit('child-1', { period: 'weekly', limitAmount: 20 });
  await policy.upsertSpendingLimit('child-1', { period: 'daily', limitAmount: 8, includesPendingRequests: false });
  return { clock, store, policy, tracker };
}

describe('LimitTracker', () => {
  describe('getOrCreateWindow', () => {
    it('seeds a fresh window from the limit and returns the same one afterwards', async () => {
      const { tracker, clock } = await makeTracker();
      const limit = { period: 'weekly' as const, limitAmount: 20, includesPendingRequests: true };
      const first = await tracker.getOrCreateWindow('child-1', limit, clock.now());
      expect(first).toEqual({
        childId: 'child-1',
        period: 'weekly',
        periodStart: '2026-03-02T00:00:00.000Z',
        periodEnd: '2026-03-09T00:00:00.000Z',
        spentAmount: 0,
        pendingAmount: 0,
        limitAmount: 20,
        updatedAt: START,
      });
      const second = await tracker.getOrCreateWindow('child-1', { ...limit, limitAmount: 99 }, clock.now());
      expect(second.limitAmount).toBe(20);
    });
  });

  describe('reserve / release', () => {
    it('reserves only in limits that track pending requests', async () => {
      const { tracker, clock } = await makeTracker();
      const windows = await tracker.reserve('child-1', 15, clock.now());
      expect(windows).toEqual([{ period: 'weekly', periodStart: '2026-03-02T00:00:00.000Z' }]);

      const statuses = await tracker.getLimitStatuses('child-1');
      expect(statuses.map((status) => [status.period, status.pendingAmount])).toEqual([
        ['weekly', 15],
        ['daily', 0],
      ]);
    });

    it('floors pending at zero when released twice', async () => {
      const { tracker, clock } = await makeTracker();
      const windows = await tracker.reserve('child-1', 6, clock.now());
      await tracker.release('child-1', windows, 6, clock.now());
      await tracker.release('child-1', windows, 6, clock.now());
      const [weekly] = await tracker.getLimitStatuses('child-1');
      expect(weekly?.pendingAmount).toBe(0);
    });

    it('leaves an elapsed window untouched on release', async () => {
      const { tracker, clock, store } = await makeTracker();
      const windows = await tracker.reserve('child-1', 6, clock.now());
      clock.set('2026-03-10T09:00:00.000Z');
      await tracker.release('child-1', windows, 6, clock.now());
      const old = await store.getTracker({ childId: 'child-1', period: 'weekly', periodStart: '2026-03-02T00:00:00.000Z' });
      expect(old?.pendingAmount).toBe(6);
    });
  });

  describe('commit', () => {
    it('moves a reservation from pending to spent', async () => {
      const { tracker, clock } = await makeTracker();
      const windows = await tracker.reserve('child-1', 7.5, clock.now());
      await tracker.commit('child-1', 7.5, clock.now(), windows);
      const [weekly, daily] = await tracker.getLimitStatuses('child-1');
      expect(weekly).toMatchObject({ spentAmount: 7.5, pendingAmount: 0, remainingAmount: 12.5 });
      expect(daily).toMatchObject({ spentAmount: 7.5, pendingAmount: 0, remainingAmount: 0.5 });
    });

    it('adds directly to spent without a reservation', async () => {
      const { tracker, clock } = await makeTracker();
      await tracker.commit('child-1', 4, clock.now());
      const [weekly] = await tracker.getLimitStatuses('child-1');
      expect(weekly?.spentAmount).toBe(4);
      expect(weekly?.percentUsed).toBe(0.2);
    });
  });

  describe('rollover', () => {
    it('opens a new window lazily and keeps the old one for history', async () => {
      const { tracker, clock } = await makeTracker();
      await tracker.commit('child-1', 10, clock.now());
      clock.set('2026-03-09T00:00:00.000Z');
      const [weekly] = await tracker.getLimitStatuses('child-1');
      expect(weekly?.periodStart).toBe('2026-03-09T00:00:00.000Z');
      expect(weekly?.spentAmount).toBe(0);

      const history = await tracker.listTrackers('child-1');
      expect(history.map((entry) => `${entry.period}:${entry.periodStart}:${entry.spentAmount}`)).toEqual([
        'weekly:2026-03-02T00:00:00.000Z:10',
        'daily:2026-03-04T00:00:00.000Z:10',
        'weekly:2026-03-09T00:00:00.000Z:0',
        'daily:2026-03-09T00:00:00.000Z:0',
      ]);
    });

    it('purges windows that ended before the cutoff', async () => {
      const { tracker, clock } = await makeTracker();
      await tracker.commit('child-1', 1, clock.now());
      const purged = await tracker.purgeEndedBefore('2026-03-06T00:00:00.000Z');
      expect(purged).toBe(1);
      const remaining = await tracker.listTrackers('child-1');
      expect(remaining.map((entry) => entry.period)).toEqual(['weekly']);
    });
  });

  it('reports a zero limit as fully used', () => {
    const status = toLimitStatus(
      { period: 'daily', limitAmount: 0, includesPendingRequests: true },
      {
        childId: 'child-1',
        period: 'daily',
        periodStart: '2026-03-04T00:00:00.000Z',
        periodEnd: '2026-03-05T00:00:00.000Z',
        spentAmount: 0,
        pendingAmount: 0,
        limitAmount: 0,
        updatedAt: START,
      },
    );
    expect(status.percentUsed).toBe(1);
    expect(status.remainingAmount).toBe(0);
  });
});
