// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { afterEach, describe, it, expect, vi } from 'vitest';
import { EVENT_SWEEP_COMPLETED } from '../src/events.js';
import type { SweepCompletedEventPayload } from '../src/events.js';
import { createHarness } from './fakes.js';

async function harnessWithShortExpiry() {
  const harness = createHarness();
  await harness.engine.upsertSpendingLimit('child-1', { period: 'monthly', limitAmount: 100 });
  await harness.engine.updateSettings('child-1', { requestExpirationHours: 1 });
  return harness;
}

describe('ExpirationSweeper', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('expires overdue requests and restores the pending total', async () => {
    const harness = await harnessWithShortExpiry();
    const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
    harness.clock.advanceHours(2);

    const report = await harness.engine.sweeper.tick();

    expect(report).toEqual({ expired: [request.id], failed: [], purgedTrackers: 0 });
    expect((await harness.engine.getRequest(request.id)).status).toBe('expired');
    const [monthly] = await harness.engine.getLimitStatuses('child-1');
    expect(monthly?.pendingAmount).toBe(0);
    expect(harness.notifier.child.map((sent) => sent.message)).toEqual([
      'Your request for $15.00 expired before a parent responded.',
    ]);
  });

  it('leaves requests that are not yet due', async () => {
    const harness = await harnessWithShortExpiry();
    await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
    harness.clock.advanceHours(1);

    const report = await harness.engine.sweeper.tick();
    expect(report.expired).toEqual([]);
  });

  it('keeps going when one request fails to expire', async () => {
    const harness = await harnessWithShortExpiry();
    const first = await harness.engine.createRequest('child-1', { amount: 15, description: 'First' });
    const second = await harness.engine.createRequest('child-1', { amount: 12, description: 'Second' });
    harness.clock.advanceHours(2);

    const applyChanges = harness.store.applyChanges.bind(harness.store);
    const spy = vi.spyOn(harness.store, 'applyChanges').mockImplementation(async (changes) => {
      if (changes.requests?.some((request) => request.id === first.id)) {
        throw new Error('disk full');
      }
      return applyChanges(changes);
    });

    const report = await harness.engine.sweeper.tick();
    spy.mockRestore();

    expect(report.expired).toEqual([second.id]);
    expect(report.failed).toEqual([{ requestId: first.id, error: 'storage.applyChanges failed: disk full' }]);
    expect((await harness.engine.getRequest(first.id)).status).toBe('pending');
  });

  it('purges trackers past the retention window and reports the sweep', async () => {
    const harness = createHarness({ sweeper: { trackerRetentionDays: 30 } });
    await harness.engine.upsertSpendingLimit('child-1', { period: 'daily', limitAmount: 50 });
    await harness.engine.recordDirectSpend('child-1', { amount: 5, description: 'Comic' });
    const completed: SweepCompletedEventPayload[] = [];
    harness.engine.events.on(EVENT_SWEEP_COMPLETED, (payload) => completed.push(payload));

    harness.clock.set('2026-04-10T00:00:00.000Z');
    const report = await harness.engine.sweeper.tick();

    expect(report.purgedTrackers).toBe(1);
    expect(await harness.engine.listTrackers('child-1')).toEqual([]);
    expect(completed).toEqual([
      { expired: 0, failed: 0, purgedTrackers: 1, timestamp: '2026-04-10T00:00:00.000Z' },
    ]);
  });

  it('runs on its interval once started and stops cleanly', async () => {
    vi.useFakeTimers();
    const harness = createHarness({ sweeper: { intervalMs: 1_000 } });
    const completed: SweepCompletedEventPayload[] = [];
    harness.engine.events.on(EVENT_SWEEP_COMPLETED, (payload) => completed.push(payload));

    harness.engine.sweeper.start();
    expect(harness.engine.sweeper.isRunning).toBe(true);
    await vi.advanceTimersByTimeAsync(2_500);
    harness.engine.sweeper.stop();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(completed).toHaveLength(2);
    expect(harness.engine.sweeper.isRunning).toBe(false);
  });
});
