// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import {
  BlockedError,
  InsufficientFundsError,
  InvalidStateError,
  NotFoundError,
  TransientError,
  ValidationError,
} from '../src/errors.js';
import { EVENT_NOTIFICATION_FAILED, EVENT_REQUEST_RESOLVED } from '../src/events.js';
import type { NotificationFailedEventPayload, RequestResolvedEventPayload } from '../src/events.js';
import { createHarness, START } from './fakes.js';

async function weeklyPending(limitAmount = 20) {
  const harness = createHarness();
  await harness.engine.upsertSpendingLimit('child-1', { period: 'weekly', limitAmount });
  return harness;
}

async function pendingTotal(harness: ReturnType<typeof createHarness>): Promise<number | undefined> {
  const [weekly] = await harness.engine.getLimitStatuses('child-1');
  return weekly?.pendingAmount;
}

describe('RequestLifecycle', () => {
  describe('create', () => {
    it('creates a pending request and reserves its amount', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', {
        amount: 15,
        description: '  Lego set  ',
        categoryId: 'toys',
      });

      expect(request.status).toBe('pending');
      expect(request.description).toBe('Lego set');
      expect(request.createdAt).toBe(START);
      expect(request.expiresAt).toBe('2026-03-07T12:00:00.000Z');
      expect(request.reservedWindows).toEqual([{ period: 'weekly', periodStart: '2026-03-02T00:00:00.000Z' }]);
      expect(await pendingTotal(harness)).toBe(15);
    });

    it('denies a follow-up check that would exceed the weekly limit', async () => {
      const harness = await weeklyPending();
      await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      const result = await harness.engine.checkSpending('child-1', 10);
      expect(result.canSpend).toBe(false);
      expect(result.blockReason).toBe('Would exceed weekly limit of $20.00 ($5.00 remaining).');
    });

    it('notifies the family that approval is needed', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', { amount: 12, description: 'Book' });
      expect(harness.notifier.family).toEqual([
        {
          recipient: 'family-1',
          message: '$12.00 spending request needs approval: Book',
          payload: {
            type: 'approval_needed',
            requestId: request.id,
            childId: 'child-1',
            amount: 12,
            description: 'Book',
          },
        },
      ]);
    });

    it('refuses a request that does not need approval', async () => {
      const harness = await weeklyPending();
      await expect(
        harness.engine.createRequest('child-1', { amount: 5, description: 'Snack' }),
      ).rejects.toBeInstanceOf(ValidationError);
      expect(await pendingTotal(harness)).toBe(0);
    });

    it('refuses a blocked category with the rule reason', async () => {
      const harness = await weeklyPending();
      await harness.engine.upsertCategoryRule('child-1', {
        categoryId: 'candy',
        restriction: 'blocked',
        restrictionReason: 'No candy purchases',
      });
      await expect(
        harness.engine.createRequest('child-1', { amount: 15, description: 'Gummies', categoryId: 'candy' }),
      ).rejects.toMatchObject({ blockCode: 'category_blocked', message: 'No candy purchases' });
    });

    it('rejects an empty description', async () => {
      const harness = await weeklyPending();
      await expect(
        harness.engine.createRequest('child-1', { amount: 15, description: '   ' }),
      ).rejects.toMatchObject({ issues: ['description: description is required'] });
    });
  });

  describe('respond', () => {
    it('approves: debits the ledger and moves pending to spent', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      harness.clock.advanceHours(2);

      const approved = await harness.engine.respondToRequest(request.id, {
        approved: true,
        respondedBy: 'parent-1',
        comment: 'Enjoy it',
        isLearningMoment: true,
      });

      expect(approved).toMatchObject({
        status: 'approved',
        transactionId: 'txn-1',
        respondedBy: 'parent-1',
        respondedAt: '2026-03-04T14:00:00.000Z',
        parentComment: 'Enjoy it',
        isLearningMoment: true,
      });
      expect(harness.ledger.balanceOf('child-1')).toBe(85);
      const [weekly] = await harness.engine.getLimitStatuses('child-1');
      expect(weekly).toMatchObject({ spentAmount: 15, pendingAmount: 0 });
      expect(harness.notifier.child.map((sent) => sent.message)).toEqual(['Your request for $15.00 was approved.']);
    });

    it('denies: releases the reservation without debiting', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      const denied = await harness.engine.respondToRequest(request.id, { approved: false, respondedBy: 'parent-1' });

      expect(denied.status).toBe('denied');
      expect(harness.ledger.debits).toEqual([]);
      expect(await pendingTotal(harness)).toBe(0);
      expect(harness.notifier.child[0]?.payload).toMatchObject({ type: 'request_denied', isLearningMoment: false });
    });

    it('keeps the request pending and the reservation intact when the ledger refuses', async () => {
      const harness = await weeklyPending();
      harness.ledger.setBalance('child-1', 3);
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });

      await expect(
        harness.engine.respondToRequest(request.id, { approved: true, respondedBy: 'parent-1' }),
      ).rejects.toBeInstanceOf(InsufficientFundsError);

      expect((await harness.engine.getRequest(request.id)).status).toBe('pending');
      expect(await pendingTotal(harness)).toBe(15);
    });

    it('wraps an unexpected ledger failure in a retryable TransientError', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      harness.ledger.failWith = new Error('connection reset');

      const error: unknown = await harness.engine
        .respondToRequest(request.id, { approved: true, respondedBy: 'parent-1' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toMatchObject({ retryable: true, message: 'ledger.debit failed: connection reset' });
      expect(await pendingTotal(harness)).toBe(15);
    });

    it('re-checks committed spend against limits at approval time', async () => {
      const harness = createHarness();
      await harness.engine.upsertSpendingLimit('child-1', {
        period: 'weekly',
        limitAmount: 20,
        includesPendingRequests: false,
      });
      const first = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      const second = await harness.engine.createRequest('child-1', { amount: 12, description: 'Board game' });
      await harness.engine.respondToRequest(first.id, { approved: true, respondedBy: 'parent-1' });

      await expect(
        harness.engine.respondToRequest(second.id, { approved: true, respondedBy: 'parent-1' }),
      ).rejects.toMatchObject({
        blockCode: 'limit_exceeded',
        message: 'Approving would exceed the weekly limit of $20.00 ($5.00 remaining).',
      });
      expect(harness.ledger.debits).toHaveLength(1);
      expect((await harness.engine.getRequest(second.id)).status).toBe('pending');
    });

    it('refuses to respond twice', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      await harness.engine.respondToRequest(request.id, { approved: false, respondedBy: 'parent-1' });
      await expect(
        harness.engine.respondToRequest(request.id, { approved: true, respondedBy: 'parent-1' }),
      ).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('throws NotFoundError for an unknown request', async () => {
      const harness = await weeklyPending();
      await expect(
        harness.engine.respondToRequest('missing', { approved: true, respondedBy: 'parent-1' }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('window rollover', () => {
    it('commits an approval to the current window and leaves the reserving window as it was', async () => {
      const harness = await weeklyPending();
      harness.clock.set('2026-03-08T23:00:00.000Z');
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      harness.clock.set('2026-03-09T01:00:00.000Z');

      await harness.engine.respondToRequest(request.id, { approved: true, respondedBy: 'parent-1' });

      const trackers = await harness.engine.listTrackers('child-1');
      expect(trackers.map((tracker) => [tracker.periodStart, tracker.spentAmount, tracker.pendingAmount])).toEqual([
        ['2026-03-02T00:00:00.000Z', 0, 15],
        ['2026-03-09T00:00:00.000Z', 15, 0],
      ]);
    });
  });

  describe('cancel', () => {
    it('lets the requesting child cancel and releases the reservation', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      const cancelled = await harness.engine.cancelRequest(request.id, 'child-1');
      expect(cancelled).toMatchObject({ status: 'cancelled', cancelledAt: START });
      expect(await pendingTotal(harness)).toBe(0);
    });

    it('hides another child\'s request', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      await expect(harness.engine.cancelRequest(request.id, 'child-2')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('expire', () => {
    it('does nothing before the deadline', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      expect(await harness.engine.expireRequest(request.id)).toBeNull();
    });

    it('is a no-op the second time', async () => {
      const harness = await weeklyPending();
      await harness.engine.updateSettings('child-1', { requestExpirationHours: 1 });
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      harness.clock.advanceHours(2);

      const first = await harness.engine.expireRequest(request.id);
      expect(first).toMatchObject({ status: 'expired', expiredAt: '2026-03-04T14:00:00.000Z' });
      expect(await harness.engine.expireRequest(request.id)).toBeNull();
      expect(await pendingTotal(harness)).toBe(0);
      expect(harness.notifier.child).toHaveLength(1);
    });
  });

  describe('races', () => {
    it('lets exactly one of respond, cancel and expire win', async () => {
      const harness = await weeklyPending();
      await harness.engine.updateSettings('child-1', { requestExpirationHours: 1 });
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      harness.clock.advanceHours(2);
      const resolved: RequestResolvedEventPayload[] = [];
      harness.engine.events.on(EVENT_REQUEST_RESOLVED, (payload) => resolved.push(payload));

      const outcomes = await Promise.allSettled([
        harness.engine.respondToRequest(request.id, { approved: true, respondedBy: 'parent-1' }),
        harness.engine.respondToRequest(request.id, { approved: false, respondedBy: 'parent-2' }),
        harness.engine.cancelRequest(request.id, 'child-1'),
        harness.engine.expireRequest(request.id),
      ]);

      const winners = outcomes.filter((outcome) => outcome.status === 'fulfilled' && outcome.value !== null);
      expect(winners).toHaveLength(1);
      for (const outcome of outcomes) {
        if (outcome.status === 'rejected') {
          expect(outcome.reason).toBeInstanceOf(InvalidStateError);
        }
      }
      expect(resolved).toHaveLength(1);

      const [weekly] = await harness.engine.getLimitStatuses('child-1');
      expect(weekly?.pendingAmount).toBe(0);
      expect(weekly?.spentAmount).toBe(resolved[0]?.status === 'approved' ? 15 : 0);
      expect(harness.ledger.debits).toHaveLength(resolved[0]?.status === 'approved' ? 1 : 0);
    });
  });

  describe('notifications', () => {
    it('never lets a notifier failure reach the caller', async () => {
      const harness = await weeklyPending();
      harness.notifier.failWith = new Error('smtp down');
      const failures: NotificationFailedEventPayload[] = [];
      harness.engine.events.on(EVENT_NOTIFICATION_FAILED, (payload) => failures.push(payload));

      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      const approved = await harness.engine.respondToRequest(request.id, { approved: true, respondedBy: 'parent-1' });

      expect(approved.status).toBe('approved');
      expect(failures.map((failure) => [failure.recipient, failure.error])).toEqual([
        ['family', 'notifier.notifyFamily failed: smtp down'],
        ['child', 'notifier.notifyChild failed: smtp down'],
      ]);
    });

    it('completes a resolution when an event listener throws', async () => {
      const harness = await weeklyPending();
      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });
      harness.engine.events.on(EVENT_REQUEST_RESOLVED, () => {
        throw new Error('log sink down');
      });

      const approved = await harness.engine.respondToRequest(request.id, { approved: true, respondedBy: 'parent-1' });

      expect(approved.status).toBe('approved');
      expect((await harness.engine.getRequest(request.id)).status).toBe('approved');
      expect(harness.ledger.debits).toHaveLength(1);
      expect(harness.notifier.child.map((sent) => sent.message)).toEqual(['Your request for $15.00 was approved.']);
    });

    it('keeps a notifier failure from the caller even when its listener throws', async () => {
      const harness = await weeklyPending();
      harness.notifier.failWith = new Error('smtp down');
      harness.engine.events.on(EVENT_NOTIFICATION_FAILED, () => {
        throw new Error('log sink down');
      });

      const request = await harness.engine.createRequest('child-1', { amount: 15, description: 'Lego set' });

      expect(request.status).toBe('pending');
      expect(await harness.engine.listRequests('child-1')).toHaveLength(1);
    });

    it('reports a child with no family as a notification failure', async () => {
      const harness = await weeklyPending();
      const failures: NotificationFailedEventPayload[] = [];
      harness.engine.events.on(EVENT_NOTIFICATION_FAILED, (payload) => failures.push(payload));
      await harness.engine.createRequest('child-9', { amount: 15, description: 'Kite' });
      expect(failures[0]?.error).toBe('No family found for child "child-9".');
      expect(harness.notifier.family).toEqual([]);
    });
  });

  describe('direct spend', () => {
    it('debits and commits an amount under the threshold', async () => {
      const harness = await weeklyPending();
      const result = await harness.engine.recordDirectSpend('child-1', { amount: 8, description: 'Comic' });
      expect(result).toEqual({ transactionId: 'txn-1', newBalance: 92, warnings: [] });
      const [weekly] = await harness.engine.getLimitStatuses('child-1');
      expect(weekly?.spentAmount).toBe(8);
    });

    it('rejects amounts finer than a cent the same way a check does', async () => {
      const harness = await weeklyPending();
      const issues = { issues: ['amount: must be in whole cents'] };
      await expect(harness.engine.checkSpending('child-1', 10.004)).rejects.toMatchObject(issues);
      await expect(
        harness.engine.createRequest('child-1', { amount: 10.004, description: 'Book' }),
      ).rejects.toMatchObject(issues);
      await expect(
        harness.engine.recordDirectSpend('child-1', { amount: 10.004, description: 'Book' }),
      ).rejects.toMatchObject(issues);
      expect(harness.ledger.debits).toEqual([]);
    });

    it('refuses a spend that needs approval', async () => {
      const harness = await weeklyPending();
      const error: unknown = await harness.engine
        .recordDirectSpend('child-1', { amount: 12, description: 'Book' })
        .catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(BlockedError);
      expect(error).toMatchObject({ blockCode: 'approval_required' });
      expect(harness.ledger.debits).toEqual([]);
    });
  });

  describe('queries', () => {
    it('summarizes a child\'s requests', async () => {
      const harness = await weeklyPending(100);
      const a = await harness.engine.createRequest('child-1', { amount: 15, description: 'A' });
      const b = await harness.engine.createRequest('child-1', { amount: 12, description: 'B' });
      const c = await harness.engine.createRequest('child-1', { amount: 11, description: 'C' });
      await harness.engine.createRequest('child-1', { amount: 20, description: 'D' });
      await harness.engine.respondToRequest(a.id, { approved: true, respondedBy: 'parent-1' });
      await harness.engine.respondToRequest(b.id, { approved: true, respondedBy: 'parent-1' });
      await harness.engine.respondToRequest(c.id, { approved: false, respondedBy: 'parent-1' });

      expect(await harness.engine.getRequestStatistics('child-1')).toEqual({
        total: 4,
        pending: 1,
        approved: 2,
        denied: 1,
        cancelled: 0,
        expired: 0,
        approvedAmount: 27,
        pendingAmount: 20,
        approvalRate: 2 / 3,
      });
      const pending = await harness.engine.listRequests('child-1', { status: 'pending' });
      expect(pending.map((request) => request.description)).toEqual(['D']);
    });

    it('lists only pending requests strictly past their expiry', async () => {
      const harness = await weeklyPending(100);
      const first = await harness.engine.createRequest('child-1', { amount: 15, description: 'First' });
      harness.clock.advanceHours(1);
      await harness.engine.createRequest('child-1', { amount: 12, description: 'Second' });

      expect(await harness.engine.requests.listExpired(new Date('2026-03-07T12:00:00.000Z'))).toEqual([]);
      const due = await harness.engine.requests.listExpired(new Date('2026-03-07T12:00:00.001Z'));
      expect(due.map((request) => request.id)).toEqual([first.id]);
    });
  });
});
