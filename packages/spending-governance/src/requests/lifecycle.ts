// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'crypto';
import type {
  ApprovalSettings,
  ChildId,
  CreateRequestInput,
  DirectSpendInput,
  DirectSpendResult,
  PendingRequest,
  RequestStatistics,
  RequestStatus,
  RespondInput,
  SpendingRequest,
} from '../types.js';
import type { Clock } from '../clock.js';
import type {
  FamilyDirectory,
  Ledger,
  LedgerDebitResult,
  NotificationPayload,
  Notifier,
} from '../collaborators.js';
import type { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { withTimeout } from '../concurrency/timeout.js';
import {
  CreateRequestInputSchema,
  DirectSpendInputSchema,
  RespondInputSchema,
  parseInput,
} from '../config.js';
import { BlockedError, NotFoundError, ValidationError } from '../errors.js';
import {
  EVENT_NOTIFICATION_FAILED,
  EVENT_REQUEST_CREATED,
  EVENT_REQUEST_RESOLVED,
} from '../events.js';
import type { SpendingEventEmitter } from '../events.js';
import { TrackerChangeSet } from '../limits/tracker.js';
import type { LimitTracker } from '../limits/tracker.js';
import { addMoney, formatMoney, roundMoney } from '../money.js';
import type { PolicyStore } from '../policy/store.js';
import type { RuleEvaluator, SpendingEvaluation } from '../rules/evaluator.js';
import type { StorageAdapter } from '../storage/adapter.js';
import { assertPending, isPastExpiry, transition } from './state-machine.js';
import type { TerminalRequest } from './state-machine.js';

const HOUR_MS = 3_600_000;

export interface RequestLifecycleOptions {
  store: StorageAdapter;
  policy: PolicyStore;
  limits: LimitTracker;
  evaluator: RuleEvaluator;
  mutex: KeyedMutex;
  clock: Clock;
  ledger: Ledger;
  notifier: Notifier;
  families: FamilyDirectory;
  events: SpendingEventEmitter;
  /** Upper bound for every ledger, directory and notifier call. */
  operationTimeoutMs: number;
}

export interface ListRequestsOptions {
  status?: RequestStatus;
}

/**
 * Drives spending requests through Pending → Approved | Denied |
 * Cancelled | Expired.
 *
 * Every transition runs inside the child's critical section, re-reads the
 * request, and persists the new request state together with its tracker
 * adjustments in a single `applyChanges` batch.  Exactly one transition
 * can ever succeed for a request; the reservation it placed is released
 * exactly once.
 *
 * Notifications are sent after the critical section.  Their failures are
 * reported as `spending:notification:failed` and never reach the caller.
 */
export class RequestLifecycle {
  readonly #store: StorageAdapter;
  readonly #policy: PolicyStore;
  readonly #limits: LimitTracker;
  readonly #evaluator: RuleEvaluator;
  readonly #mutex: KeyedMutex;
  readonly #clock: Clock;
  readonly #ledger: Ledger;
  readonly #notifier: Notifier;
  readonly #families: FamilyDirectory;
  readonly #events: SpendingEventEmitter;
  readonly #timeoutMs: number;

  constructor(options: RequestLifecycleOptions) {
    this.#store = options.store;
    this.#policy = options.policy;
    this.#limits = options.limits;
    this.#evaluator = options.evaluator;
    this.#mutex = options.mutex;
    this.#clock = options.clock;
    this.#ledger = options.ledger;
    this.#notifier = options.notifier;
    this.#families = options.families;
    this.#events = options.events;
    this.#timeoutMs = options.operationTimeoutMs;
  }

  // ---------------------------------------------------------------------------
  // Transitions
  // ---------------------------------------------------------------------------

  /**
   * Creates a Pending request and reserves its amount in every limit that
   * tracks pending requests.
   *
   * @throws {BlockedError} When a rule denies the spend.
   * @throws {ValidationError} When the input is malformed, or the spend
   *   does not need approval and should be recorded directly instead.
   */
  async create(childId: ChildId, input: CreateRequestInput): Promise<PendingRequest> {
    const parsed = parseInput(CreateRequestInputSchema, input);
    const amount = roundMoney(parsed.amount);

    const request = await this.#mutex.runExclusive(childId, async () => {
      const settings = await this.#policy.getSettings(childId);
      const evaluation = await this.#evaluator.evaluate(childId, amount, parsed.categoryId, settings);
      throwIfDenied(evaluation);
      if (!evaluation.result.requiresApproval) {
        throw new ValidationError([
          'amount: this purchase does not require approval; record it as a direct spend',
        ]);
      }

      const now = this.#clock.now();
      const changes = new TrackerChangeSet();
      const reservedWindows = await this.#limits.planReserve(settings, amount, now, changes);
      const created: PendingRequest = {
        id: randomUUID(),
        childId,
        amount,
        description: parsed.description,
        ...(parsed.categoryId !== undefined && { categoryId: parsed.categoryId }),
        ...(parsed.wishListItemId !== undefined && { wishListItemId: parsed.wishListItemId }),
        status: 'pending',
        createdAt: now.toISOString(),
        expiresAt: new Date(now.getTime() + settings.requestExpirationHours * HOUR_MS).toISOString(),
        reservedWindows,
      };
      await this.#store.applyChanges({ requests: [created], trackers: changes.values() });
      return created;
    });

    this.#events.emit(EVENT_REQUEST_CREATED, {
      requestId: request.id,
      childId,
      amount,
      expiresAt: request.expiresAt,
      timestamp: request.createdAt,
    });

    await this.#notifyFamily(
      request,
      `${formatMoney(amount)} spending request needs approval: ${request.description}`,
      { type: 'approval_needed' },
    );
    return request;
  }

  /**
   * Records a parent's decision.
   *
   * Approval re-checks committed spend against every limit, debits the
   * ledger, then moves the amount from pending to spent.  When the ledger
   * fails nothing is persisted: the request stays Pending with its
   * reservation intact, and the ledger's error propagates.
   *
   * @throws {NotFoundError} When the request does not exist.
   * @throws {InvalidStateError} When the request is no longer pending.
   * @throws {BlockedError} When approving would push committed spend over a limit.
   * @throws {TransientError} When the ledger times out or fails unexpectedly.
   */
  async respond(requestId: string, input: RespondInput): Promise<TerminalRequest> {
    const parsed = parseInput(RespondInputSchema, input);
    const existing = await this.#require(requestId);

    const resolved = await this.#mutex.runExclusive(existing.childId, async () => {
      const pending = assertPending(await this.#require(requestId));
      const now = this.#clock.now();
      const changes = new TrackerChangeSet();
      const response = {
        at: now.toISOString(),
        respondedBy: parsed.respondedBy,
        isLearningMoment: parsed.isLearningMoment,
        ...(parsed.comment !== undefined && { parentComment: parsed.comment }),
      };

      if (!parsed.approved) {
        await this.#limits.planRelease(pending.childId, pending.reservedWindows, pending.amount, now, changes);
        const denied = transition(pending, { kind: 'deny', ...response });
        await this.#store.applyChanges({ requests: [denied], trackers: changes.values() });
        return denied;
      }

      const settings = await this.#policy.getSettings(pending.childId);
      await this.#assertCommitFits(settings, pending.amount, now);
      const debit = await this.#debit(pending.childId, pending.amount, pending.description, pending.categoryId);

      await this.#limits.planRelease(pending.childId, pending.reservedWindows, pending.amount, now, changes);
      await this.#limits.planCommit(settings, pending.amount, now, changes);
      const approved = transition(pending, {
        kind: 'approve',
        transactionId: debit.transactionId,
        ...response,
      });
      await this.#store.applyChanges({ requests: [approved], trackers: changes.values() });
      return approved;
    });

    this.#emitResolved(resolved);
    const verb = resolved.status === 'approved' ? 'approved' : 'denied';
    await this.#notifyChild(
      resolved,
      `Your request for ${formatMoney(resolved.amount)} was ${verb}.`,
      {
        type: resolved.status === 'approved' ? 'request_approved' : 'request_denied',
        isLearningMoment: parsed.isLearningMoment,
        ...(parsed.comment !== undefined && { parentComment: parsed.comment }),
      },
    );
    return resolved;
  }

  /**
   * Cancels a pending request on behalf of the child who made it.  A
   * request belonging to another child is reported as not found.
   */
  async cancel(requestId: string, callerChildId: ChildId): Promise<TerminalRequest> {
    const existing = await this.#store.getRequest(requestId);
    if (existing === undefined || existing.childId !== callerChildId) {
      throw new NotFoundError('Spending request', requestId);
    }

    const cancelled = await this.#mutex.runExclusive(callerChildId, async () => {
      const pending = assertPending(await this.#require(requestId));
      const now = this.#clock.now();
      const changes = new TrackerChangeSet();
      await this.#limits.planRelease(pending.childId, pending.reservedWindows, pending.amount, now, changes);
      const next = transition(pending, { kind: 'cancel', at: now.toISOString() });
      await this.#store.applyChanges({ requests: [next], trackers: changes.values() });
      return next;
    });

    this.#emitResolved(cancelled);
    return cancelled;
  }

  /**
   * Expires a pending request whose deadline has passed.
   *
   * Returns `null` without changing anything when the request is already
   * terminal or not yet due, so a sweeper losing a race to a parent's
   * response is not an error.
   */
  async expire(requestId: string): Promise<TerminalRequest | null> {
    const existing = await this.#require(requestId);

    const expired = await this.#mutex.runExclusive(existing.childId, async () => {
      const current = await this.#require(requestId);
      const now = this.#clock.now();
      if (current.status !== 'pending' || !isPastExpiry(current, now)) {
        return null;
      }
      const changes = new TrackerChangeSet();
      await this.#limits.planRelease(current.childId, current.reservedWindows, current.amount, now, changes);
      const next = transition(current, { kind: 'expire', at: now.toISOString() });
      await this.#store.applyChanges({ requests: [next], trackers: changes.values() });
      return next;
    });

    if (expired === null) {
      return null;
    }
    this.#emitResolved(expired);
    await this.#notifyChild(
      expired,
      `Your request for ${formatMoney(expired.amount)} expired before a parent responded.`,
      { type: 'request_expired' },
    );
    return expired;
  }

  // ---------------------------------------------------------------------------
  // Direct spend
  // ---------------------------------------------------------------------------

  /**
   * Spends without a request.  Allowed only when the rules neither deny the
   * spend nor require approval; the amount is committed to every configured
   * limit's current window.
   *
   * @throws {BlockedError} With `blockCode` "approval_required" when a
   *   request must be created instead.
   */
  async recordDirectSpend(childId: ChildId, input: DirectSpendInput): Promise<DirectSpendResult> {
    const parsed = parseInput(DirectSpendInputSchema, input);
    const amount = roundMoney(parsed.amount);

    return this.#mutex.runExclusive(childId, async () => {
      const settings = await this.#policy.getSettings(childId);
      const evaluation = await this.#evaluator.evaluate(childId, amount, parsed.categoryId, settings);
      throwIfDenied(evaluation);
      if (evaluation.result.requiresApproval) {
        throw new BlockedError(
          'approval_required',
          'This purchase needs a parent\'s approval. Send a spending request instead.',
        );
      }

      const debit = await this.#debit(childId, amount, parsed.description, parsed.categoryId);
      const changes = new TrackerChangeSet();
      await this.#limits.planCommit(settings, amount, this.#clock.now(), changes);
      await this.#store.applyChanges({ trackers: changes.values() });
      return {
        transactionId: debit.transactionId,
        newBalance: debit.newBalance,
        warnings: evaluation.result.warnings,
      };
    });
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async getRequest(requestId: string): Promise<SpendingRequest> {
    return this.#require(requestId);
  }

  /** A child's requests, oldest first. */
  async listRequests(childId: ChildId, options: ListRequestsOptions = {}): Promise<readonly SpendingRequest[]> {
    return this.#store.listRequests({
      childId,
      ...(options.status !== undefined && { status: options.status }),
    });
  }

  /** Pending requests whose deadline is strictly before `at`. */
  async listExpired(at: Date): Promise<readonly SpendingRequest[]> {
    return this.#store.listRequests({ status: 'pending', expiresBefore: at.toISOString() });
  }

  async getRequestStatistics(childId: ChildId): Promise<RequestStatistics> {
    const requests = await this.#store.listRequests({ childId });
    const counts: Record<RequestStatus, number> = {
      pending: 0,
      approved: 0,
      denied: 0,
      cancelled: 0,
      expired: 0,
    };
    let approvedAmount = 0;
    let pendingAmount = 0;
    for (const request of requests) {
      counts[request.status]++;
      if (request.status === 'approved') approvedAmount = addMoney(approvedAmount, request.amount);
      if (request.status === 'pending') pendingAmount = addMoney(pendingAmount, request.amount);
    }
    const answered = counts.approved + counts.denied;
    return {
      total: requests.length,
      ...counts,
      approvedAmount,
      pendingAmount,
      approvalRate: answered > 0 ? counts.approved / answered : 0,
    };
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  async #require(requestId: string): Promise<SpendingRequest> {
    const request = await this.#store.getRequest(requestId);
    if (request === undefined) {
      throw new NotFoundError('Spending request', requestId);
    }
    return request;
  }

  /** Committed spend plus `amount` must fit every limit's current window. */
  async #assertCommitFits(settings: ApprovalSettings, amount: number, at: Date): Promise<void> {
    for (const { limit, tracker } of await this.#limits.snapshot(settings, at)) {
      if (addMoney(tracker.spentAmount, amount) > tracker.limitAmount) {
        const remaining = Math.max(0, roundMoney(tracker.limitAmount - tracker.spentAmount));
        throw new BlockedError(
          'limit_exceeded',
          `Approving would exceed the ${limit.period} limit of ${formatMoney(tracker.limitAmount)} ` +
            `(${formatMoney(remaining)} remaining).`,
        );
      }
    }
  }

  #debit(
    childId: ChildId,
    amount: number,
    description: string,
    categoryId: string | undefined,
  ): Promise<LedgerDebitResult> {
    return withTimeout('ledger.debit', this.#timeoutMs, () =>
      this.#ledger.debit({
        childId,
        amount,
        description,
        ...(categoryId !== undefined && { categoryId }),
      }),
    );
  }

  #emitResolved(request: TerminalRequest): void {
    this.#events.emit(EVENT_REQUEST_RESOLVED, {
      requestId: request.id,
      childId: request.childId,
      status: request.status,
      amount: request.amount,
      timestamp: this.#clock.now().toISOString(),
    });
  }

  async #notifyFamily(
    request: SpendingRequest,
    message: string,
    extra: Pick<NotificationPayload, 'type'>,
  ): Promise<void> {
    try {
      const familyId = await withTimeout('families.getFamilyId', this.#timeoutMs, () =>
        this.#families.getFamilyId(request.childId),
      );
      if (familyId === undefined) {
        this.#notificationFailed(
          'family',
          request.childId,
          message,
          `No family found for child "${request.childId}".`,
        );
        return;
      }
      await withTimeout('notifier.notifyFamily', this.#timeoutMs, () =>
        this.#notifier.notifyFamily(familyId, message, toPayload(request, extra)),
      );
    } catch (error: unknown) {
      this.#notificationFailed('family', request.childId, message, errorMessage(error));
    }
  }

  async #notifyChild(
    request: SpendingRequest,
    message: string,
    extra: Pick<NotificationPayload, 'type' | 'parentComment' | 'isLearningMoment'>,
  ): Promise<void> {
    try {
      await withTimeout('notifier.notifyChild', this.#timeoutMs, () =>
        this.#notifier.notifyChild(request.childId, message, toPayload(request, extra)),
      );
    } catch (error: unknown) {
      this.#notificationFailed('child', request.childId, message, errorMessage(error));
    }
  }

  #notificationFailed(recipient: 'family' | 'child', childId: ChildId, message: string, error: string): void {
    this.#events.emit(EVENT_NOTIFICATION_FAILED, {
      recipient,
      childId,
      message,
      error,
      timestamp: this.#clock.now().toISOString(),
    });
  }
}

function throwIfDenied(evaluation: SpendingEvaluation): void {
  if (evaluation.denial !== undefined) {
    throw new BlockedError(evaluation.denial.blockCode, evaluation.denial.blockReason);
  }
}

function toPayload(
  request: SpendingRequest,
  extra: Pick<NotificationPayload, 'type' | 'parentComment' | 'isLearningMoment'>,
): NotificationPayload {
  return {
    requestId: request.id,
    childId: request.childId,
    amount: request.amount,
    description: request.description,
    ...extra,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
