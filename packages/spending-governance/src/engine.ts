// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  ApprovalSettings,
  CategoryId,
  CheckResult,
  ChildId,
  CreateRequestInput,
  DirectSpendInput,
  DirectSpendResult,
  LimitPeriod,
  LimitStatus,
  PendingRequest,
  RequestStatistics,
  RespondInput,
  SpendingRequest,
  TrackerState,
} from './types.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import type { FamilyDirectory, Ledger, Notifier } from './collaborators.js';
import type { CategoryRuleInput, EngineConfig, SettingsPatch, SpendingLimitInput } from './config.js';
import { parseEngineConfig } from './config.js';
import { KeyedMutex } from './concurrency/keyed-mutex.js';
import { SpendingEventEmitter } from './events.js';
import { LimitTracker, TrackerChangeSet } from './limits/tracker.js';
import { PolicyStore } from './policy/store.js';
import { RequestLifecycle } from './requests/lifecycle.js';
import type { ListRequestsOptions } from './requests/lifecycle.js';
import type { TerminalRequest } from './requests/state-machine.js';
import { RuleEvaluator } from './rules/evaluator.js';
import type { StorageAdapter } from './storage/adapter.js';
import { MemoryStorageAdapter } from './storage/memory.js';
import { TimeoutStorageAdapter } from './storage/timeout.js';
import { ExpirationSweeper } from './sweeper/expiration-sweeper.js';
import type { OTelTracerLike, SpanAttributes } from './telemetry/otel.js';
import { SpendingTracer } from './telemetry/otel.js';

export interface SpendingGovernanceDeps {
  ledger: Ledger;
  notifier: Notifier;
  families: FamilyDirectory;
  /** Defaults to a MemoryStorageAdapter. */
  store?: StorageAdapter;
  /** Defaults to the system clock. */
  clock?: Clock;
  /** Optional OpenTelemetry tracer; every public operation gets a span. */
  tracer?: OTelTracerLike;
  /** Supply an emitter to subscribe before the engine is constructed. */
  events?: SpendingEventEmitter;
}

/**
 * SpendingGovernanceEngine composes PolicyStore, LimitTracker,
 * RuleEvaluator, RequestLifecycle and ExpirationSweeper over one store,
 * one clock and one per-child mutex.
 *
 * Every storage call goes through a TimeoutStorageAdapter, and every
 * ledger or notifier call is bounded by `operationTimeoutMs`, so no
 * operation blocks indefinitely.
 *
 * Public API:
 *   checkSpending()        — evaluate a proposed spend without reserving
 *   createRequest()        — open a Pending request and reserve its amount
 *   respondToRequest()     — approve (debit + commit) or deny
 *   cancelRequest()        — child withdraws a Pending request
 *   expireRequest()        — expire one overdue request (sweeper path)
 *   recordDirectSpend()    — spend that needs no approval
 *   getLimitStatuses()     — current window usage per configured limit
 *   policy writers         — settings, category rules, limits, pause/resume
 *   readonly sweeper       — the ExpirationSweeper instance
 *   readonly events        — the SpendingEventEmitter instance
 */
export class SpendingGovernanceEngine {
  readonly policy: PolicyStore;
  readonly limits: LimitTracker;
  readonly rules: RuleEvaluator;
  readonly requests: RequestLifecycle;
  readonly sweeper: ExpirationSweeper;
  readonly events: SpendingEventEmitter;

  readonly #config: EngineConfig;
  readonly #store: StorageAdapter;
  readonly #mutex = new KeyedMutex();
  readonly #clock: Clock;
  readonly #tracer: SpendingTracer | undefined;

  constructor(deps: SpendingGovernanceDeps, config: unknown = {}) {
    this.#config = parseEngineConfig(config);
    this.#clock = deps.clock ?? systemClock;
    this.#store = new TimeoutStorageAdapter(
      deps.store ?? new MemoryStorageAdapter(),
      this.#config.operationTimeoutMs,
    );
    this.#tracer = deps.tracer !== undefined ? new SpendingTracer({ tracer: deps.tracer }) : undefined;
    this.events = deps.events ?? new SpendingEventEmitter();

    this.policy = new PolicyStore({
      store: this.#store,
      mutex: this.#mutex,
      clock: this.#clock,
      defaults: this.#config.defaults,
    });
    this.limits = new LimitTracker({
      store: this.#store,
      policy: this.policy,
      mutex: this.#mutex,
      clock: this.#clock,
    });
    this.rules = new RuleEvaluator({
      policy: this.policy,
      limits: this.limits,
      clock: this.#clock,
      events: this.events,
      warningThresholdPercent: this.#config.warningThresholdPercent,
    });
    this.requests = new RequestLifecycle({
      store: this.#store,
      policy: this.policy,
      limits: this.limits,
      evaluator: this.rules,
      mutex: this.#mutex,
      clock: this.#clock,
      ledger: deps.ledger,
      notifier: deps.notifier,
      families: deps.families,
      events: this.events,
      operationTimeoutMs: this.#config.operationTimeoutMs,
    });
    this.sweeper = new ExpirationSweeper({
      lifecycle: this.requests,
      limits: this.limits,
      clock: this.#clock,
      events: this.events,
      config: this.#config.sweeper,
    });
  }

  /** The validated configuration, defaults applied. */
  get config(): EngineConfig {
    return this.#config;
  }

  // ---------------------------------------------------------------------------
  // Spending
  // ---------------------------------------------------------------------------

  async checkSpending(childId: ChildId, amount: number, categoryId?: CategoryId): Promise<CheckResult> {
    return this.#trace(
      'check',
      { 'spending.child_id': childId, 'spending.amount': amount },
      () => this.rules.checkSpending(childId, amount, categoryId),
      (result) => ({
        'spending.can_spend': result.canSpend,
        'spending.requires_approval': result.requiresApproval,
        ...(result.blockCode !== undefined && { 'spending.block_code': result.blockCode }),
      }),
    );
  }

  async createRequest(childId: ChildId, input: CreateRequestInput): Promise<PendingRequest> {
    return this.#trace(
      'request.create',
      { 'spending.child_id': childId, 'spending.amount': input.amount },
      () => this.requests.create(childId, input),
      (request) => ({ 'spending.request_id': request.id }),
    );
  }

  async respondToRequest(requestId: string, input: RespondInput): Promise<TerminalRequest> {
    return this.#trace(
      'request.respond',
      { 'spending.request_id': requestId, 'spending.approved': input.approved },
      () => this.requests.respond(requestId, input),
      (request) => ({ 'spending.child_id': request.childId, 'spending.status': request.status }),
    );
  }

  async cancelRequest(requestId: string, childId: ChildId): Promise<TerminalRequest> {
    return this.#trace(
      'request.cancel',
      { 'spending.request_id': requestId, 'spending.child_id': childId },
      () => this.requests.cancel(requestId, childId),
    );
  }

  async expireRequest(requestId: string): Promise<TerminalRequest | null> {
    return this.#trace(
      'request.expire',
      { 'spending.request_id': requestId },
      () => this.requests.expire(requestId),
      (request) => ({ 'spending.expired': request !== null }),
    );
  }

  async recordDirectSpend(childId: ChildId, input: DirectSpendInput): Promise<DirectSpendResult> {
    return this.#trace(
      'direct_spend',
      { 'spending.child_id': childId, 'spending.amount': input.amount },
      () => this.requests.recordDirectSpend(childId, input),
      (result) => ({ 'spending.transaction_id': result.transactionId }),
    );
  }

  async getLimitStatuses(childId: ChildId): Promise<LimitStatus[]> {
    return this.limits.getLimitStatuses(childId);
  }

  async listTrackers(childId: ChildId): Promise<readonly TrackerState[]> {
    return this.limits.listTrackers(childId);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  async getRequest(requestId: string): Promise<SpendingRequest> {
    return this.requests.getRequest(requestId);
  }

  async listRequests(childId: ChildId, options?: ListRequestsOptions): Promise<readonly SpendingRequest[]> {
    return this.requests.listRequests(childId, options);
  }

  async getRequestStatistics(childId: ChildId): Promise<RequestStatistics> {
    return this.requests.getRequestStatistics(childId);
  }

  // ---------------------------------------------------------------------------
  // Policy
  // ---------------------------------------------------------------------------

  async getSettings(childId: ChildId): Promise<ApprovalSettings> {
    return this.policy.getSettings(childId);
  }

  async updateSettings(childId: ChildId, patch: SettingsPatch): Promise<ApprovalSettings> {
    return this.#trace('policy.update', { 'spending.child_id': childId }, () =>
      this.policy.updateSettings(childId, patch),
    );
  }

  async upsertCategoryRule(childId: ChildId, rule: CategoryRuleInput): Promise<ApprovalSettings> {
    return this.#trace('policy.category_rule.upsert', { 'spending.child_id': childId }, () =>
      this.policy.upsertCategoryRule(childId, rule),
    );
  }

  async removeCategoryRule(childId: ChildId, categoryId: CategoryId): Promise<ApprovalSettings> {
    return this.#trace('policy.category_rule.remove', { 'spending.child_id': childId }, () =>
      this.policy.removeCategoryRule(childId, categoryId),
    );
  }

  /**
   * Adds or replaces a limit and applies the new amount to the window that
   * is currently open, so the edit takes effect immediately.
   */
  async upsertSpendingLimit(childId: ChildId, limit: SpendingLimitInput): Promise<ApprovalSettings> {
    return this.#trace('policy.limit.upsert', { 'spending.child_id': childId }, async () => {
      const settings = await this.policy.upsertSpendingLimit(childId, limit);
      const updated = settings.spendingLimits.find((candidate) => candidate.period === limit.period);
      if (updated !== undefined) {
        await this.#mutex.runExclusive(childId, async () => {
          const changes = new TrackerChangeSet();
          await this.limits.planLimitRefresh(childId, updated, this.#clock.now(), changes);
          if (changes.size > 0) {
            await this.#store.applyChanges({ trackers: changes.values() });
          }
        });
      }
      return settings;
    });
  }

  async removeSpendingLimit(childId: ChildId, period: LimitPeriod): Promise<ApprovalSettings> {
    return this.#trace('policy.limit.remove', { 'spending.child_id': childId }, () =>
      this.policy.removeSpendingLimit(childId, period),
    );
  }

  async pauseSpending(childId: ChildId, reason: string): Promise<ApprovalSettings> {
    return this.#trace('policy.pause', { 'spending.child_id': childId }, () =>
      this.policy.setPaused(childId, reason),
    );
  }

  async resumeSpending(childId: ChildId): Promise<ApprovalSettings> {
    return this.#trace('policy.resume', { 'spending.child_id': childId }, () =>
      this.policy.resume(childId),
    );
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /** Connects the store and starts the expiration sweeper. */
  async start(): Promise<void> {
    await this.#store.connect?.();
    this.sweeper.start();
  }

  /** Stops the sweeper, waits for a sweep in flight, then disconnects the store. */
  async stop(): Promise<void> {
    this.sweeper.stop();
    await this.sweeper.drain();
    await this.#store.disconnect?.();
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  #trace<T>(
    operation: string,
    attributes: SpanAttributes,
    executeFn: () => Promise<T>,
    describe?: (result: T) => SpanAttributes,
  ): Promise<T> {
    if (this.#tracer === undefined) {
      return executeFn();
    }
    return this.#tracer.trace(operation, attributes, executeFn, describe);
  }
}
