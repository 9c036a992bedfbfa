// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  ApprovalSettings,
  ChildId,
  LimitStatus,
  ReservedWindow,
  SpendingLimit,
  Timestamp,
  TrackerState,
} from '../types.js';
import type { Clock } from '../clock.js';
import type { KeyedMutex } from '../concurrency/keyed-mutex.js';
import type { PolicyStore } from '../policy/store.js';
import type { StorageAdapter, TrackerKey } from '../storage/adapter.js';
import { trackerKeyString } from '../storage/adapter.js';
import { addMoney, roundMoney, subtractMoneyFloored } from '../money.js';
import { computeWindow, isWindowElapsed } from './window.js';

/**
 * Tracker updates staged for one logical operation.
 *
 * Reads go through the change set first so that several adjustments to the
 * same window (release then commit) compose before anything is persisted.
 */
export class TrackerChangeSet {
  readonly #staged = new Map<string, TrackerState>();

  get(key: TrackerKey): TrackerState | undefined {
    return this.#staged.get(trackerKeyString(key));
  }

  set(tracker: TrackerState): void {
    this.#staged.set(trackerKeyString(tracker), tracker);
  }

  values(): TrackerState[] {
    return Array.from(this.#staged.values());
  }

  get size(): number {
    return this.#staged.size;
  }
}

/** A configured limit paired with its current window's tracker. */
export interface LimitSnapshot {
  readonly limit: SpendingLimit;
  readonly tracker: TrackerState;
}

export interface LimitTrackerOptions {
  store: StorageAdapter;
  policy: PolicyStore;
  mutex: KeyedMutex;
  clock: Clock;
}

/**
 * Maintains one running aggregate per child × period × window.
 *
 * Rollover is lazy: a window is materialized the first time a check or
 * mutation touches it, seeded with the limit's current amount.  Windows
 * that have fully elapsed are never modified again; only retention
 * cleanup removes them.
 *
 * Two layers of API:
 *   plan*()                 — stage changes into a TrackerChangeSet; the
 *                             caller holds the child's lock and persists
 *                             the set together with its own writes.
 *   reserve/release/commit  — standalone operations that take the lock and
 *                             persist their own change set.
 */
export class LimitTracker {
  readonly #store: StorageAdapter;
  readonly #policy: PolicyStore;
  readonly #mutex: KeyedMutex;
  readonly #clock: Clock;

  constructor(options: LimitTrackerOptions) {
    this.#store = options.store;
    this.#policy = options.policy;
    this.#mutex = options.mutex;
    this.#clock = options.clock;
  }

  // ---------------------------------------------------------------------------
  // Windows
  // ---------------------------------------------------------------------------

  /**
   * Returns the tracker for the window of `limit.period` containing `at`,
   * materializing an empty one when none exists yet.  Idempotent.
   */
  async getOrCreateWindow(childId: ChildId, limit: SpendingLimit, at: Date): Promise<TrackerState> {
    const window = computeWindow(limit.period, at);
    const existing = await this.#store.getTracker({ childId, ...window });
    if (existing !== undefined) {
      return existing;
    }
    return this.#store.insertTrackerIfAbsent({
      childId,
      ...window,
      spentAmount: 0,
      pendingAmount: 0,
      limitAmount: limit.limitAmount,
      updatedAt: at.toISOString(),
    });
  }

  /** Current-window trackers for every limit configured in `settings`. */
  async snapshot(settings: ApprovalSettings, at: Date): Promise<LimitSnapshot[]> {
    const snapshots: LimitSnapshot[] = [];
    for (const limit of settings.spendingLimits) {
      const tracker = await this.getOrCreateWindow(settings.childId, limit, at);
      snapshots.push({ limit, tracker });
    }
    return snapshots;
  }

  async getLimitStatuses(childId: ChildId): Promise<LimitStatus[]> {
    const settings = await this.#policy.getSettings(childId);
    const snapshots = await this.snapshot(settings, this.#clock.now());
    return snapshots.map(({ limit, tracker }) => toLimitStatus(limit, tracker));
  }

  async listTrackers(childId: ChildId): Promise<readonly TrackerState[]> {
    return this.#store.listTrackers(childId);
  }

  // ---------------------------------------------------------------------------
  // Planning (caller holds the child's lock)
  // ---------------------------------------------------------------------------

  /**
   * Stages `amount` into the pending total of every limit that tracks
   * pending requests.  Returns the windows reserved against.
   */
  async planReserve(
    settings: ApprovalSettings,
    amount: number,
    at: Date,
    changes: TrackerChangeSet,
  ): Promise<ReservedWindow[]> {
    const reserved: ReservedWindow[] = [];
    for (const limit of settings.spendingLimits) {
      if (!limit.includesPendingRequests) continue;
      const tracker = await this.#load(settings.childId, limit, at, changes);
      changes.set({
        ...tracker,
        pendingAmount: addMoney(tracker.pendingAmount, amount),
        updatedAt: at.toISOString(),
      });
      reserved.push({ period: tracker.period, periodStart: tracker.periodStart });
    }
    return reserved;
  }

  /**
   * Stages the release of `amount` from each reserved window.  Pending
   * totals floor at zero; windows that have elapsed or been purged are
   * left untouched.
   */
  async planRelease(
    childId: ChildId,
    windows: readonly ReservedWindow[],
    amount: number,
    at: Date,
    changes: TrackerChangeSet,
  ): Promise<void> {
    for (const window of windows) {
      const key: TrackerKey = { childId, ...window };
      const tracker = changes.get(key) ?? (await this.#store.getTracker(key));
      if (tracker === undefined || isWindowElapsed(tracker, at)) continue;
      changes.set({
        ...tracker,
        pendingAmount: subtractMoneyFloored(tracker.pendingAmount, amount),
        updatedAt: at.toISOString(),
      });
    }
  }

  /** Stages `amount` as committed spend in every configured limit's current window. */
  async planCommit(
    settings: ApprovalSettings,
    amount: number,
    at: Date,
    changes: TrackerChangeSet,
  ): Promise<void> {
    for (const limit of settings.spendingLimits) {
      const tracker = await this.#load(settings.childId, limit, at, changes);
      changes.set({
        ...tracker,
        spentAmount: addMoney(tracker.spentAmount, amount),
        updatedAt: at.toISOString(),
      });
    }
  }

  /**
   * Stages a new limit amount onto the currently open window so a parent's
   * edit takes effect immediately.
   */
  async planLimitRefresh(
    childId: ChildId,
    limit: SpendingLimit,
    at: Date,
    changes: TrackerChangeSet,
  ): Promise<void> {
    const tracker = await this.#load(childId, limit, at, changes);
    if (tracker.limitAmount === limit.limitAmount) return;
    changes.set({ ...tracker, limitAmount: limit.limitAmount, updatedAt: at.toISOString() });
  }

  // ---------------------------------------------------------------------------
  // Standalone operations
  // ---------------------------------------------------------------------------

  /**
   * Reserves `amount` in every pending-tracking limit for the child.
   * All windows are written in one batch or not at all.
   */
  async reserve(childId: ChildId, amount: number, at: Date): Promise<ReservedWindow[]> {
    return this.#mutex.runExclusive(childId, async () => {
      const settings = await this.#policy.getSettings(childId);
      const changes = new TrackerChangeSet();
      const reserved = await this.planReserve(settings, amount, at, changes);
      await this.#store.applyChanges({ trackers: changes.values() });
      return reserved;
    });
  }

  /** Inverse of reserve().  Safe to call twice; pending floors at zero. */
  async release(
    childId: ChildId,
    windows: readonly ReservedWindow[],
    amount: number,
    at: Date,
  ): Promise<void> {
    await this.#mutex.runExclusive(childId, async () => {
      const changes = new TrackerChangeSet();
      await this.planRelease(childId, windows, amount, at, changes);
      await this.#store.applyChanges({ trackers: changes.values() });
    });
  }

  /**
   * Records `amount` as committed spend.  When `reservedWindows` is given the
   * matching reservation is released in the same batch, which moves the
   * amount from pending to spent; without it the amount is added directly.
   */
  async commit(
    childId: ChildId,
    amount: number,
    at: Date,
    reservedWindows: readonly ReservedWindow[] = [],
  ): Promise<void> {
    await this.#mutex.runExclusive(childId, async () => {
      const settings = await this.#policy.getSettings(childId);
      const changes = new TrackerChangeSet();
      await this.planRelease(childId, reservedWindows, amount, at, changes);
      await this.planCommit(settings, amount, at, changes);
      await this.#store.applyChanges({ trackers: changes.values() });
    });
  }

  /** Deletes trackers whose window ended before `cutoff`. */
  async purgeEndedBefore(cutoff: Timestamp): Promise<number> {
    return this.#store.deleteTrackersEndedBefore(cutoff);
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  async #load(
    childId: ChildId,
    limit: SpendingLimit,
    at: Date,
    changes: TrackerChangeSet,
  ): Promise<TrackerState> {
    const window = computeWindow(limit.period, at);
    return changes.get({ childId, ...window }) ?? this.getOrCreateWindow(childId, limit, at);
  }
}

/** Derives the public status view of a tracker. */
export function toLimitStatus(limit: SpendingLimit, tracker: TrackerState): LimitStatus {
  const used = addMoney(tracker.spentAmount, tracker.pendingAmount);
  return {
    period: tracker.period,
    periodStart: tracker.periodStart,
    periodEnd: tracker.periodEnd,
    limitAmount: tracker.limitAmount,
    spentAmount: tracker.spentAmount,
    pendingAmount: tracker.pendingAmount,
    remainingAmount: roundMoney(tracker.limitAmount - used),
    percentUsed: tracker.limitAmount > 0 ? used / tracker.limitAmount : 1,
    includesPendingRequests: limit.includesPendingRequests,
  };
}
