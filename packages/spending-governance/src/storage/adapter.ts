// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  ApprovalSettings,
  ChildId,
  LimitPeriod,
  RequestStatus,
  SpendingRequest,
  Timestamp,
  TrackerState,
} from '../types.js';

/** Identifies one tracker: child × period × window start. */
export interface TrackerKey {
  readonly childId: ChildId;
  readonly period: LimitPeriod;
  readonly periodStart: Timestamp;
}

/** Canonical string form of a TrackerKey, usable as a map key. */
export function trackerKeyString(key: TrackerKey): string {
  return `${key.childId}:${key.period}:${key.periodStart}`;
}

/**
 * A batch of writes that must land together.  Every request transition
 * persists the request and the trackers it touched through one batch.
 */
export interface StoreChanges {
  readonly requests?: readonly SpendingRequest[];
  readonly trackers?: readonly TrackerState[];
}

/**
 * Filter criteria for listing requests.  All fields are optional and
 * combined with AND semantics.
 */
export interface RequestStorageFilter {
  childId?: ChildId;
  status?: RequestStatus;
  /** Requests whose `expiresAt` is strictly before this timestamp. */
  expiresBefore?: Timestamp;
}

/**
 * StorageAdapter defines the persistence contract for all engine state.
 *
 * Design principles:
 *   1. All methods are async to support network-backed stores.
 *   2. Settings, trackers and requests have dedicated namespaces.
 *   3. The store performs no locking; per-child serialization belongs to
 *      the engine.  The only atomicity it owns is the two insert-if-absent
 *      calls and the all-or-nothing `applyChanges` batch.
 *   4. Records are immutable values; stores keep their own copies.
 */
export interface StorageAdapter {
  // -------------------------------------------------------------------------
  // Settings
  // -------------------------------------------------------------------------

  getSettings(childId: ChildId): Promise<ApprovalSettings | undefined>;

  saveSettings(settings: ApprovalSettings): Promise<void>;

  /**
   * Stores `settings` unless the child already has some.  Returns the
   * settings that are stored afterwards.
   */
  insertSettingsIfAbsent(settings: ApprovalSettings): Promise<ApprovalSettings>;

  // -------------------------------------------------------------------------
  // Trackers
  // -------------------------------------------------------------------------

  getTracker(key: TrackerKey): Promise<TrackerState | undefined>;

  /**
   * Stores `tracker` unless one already exists for its key.  Returns the
   * tracker that is stored afterwards.
   */
  insertTrackerIfAbsent(tracker: TrackerState): Promise<TrackerState>;

  listTrackers(childId: ChildId): Promise<readonly TrackerState[]>;

  /** Deletes trackers whose window ended before `cutoff`.  Returns the count. */
  deleteTrackersEndedBefore(cutoff: Timestamp): Promise<number>;

  // -------------------------------------------------------------------------
  // Requests
  // -------------------------------------------------------------------------

  getRequest(id: string): Promise<SpendingRequest | undefined>;

  /** Oldest first by `createdAt`. */
  listRequests(filter?: RequestStorageFilter): Promise<readonly SpendingRequest[]>;

  // -------------------------------------------------------------------------
  // Batched writes
  // -------------------------------------------------------------------------

  /** Persists every request and tracker in `changes`, or none of them. */
  applyChanges(changes: StoreChanges): Promise<void>;

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  connect?(): Promise<void>;

  disconnect?(): Promise<void>;

  isHealthy?(): Promise<boolean>;
}
