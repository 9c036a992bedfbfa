// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ApprovalSettings, ChildId, SpendingRequest, Timestamp, TrackerState } from '../types.js';
import { withTimeout } from '../concurrency/timeout.js';
import type { RequestStorageFilter, StorageAdapter, StoreChanges, TrackerKey } from './adapter.js';

/**
 * Decorates a StorageAdapter so no call can block indefinitely.  A call
 * that exceeds `timeoutMs`, or fails with a non-governance error, surfaces
 * as a TransientError naming the storage operation.
 */
export class TimeoutStorageAdapter implements StorageAdapter {
  readonly #inner: StorageAdapter;
  readonly #timeoutMs: number;

  constructor(inner: StorageAdapter, timeoutMs: number) {
    this.#inner = inner;
    this.#timeoutMs = timeoutMs;
  }

  #call<T>(operation: string, task: () => Promise<T>): Promise<T> {
    return withTimeout(`storage.${operation}`, this.#timeoutMs, task);
  }

  getSettings(childId: ChildId): Promise<ApprovalSettings | undefined> {
    return this.#call('getSettings', () => this.#inner.getSettings(childId));
  }

  saveSettings(settings: ApprovalSettings): Promise<void> {
    return this.#call('saveSettings', () => this.#inner.saveSettings(settings));
  }

  insertSettingsIfAbsent(settings: ApprovalSettings): Promise<ApprovalSettings> {
    return this.#call('insertSettingsIfAbsent', () => this.#inner.insertSettingsIfAbsent(settings));
  }

  getTracker(key: TrackerKey): Promise<TrackerState | undefined> {
    return this.#call('getTracker', () => this.#inner.getTracker(key));
  }

  insertTrackerIfAbsent(tracker: TrackerState): Promise<TrackerState> {
    return this.#call('insertTrackerIfAbsent', () => this.#inner.insertTrackerIfAbsent(tracker));
  }

  listTrackers(childId: ChildId): Promise<readonly TrackerState[]> {
    return this.#call('listTrackers', () => this.#inner.listTrackers(childId));
  }

  deleteTrackersEndedBefore(cutoff: Timestamp): Promise<number> {
    return this.#call('deleteTrackersEndedBefore', () =>
      this.#inner.deleteTrackersEndedBefore(cutoff),
    );
  }

  getRequest(id: string): Promise<SpendingRequest | undefined> {
    return this.#call('getRequest', () => this.#inner.getRequest(id));
  }

  listRequests(filter?: RequestStorageFilter): Promise<readonly SpendingRequest[]> {
    return this.#call('listRequests', () => this.#inner.listRequests(filter));
  }

  applyChanges(changes: StoreChanges): Promise<void> {
    return this.#call('applyChanges', () => this.#inner.applyChanges(changes));
  }

  async connect(): Promise<void> {
    if (this.#inner.connect !== undefined) {
      await this.#inner.connect();
    }
  }

  async disconnect(): Promise<void> {
    if (this.#inner.disconnect !== undefined) {
      await this.#inner.disconnect();
    }
  }

  async isHealthy(): Promise<boolean> {
    if (this.#inner.isHealthy === undefined) {
      return true;
    }
    return this.#inner.isHealthy();
  }
}
