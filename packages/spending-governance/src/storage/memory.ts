// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { ApprovalSettings, ChildId, SpendingRequest, Timestamp, TrackerState } from '../types.js';
import { trackerKeyString } from './adapter.js';
import type { RequestStorageFilter, StorageAdapter, StoreChanges, TrackerKey } from './adapter.js';

/**
 * In-memory implementation of StorageAdapter.
 *
 * All data is lost when the process exits.  Suitable for tests,
 * single-process deployments and as a reference for persistent backends.
 * Every method completes without yielding between its reads and writes,
 * which makes the insert-if-absent calls and `applyChanges` atomic.
 */
export class MemoryStorageAdapter implements StorageAdapter {
  readonly #settings = new Map<ChildId, ApprovalSettings>();
  readonly #trackers = new Map<string, TrackerState>();
  readonly #requests = new Map<string, SpendingRequest>();

  // -------------------------------------------------------------------------
  // Settings
  // -------------------------------------------------------------------------

  async getSettings(childId: ChildId): Promise<ApprovalSettings | undefined> {
    return this.#settings.get(childId);
  }

  async saveSettings(settings: ApprovalSettings): Promise<void> {
    this.#settings.set(settings.childId, { ...settings });
  }

  async insertSettingsIfAbsent(settings: ApprovalSettings): Promise<ApprovalSettings> {
    const existing = this.#settings.get(settings.childId);
    if (existing !== undefined) {
      return existing;
    }
    this.#settings.set(settings.childId, { ...settings });
    return settings;
  }

  // -------------------------------------------------------------------------
  // Trackers
  // -------------------------------------------------------------------------

  async getTracker(key: TrackerKey): Promise<TrackerState | undefined> {
    return this.#trackers.get(trackerKeyString(key));
  }

  async insertTrackerIfAbsent(tracker: TrackerState): Promise<TrackerState> {
    const key = trackerKeyString(tracker);
    const existing = this.#trackers.get(key);
    if (existing !== undefined) {
      return existing;
    }
    this.#trackers.set(key, { ...tracker });
    return tracker;
  }

  async listTrackers(childId: ChildId): Promise<readonly TrackerState[]> {
    return Array.from(this.#trackers.values())
      .filter((tracker) => tracker.childId === childId)
      .sort((a, b) => a.periodStart.localeCompare(b.periodStart));
  }

  async deleteTrackersEndedBefore(cutoff: Timestamp): Promise<number> {
    let count = 0;
    for (const [key, tracker] of this.#trackers) {
      if (Date.parse(tracker.periodEnd) < Date.parse(cutoff)) {
        this.#trackers.delete(key);
        count++;
      }
    }
    return count;
  }

  // -------------------------------------------------------------------------
  // Requests
  // -------------------------------------------------------------------------

  async getRequest(id: string): Promise<SpendingRequest | undefined> {
    return this.#requests.get(id);
  }

  async listRequests(filter: RequestStorageFilter = {}): Promise<readonly SpendingRequest[]> {
    const cutoff = filter.expiresBefore !== undefined ? Date.parse(filter.expiresBefore) : undefined;
    return Array.from(this.#requests.values())
      .filter((request) => {
        if (filter.childId !== undefined && request.childId !== filter.childId) return false;
        if (filter.status !== undefined && request.status !== filter.status) return false;
        if (cutoff !== undefined && !(Date.parse(request.expiresAt) < cutoff)) return false;
        return true;
      })
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  // -------------------------------------------------------------------------
  // Batched writes
  // -------------------------------------------------------------------------

  async applyChanges(changes: StoreChanges): Promise<void> {
    for (const request of changes.requests ?? []) {
      this.#requests.set(request.id, { ...request });
    }
    for (const tracker of changes.trackers ?? []) {
      this.#trackers.set(trackerKeyString(tracker), { ...tracker });
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    // No-op for in-memory storage.
  }

  async disconnect(): Promise<void> {
    // No-op for in-memory storage.
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }
}
