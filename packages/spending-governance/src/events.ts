// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Spending-governance event emitter.
 *
 * `SpendingEventEmitter` is the engine's structured log: every request
 * transition, limit warning, notification failure and sweep is published
 * here.  Hosts subscribe and forward payloads to whatever sink they use.
 *
 * Usage:
 * ```ts
 * const events = new SpendingEventEmitter();
 * events.on(EVENT_NOTIFICATION_FAILED, (payload) => {
 *   console.warn('notify failed', payload.recipient, payload.error);
 * });
 * const engine = new SpendingGovernanceEngine({ ...deps, events });
 * ```
 */

import type { ChildId, LimitPeriod, TerminalStatus, Timestamp } from './types.js';

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

/** Emitted after a spending request is created and its reservation placed. */
export const EVENT_REQUEST_CREATED = 'spending:request:created' as const;

/** Emitted after a request reaches a terminal state. */
export const EVENT_REQUEST_RESOLVED = 'spending:request:resolved' as const;

/** Emitted when a spend check projects a window past the warning threshold. */
export const EVENT_LIMIT_WARNING = 'spending:limit:warning' as const;

/** Emitted when a notifier call throws or times out. */
export const EVENT_NOTIFICATION_FAILED = 'spending:notification:failed' as const;

/** Emitted after every expiration sweep. */
export const EVENT_SWEEP_COMPLETED = 'spending:sweep:completed' as const;

/** Emitted when a scheduled sweep fails as a whole. */
export const EVENT_SWEEP_FAILED = 'spending:sweep:failed' as const;

export type SpendingEventName =
  | typeof EVENT_REQUEST_CREATED
  | typeof EVENT_REQUEST_RESOLVED
  | typeof EVENT_LIMIT_WARNING
  | typeof EVENT_NOTIFICATION_FAILED
  | typeof EVENT_SWEEP_COMPLETED
  | typeof EVENT_SWEEP_FAILED;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface RequestCreatedEventPayload {
  readonly requestId: string;
  readonly childId: ChildId;
  readonly amount: number;
  readonly expiresAt: Timestamp;
  readonly timestamp: Timestamp;
}

export interface RequestResolvedEventPayload {
  readonly requestId: string;
  readonly childId: ChildId;
  readonly status: TerminalStatus;
  readonly amount: number;
  readonly timestamp: Timestamp;
}

export interface LimitWarningEventPayload {
  readonly childId: ChildId;
  readonly period: LimitPeriod;
  readonly limitAmount: number;
  /** spent + pending + the checked amount. */
  readonly projectedAmount: number;
  /** Projected usage as a percentage of the limit. */
  readonly percentUsed: number;
  readonly timestamp: Timestamp;
}

export interface NotificationFailedEventPayload {
  readonly recipient: 'family' | 'child';
  readonly childId: ChildId;
  readonly message: string;
  readonly error: string;
  readonly timestamp: Timestamp;
}

export interface SweepCompletedEventPayload {
  readonly expired: number;
  readonly failed: number;
  readonly purgedTrackers: number;
  readonly timestamp: Timestamp;
}

export interface SweepFailedEventPayload {
  readonly error: string;
  readonly timestamp: Timestamp;
}

/**
 * Maps each event name to its payload type.  Drives the generic overloads
 * on `on()`, `off()`, and `emit()`.
 */
export interface SpendingEventPayloadMap {
  [EVENT_REQUEST_CREATED]: RequestCreatedEventPayload;
  [EVENT_REQUEST_RESOLVED]: RequestResolvedEventPayload;
  [EVENT_LIMIT_WARNING]: LimitWarningEventPayload;
  [EVENT_NOTIFICATION_FAILED]: NotificationFailedEventPayload;
  [EVENT_SWEEP_COMPLETED]: SweepCompletedEventPayload;
  [EVENT_SWEEP_FAILED]: SweepFailedEventPayload;
}

export type SpendingEventListener<E extends SpendingEventName> = (
  payload: SpendingEventPayloadMap[E],
) => void;

// ---------------------------------------------------------------------------
// SpendingEventEmitter
// ---------------------------------------------------------------------------

/** Receives an error thrown by a listener, with the event it was handling. */
export type ListenerErrorHandler = (error: unknown, event: SpendingEventName) => void;

export interface SpendingEventEmitterOptions {
  onListenerError?: ListenerErrorHandler;
}

/**
 * Typed publish-subscribe emitter.  Listeners run synchronously in
 * registration order; once-listeners are removed before they are invoked.
 *
 * A listener that throws never interrupts the emitter's caller or the
 * remaining listeners.  Its error goes to `onListenerError` when one is
 * configured.
 */
export class SpendingEventEmitter {
  readonly #onListenerError: ListenerErrorHandler | undefined;
  readonly #listeners: Map<
    SpendingEventName,
    Array<{ listener: (payload: never) => void; once: boolean }>
  > = new Map();

  constructor(options: SpendingEventEmitterOptions = {}) {
    this.#onListenerError = options.onListenerError;
  }

  on<E extends SpendingEventName>(event: E, listener: SpendingEventListener<E>): this {
    this.#addListener(event, listener, false);
    return this;
  }

  once<E extends SpendingEventName>(event: E, listener: SpendingEventListener<E>): this {
    this.#addListener(event, listener, true);
    return this;
  }

  off<E extends SpendingEventName>(event: E, listener: SpendingEventListener<E>): this {
    const entries = this.#listeners.get(event);
    if (entries === undefined) return this;

    const index = entries.findIndex((entry) => entry.listener === listener);
    if (index !== -1) {
      entries.splice(index, 1);
    }
    if (entries.length === 0) {
      this.#listeners.delete(event);
    }
    return this;
  }

  /**
   * Invokes all listeners for `event`.
   *
   * @returns `true` if at least one listener was invoked.
   */
  emit<E extends SpendingEventName>(event: E, payload: SpendingEventPayloadMap[E]): boolean {
    const entries = this.#listeners.get(event);
    if (entries === undefined || entries.length === 0) return false;

    // Listeners added or removed during emission do not affect this call.
    const snapshot = [...entries];

    const remaining = entries.filter((entry) => !entry.once);
    if (remaining.length !== entries.length) {
      if (remaining.length === 0) {
        this.#listeners.delete(event);
      } else {
        this.#listeners.set(event, remaining);
      }
    }

    for (const { listener } of snapshot) {
      try {
        (listener as SpendingEventListener<E>)(payload);
      } catch (error: unknown) {
        this.#onListenerError?.(error, event);
      }
    }

    return true;
  }

  removeAllListeners(event?: SpendingEventName): this {
    if (event !== undefined) {
      this.#listeners.delete(event);
    } else {
      this.#listeners.clear();
    }
    return this;
  }

  listenerCount(event: SpendingEventName): number {
    return this.#listeners.get(event)?.length ?? 0;
  }

  #addListener<E extends SpendingEventName>(
    event: E,
    listener: SpendingEventListener<E>,
    once: boolean,
  ): void {
    const existing = this.#listeners.get(event);
    if (existing !== undefined) {
      existing.push({ listener, once });
    } else {
      this.#listeners.set(event, [{ listener, once }]);
    }
  }
}
