// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * ExpirationSweeper — periodically expire overdue spending requests.
 *
 * Usage:
 * ```typescript
 * const sweeper = engine.sweeper;
 * sweeper.start();
 * // ... later ...
 * sweeper.stop();
 * ```
 *
 * Tests drive `tick()` directly with a ManualClock instead of waiting on the
 * interval timer.
 */

import type { Clock } from '../clock.js';
import type { SweeperConfig } from '../config.js';
import { EVENT_SWEEP_COMPLETED, EVENT_SWEEP_FAILED } from '../events.js';
import type { SpendingEventEmitter } from '../events.js';
import type { LimitTracker } from '../limits/tracker.js';
import type { RequestLifecycle } from '../requests/lifecycle.js';

const DAY_MS = 86_400_000;

export interface SweepFailure {
  readonly requestId: string;
  readonly error: string;
}

export interface SweepReport {
  /** Ids of requests this sweep moved to Expired. */
  readonly expired: readonly string[];
  readonly failed: readonly SweepFailure[];
  readonly purgedTrackers: number;
}

export interface ExpirationSweeperOptions {
  lifecycle: RequestLifecycle;
  limits: LimitTracker;
  clock: Clock;
  events: SpendingEventEmitter;
  config: SweeperConfig;
}

export class ExpirationSweeper {
  readonly #lifecycle: RequestLifecycle;
  readonly #limits: LimitTracker;
  readonly #clock: Clock;
  readonly #events: SpendingEventEmitter;
  readonly #config: SweeperConfig;

  #timer: ReturnType<typeof setInterval> | null = null;
  #running: Promise<SweepReport> | null = null;

  constructor(options: ExpirationSweeperOptions) {
    this.#lifecycle = options.lifecycle;
    this.#limits = options.limits;
    this.#clock = options.clock;
    this.#events = options.events;
    this.#config = options.config;
  }

  get isRunning(): boolean {
    return this.#timer !== null;
  }

  /**
   * Runs one sweep.  Each overdue request is expired independently; a
   * failure is recorded in the report and the batch continues.  Overlapping
   * calls share the sweep already in flight.
   */
  tick(): Promise<SweepReport> {
    if (this.#running !== null) {
      return this.#running;
    }
    const run = this.#sweep().finally(() => {
      this.#running = null;
    });
    this.#running = run;
    return run;
  }

  /** Starts the interval timer.  Calling start() twice is a no-op. */
  start(): void {
    if (this.#timer !== null) return;
    const timer = setInterval(() => {
      void this.tick().catch((error: unknown) => {
        this.#events.emit(EVENT_SWEEP_FAILED, {
          error: error instanceof Error ? error.message : String(error),
          timestamp: this.#clock.now().toISOString(),
        });
      });
    }, this.#config.intervalMs);
    timer.unref();
    this.#timer = timer;
  }

  stop(): void {
    if (this.#timer !== null) {
      clearInterval(this.#timer);
      this.#timer = null;
    }
  }

  /**
   * Resolves once the sweep in flight, if any, has finished.  Its outcome
   * is reported to whoever called tick(), not here.
   */
  async drain(): Promise<void> {
    if (this.#running !== null) {
      await Promise.allSettled([this.#running]);
    }
  }

  async #sweep(): Promise<SweepReport> {
    const now = this.#clock.now();
    const overdue = await this.#lifecycle.listExpired(now);

    const expired: string[] = [];
    const failed: SweepFailure[] = [];
    for (const request of overdue) {
      try {
        const result = await this.#lifecycle.expire(request.id);
        if (result !== null) {
          expired.push(result.id);
        }
      } catch (error: unknown) {
        failed.push({
          requestId: request.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const cutoff = new Date(now.getTime() - this.#config.trackerRetentionDays * DAY_MS);
    const purgedTrackers = await this.#limits.purgeEndedBefore(cutoff.toISOString());

    this.#events.emit(EVENT_SWEEP_COMPLETED, {
      expired: expired.length,
      failed: failed.length,
      purgedTrackers,
      timestamp: now.toISOString(),
    });
    return { expired, failed, purgedTrackers };
  }
}
