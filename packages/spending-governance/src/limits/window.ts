// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { LimitPeriod, LimitWindow } from '../types.js';

const DAY_MS = 86_400_000;

/**
 * Computes the canonical window for `period` that contains `at`.
 *
 * All boundaries are UTC:
 *   daily   — calendar day
 *   weekly  — seven days starting Monday 00:00
 *   monthly — calendar month
 */
export function computeWindow(period: LimitPeriod, at: Date): LimitWindow {
  const [start, end] = windowBounds(period, at);
  return {
    period,
    periodStart: new Date(start).toISOString(),
    periodEnd: new Date(end).toISOString(),
  };
}

function windowBounds(period: LimitPeriod, at: Date): [number, number] {
  const dayStart = Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate());

  switch (period) {
    case 'daily':
      return [dayStart, dayStart + DAY_MS];
    case 'weekly': {
      // getUTCDay(): 0 = Sunday … 6 = Saturday.
      const weekStart = dayStart - ((at.getUTCDay() + 6) % 7) * DAY_MS;
      return [weekStart, weekStart + 7 * DAY_MS];
    }
    case 'monthly':
      return [
        Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), 1),
        Date.UTC(at.getUTCFullYear(), at.getUTCMonth() + 1, 1),
      ];
  }
}

/** True while `at` falls inside `[periodStart, periodEnd)`. */
export function isWindowOpen(window: LimitWindow, at: Date): boolean {
  const time = at.getTime();
  return time >= Date.parse(window.periodStart) && time < Date.parse(window.periodEnd);
}

/** True once the window has fully elapsed. */
export function isWindowElapsed(window: LimitWindow, at: Date): boolean {
  return at.getTime() >= Date.parse(window.periodEnd);
}
