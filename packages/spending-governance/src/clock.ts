// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Injectable source of "now".  Every component that reads time takes a
 * Clock so expiration and window rollover can be tested deterministically.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that only moves when told to.  Intended for tests and simulations.
 */
export class ManualClock implements Clock {
  #current: number;

  constructor(start: Date | string = new Date()) {
    this.#current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.#current);
  }

  set(at: Date | string): void {
    this.#current = new Date(at).getTime();
  }

  advanceMs(ms: number): void {
    this.#current += ms;
  }

  advanceHours(hours: number): void {
    this.advanceMs(hours * 3_600_000);
  }
}
