// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Serializes async critical sections per key.
 *
 * Each key holds a promise chain; a caller waits for the previous tail
 * before running.  Sections for different keys never wait on each other.
 * Sections are not re-entrant: a section must not acquire its own key.
 */
export class KeyedMutex {
  readonly #tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, section: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.#tails.set(key, tail);

    await previous;
    try {
      return await section();
    } finally {
      release();
      if (this.#tails.get(key) === tail) {
        this.#tails.delete(key);
      }
    }
  }

  /** True while a section for `key` is running or queued. */
  isLocked(key: string): boolean {
    return this.#tails.has(key);
  }
}
