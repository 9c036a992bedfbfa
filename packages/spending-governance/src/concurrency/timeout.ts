// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { SpendingGovernanceError, TransientError } from '../errors.js';

/**
 * Races `task` against a timer.  A timeout, or any failure that is not
 * already a SpendingGovernanceError, is surfaced as a TransientError.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: () => Promise<T>,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientError(operation, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(), timeout]);
  } catch (error: unknown) {
    if (error instanceof SpendingGovernanceError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new TransientError(operation, message, error);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
