// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { BlockCode, RequestStatus } from './types.js';

/**
 * Base class for all spending-governance errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class SpendingGovernanceError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpendingGovernanceError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown for malformed caller input: a non-positive amount, an empty
 * description, a negative threshold.  Always caller-fixable; never retried.
 */
export class ValidationError extends SpendingGovernanceError {
  /** One entry per failed check, formatted as `path: message`. */
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('VALIDATION_FAILED', `Invalid input: ${issues.join('; ')}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when a policy rule denies a spend.
 *
 * `reason` is user-facing and is surfaced verbatim to the child, so it is
 * also used as the error message.
 */
export class BlockedError extends SpendingGovernanceError {
  readonly blockCode: BlockCode;
  readonly reason: string;

  constructor(blockCode: BlockCode, reason: string) {
    super('SPENDING_BLOCKED', reason);
    this.name = 'BlockedError';
    this.blockCode = blockCode;
    this.reason = reason;
  }
}

/** Thrown when a referenced request, rule or limit does not exist. */
export class NotFoundError extends SpendingGovernanceError {
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string) {
    super('NOT_FOUND', `${entity} "${id}" was not found.`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

/** Thrown when a transition is attempted on a request that is no longer pending. */
export class InvalidStateError extends SpendingGovernanceError {
  readonly requestId: string;
  readonly status: RequestStatus;

  constructor(requestId: string, status: RequestStatus) {
    super(
      'INVALID_STATE',
      `Spending request "${requestId}" is no longer pending (status: ${status}).`,
    );
    this.name = 'InvalidStateError';
    this.requestId = requestId;
    this.status = status;
  }
}

/**
 * Thrown when a collaborator call (ledger, storage, notifier) times out or
 * fails for a reason outside the engine's control.
 *
 * Safe to retry with backoff; the engine itself never retries.
 */
export class TransientError extends SpendingGovernanceError {
  readonly operation: string;
  readonly retryable = true;

  constructor(operation: string, message: string, cause?: unknown) {
    super('TRANSIENT_FAILURE', `${operation} failed: ${message}`, { cause });
    this.name = 'TransientError';
    this.operation = operation;
  }
}

/**
 * Raised by ledger implementations when the child's balance cannot cover
 * a debit at execution time.
 */
export class InsufficientFundsError extends SpendingGovernanceError {
  readonly childId: string;
  readonly requested: number;
  readonly available: number | undefined;

  constructor(childId: string, requested: number, available?: number) {
    const availableClause = available !== undefined ? `, available ${available.toFixed(2)}` : '';
    super(
      'INSUFFICIENT_FUNDS',
      `Insufficient funds for child "${childId}": requested ${requested.toFixed(2)}${availableClause}.`,
    );
    this.name = 'InsufficientFundsError';
    this.childId = childId;
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Thrown when engine configuration is structurally or semantically invalid.
 *
 * The `details` array carries one entry per zod issue so callers can
 * forward them directly to structured loggers.
 */
export class InvalidConfigError extends SpendingGovernanceError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Engine configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}
