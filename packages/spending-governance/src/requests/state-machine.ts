// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  ApprovedRequest,
  CancelledRequest,
  DeniedRequest,
  ExpiredRequest,
  PendingRequest,
  SpendingRequest,
  Timestamp,
} from '../types.js';
import { InvalidStateError } from '../errors.js';

/**
 * Transitions a spending request may take.  Every transition starts from
 * Pending; the four terminal states have no outgoing edges.
 *
 *   Pending ──approve──▶ Approved
 *           ──deny─────▶ Denied
 *           ──cancel───▶ Cancelled
 *           ──expire───▶ Expired
 */
export type RequestTransition =
  | {
      readonly kind: 'approve';
      readonly at: Timestamp;
      readonly respondedBy: string;
      readonly transactionId: string;
      readonly parentComment?: string;
      readonly isLearningMoment: boolean;
    }
  | {
      readonly kind: 'deny';
      readonly at: Timestamp;
      readonly respondedBy: string;
      readonly parentComment?: string;
      readonly isLearningMoment: boolean;
    }
  | { readonly kind: 'cancel'; readonly at: Timestamp }
  | { readonly kind: 'expire'; readonly at: Timestamp };

export type TerminalRequest = ApprovedRequest | DeniedRequest | CancelledRequest | ExpiredRequest;

function assertNever(value: never): never {
  throw new Error(`Unhandled transition: ${JSON.stringify(value)}`);
}

/** Narrows `request` to Pending or throws InvalidStateError. */
export function assertPending(request: SpendingRequest): PendingRequest {
  if (request.status !== 'pending') {
    throw new InvalidStateError(request.id, request.status);
  }
  return request;
}

/** True once `at` is strictly after the request's expiry. */
export function isPastExpiry(request: SpendingRequest, at: Date): boolean {
  return at.getTime() > Date.parse(request.expiresAt);
}

/**
 * Applies `transition` to a pending request and returns the terminal
 * record.  Throws InvalidStateError when the request is not pending.
 */
export function transition(request: SpendingRequest, change: RequestTransition): TerminalRequest {
  const pending = assertPending(request);
  const { status: _pending, ...base } = pending;

  switch (change.kind) {
    case 'approve':
      return {
        ...base,
        status: 'approved',
        respondedBy: change.respondedBy,
        respondedAt: change.at,
        transactionId: change.transactionId,
        isLearningMoment: change.isLearningMoment,
        ...(change.parentComment !== undefined && { parentComment: change.parentComment }),
      };
    case 'deny':
      return {
        ...base,
        status: 'denied',
        respondedBy: change.respondedBy,
        respondedAt: change.at,
        isLearningMoment: change.isLearningMoment,
        ...(change.parentComment !== undefined && { parentComment: change.parentComment }),
      };
    case 'cancel':
      return { ...base, status: 'cancelled', cancelledAt: change.at };
    case 'expire':
      return { ...base, status: 'expired', expiredAt: change.at };
    default:
      return assertNever(change);
  }
}
