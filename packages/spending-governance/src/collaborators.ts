// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { CategoryId, ChildId } from './types.js';

/**
 * External collaborators the engine calls into.  None of them are
 * implemented here; hosts adapt their ledger, messaging and family
 * directory to these interfaces.
 */

export interface LedgerDebitRequest {
  readonly childId: ChildId;
  readonly amount: number;
  readonly description: string;
  readonly categoryId?: CategoryId;
}

export interface LedgerDebitResult {
  readonly transactionId: string;
  readonly newBalance: number;
}

/**
 * The transaction system that actually moves money.
 *
 * Implementations throw `InsufficientFundsError` when the balance cannot
 * cover the debit.
 */
export interface Ledger {
  debit(request: LedgerDebitRequest): Promise<LedgerDebitResult>;
}

export type NotificationType =
  | 'approval_needed'
  | 'request_approved'
  | 'request_denied'
  | 'request_expired';

export interface NotificationPayload {
  readonly type: NotificationType;
  readonly requestId: string;
  readonly childId: ChildId;
  readonly amount: number;
  readonly description: string;
  readonly parentComment?: string;
  readonly isLearningMoment?: boolean;
}

/**
 * Fire-and-forget message delivery.  Failures are reported as
 * `spending:notification:failed` events and never reach the caller.
 */
export interface Notifier {
  notifyFamily(familyId: string, message: string, payload: NotificationPayload): Promise<void>;
  notifyChild(childId: ChildId, message: string, payload: NotificationPayload): Promise<void>;
}

/** Resolves which family (and therefore which parents) a child belongs to. */
export interface FamilyDirectory {
  getFamilyId(childId: ChildId): Promise<string | undefined>;
}
