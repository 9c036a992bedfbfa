// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Domain types for the spending-governance engine.
 *
 * Money is a plain number of currency units rounded to cents (see
 * `money.ts`).  Timestamps are ISO 8601 strings so that every record can be
 * stored and compared without a Date round-trip.
 */

// ---------------------------------------------------------------------------
// Primitive aliases
// ---------------------------------------------------------------------------

/** ISO 8601 timestamp string, e.g. "2026-01-01T00:00:00.000Z". */
export type Timestamp = string;

/** Stable identifier for a child account. */
export type ChildId = string;

/** Stable identifier for a spending category (e.g. "candy", "books"). */
export type CategoryId = string;

// ---------------------------------------------------------------------------
// Policy
// ---------------------------------------------------------------------------

export type CategoryRestriction = 'allowed' | 'requires_approval' | 'blocked';

export interface CategoryRule {
  readonly categoryId: CategoryId;
  readonly restriction: CategoryRestriction;
  /** Overrides the global approval threshold for this category. */
  readonly categoryThreshold?: number;
  /** User-facing explanation shown when the rule blocks or gates a spend. */
  readonly restrictionReason?: string;
}

export type LimitPeriod = 'daily' | 'weekly' | 'monthly';

export interface SpendingLimit {
  readonly period: LimitPeriod;
  readonly limitAmount: number;
  /** When true, pending requests reserve headroom in this limit's window. */
  readonly includesPendingRequests: boolean;
}

/**
 * Per-child approval policy.  Category rules and limits are owned value
 * collections loaded together with the settings; there is no lazy loading.
 */
export interface ApprovalSettings {
  readonly childId: ChildId;
  readonly isEnabled: boolean;
  readonly isPaused: boolean;
  readonly pauseReason?: string;
  readonly approvalThreshold: number;
  readonly maxSinglePurchase?: number;
  readonly autoApproveUnderThreshold: boolean;
  readonly autoApproveTrustedCategories: boolean;
  readonly trustedCategoryIds: readonly CategoryId[];
  readonly requestExpirationHours: number;
  /** At most one rule per category. */
  readonly categoryRules: readonly CategoryRule[];
  /** At most one limit per period. */
  readonly spendingLimits: readonly SpendingLimit[];
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

// ---------------------------------------------------------------------------
// Limit tracking
// ---------------------------------------------------------------------------

/** Concrete `[periodStart, periodEnd)` range a limit period covers. */
export interface LimitWindow {
  readonly period: LimitPeriod;
  readonly periodStart: Timestamp;
  readonly periodEnd: Timestamp;
}

/** Running aggregate for one child × period × window. */
export interface TrackerState extends LimitWindow {
  readonly childId: ChildId;
  /** Committed spend. */
  readonly spentAmount: number;
  /** Reserved by pending requests. */
  readonly pendingAmount: number;
  /** Snapshot of the limit amount for this window. */
  readonly limitAmount: number;
  readonly updatedAt: Timestamp;
}

/** Point-in-time view of a configured limit's current window. */
export interface LimitStatus extends LimitWindow {
  readonly limitAmount: number;
  readonly spentAmount: number;
  readonly pendingAmount: number;
  readonly remainingAmount: number;
  /** (spent + pending) / limit, as a fraction. */
  readonly percentUsed: number;
  readonly includesPendingRequests: boolean;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/** Machine-readable reason a spend was denied. */
export type BlockCode =
  | 'paused'
  | 'max_single_purchase'
  | 'category_blocked'
  | 'limit_exceeded'
  | 'approval_required';

/** Which rule forced approval, when one did. */
export type ApprovalSource = 'category_rule' | 'category_threshold' | 'threshold';

export interface CheckResult {
  readonly canSpend: boolean;
  readonly requiresApproval: boolean;
  readonly blockReason?: string;
  readonly blockCode?: BlockCode;
  readonly approvalSource?: ApprovalSource;
  readonly warnings: readonly string[];
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export type RequestStatus = 'pending' | 'approved' | 'denied' | 'cancelled' | 'expired';

export type TerminalStatus = Exclude<RequestStatus, 'pending'>;

/** A window a pending request reserved headroom in. */
export interface ReservedWindow {
  readonly period: LimitPeriod;
  readonly periodStart: Timestamp;
}

interface SpendingRequestBase {
  readonly id: string;
  readonly childId: ChildId;
  readonly amount: number;
  readonly description: string;
  readonly categoryId?: CategoryId;
  /** Optional link to a wish-list or savings-goal item. */
  readonly wishListItemId?: string;
  readonly createdAt: Timestamp;
  readonly expiresAt: Timestamp;
  readonly reservedWindows: readonly ReservedWindow[];
}

/** Parent response fields, present on approved and denied requests only. */
export interface ParentResponse {
  readonly respondedBy: string;
  readonly respondedAt: Timestamp;
  readonly parentComment?: string;
  readonly isLearningMoment: boolean;
}

export interface PendingRequest extends SpendingRequestBase {
  readonly status: 'pending';
}

export interface ApprovedRequest extends SpendingRequestBase, ParentResponse {
  readonly status: 'approved';
  /** Ledger transaction created when the request was approved. */
  readonly transactionId: string;
}

export interface DeniedRequest extends SpendingRequestBase, ParentResponse {
  readonly status: 'denied';
}

export interface CancelledRequest extends SpendingRequestBase {
  readonly status: 'cancelled';
  readonly cancelledAt: Timestamp;
}

export interface ExpiredRequest extends SpendingRequestBase {
  readonly status: 'expired';
  readonly expiredAt: Timestamp;
}

export type SpendingRequest =
  | PendingRequest
  | ApprovedRequest
  | DeniedRequest
  | CancelledRequest
  | ExpiredRequest;

export interface CreateRequestInput {
  readonly amount: number;
  readonly description: string;
  readonly categoryId?: CategoryId;
  readonly wishListItemId?: string;
}

export interface RespondInput {
  readonly approved: boolean;
  readonly respondedBy: string;
  readonly comment?: string;
  readonly isLearningMoment?: boolean;
}

export interface DirectSpendInput {
  readonly amount: number;
  readonly description: string;
  readonly categoryId?: CategoryId;
}

export interface DirectSpendResult {
  readonly transactionId: string;
  readonly newBalance: number;
  readonly warnings: readonly string[];
}

/** Aggregate request counts for a child. */
export interface RequestStatistics {
  readonly total: number;
  readonly pending: number;
  readonly approved: number;
  readonly denied: number;
  readonly cancelled: number;
  readonly expired: number;
  readonly approvedAmount: number;
  readonly pendingAmount: number;
  /** approved / (approved + denied); 0 when nothing has been answered. */
  readonly approvalRate: number;
}
