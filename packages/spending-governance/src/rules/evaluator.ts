// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  ApprovalSettings,
  ApprovalSource,
  BlockCode,
  CategoryId,
  CheckResult,
  ChildId,
  LimitPeriod,
} from '../types.js';
import type { Clock } from '../clock.js';
import type { PolicyStore } from '../policy/store.js';
import type { LimitSnapshot, LimitTracker } from '../limits/tracker.js';
import { EVENT_LIMIT_WARNING } from '../events.js';
import type { SpendingEventEmitter } from '../events.js';
import { SpendCheckInputSchema, parseInput } from '../config.js';
import { addMoney, formatMoney } from '../money.js';

/** A window projected past the warning threshold by a checked amount. */
export interface LimitProjection {
  readonly period: LimitPeriod;
  readonly limitAmount: number;
  readonly projectedAmount: number;
  readonly percentUsed: number;
}

/** The rule that denied a spend. */
export interface SpendingDenial {
  readonly blockCode: BlockCode;
  readonly blockReason: string;
}

export interface SpendingEvaluation {
  readonly result: CheckResult;
  readonly denial?: SpendingDenial;
  /** Windows past the warning threshold, in limit order. */
  readonly projections: readonly LimitProjection[];
}

export interface EvaluationInput {
  readonly settings: ApprovalSettings;
  readonly limits: readonly LimitSnapshot[];
  readonly amount: number;
  readonly categoryId?: CategoryId;
  /** Percentage of a limit past which a warning is attached. */
  readonly warningThresholdPercent: number;
}

function deny(blockCode: BlockCode, blockReason: string): SpendingEvaluation {
  return {
    result: { canSpend: false, requiresApproval: false, blockCode, blockReason, warnings: [] },
    denial: { blockCode, blockReason },
    projections: [],
  };
}

/**
 * Decides whether a proposed spend is allowed, denied, or needs approval.
 *
 * Rules are evaluated in a fixed order and the first denial wins:
 *   1. Governance disabled      — allow, no approval.
 *   2. Paused                   — deny with the pause reason.
 *   3. Max single purchase      — deny when exceeded.
 *   4. Category rule            — blocked denies; requires-approval or an
 *                                 exceeded category threshold forces approval.
 *   5. Spending limits          — deny when spent + pending + amount exceeds
 *                                 a limit; warn past the warning threshold.
 *   6. Approval threshold       — the category threshold when the rule sets
 *                                 one, the global threshold otherwise.
 *   7. Trusted categories       — waive approval that came from step 6 only.
 *
 * This function is pure.
 */
export function evaluateSpending(input: EvaluationInput): SpendingEvaluation {
  const { settings, amount, categoryId } = input;

  if (!settings.isEnabled) {
    return { result: { canSpend: true, requiresApproval: false, warnings: [] }, projections: [] };
  }

  if (settings.isPaused) {
    return deny('paused', settings.pauseReason ?? 'Spending is currently paused.');
  }

  if (settings.maxSinglePurchase !== undefined && amount > settings.maxSinglePurchase) {
    return deny(
      'max_single_purchase',
      `Amount exceeds the maximum single purchase of ${formatMoney(settings.maxSinglePurchase)}.`,
    );
  }

  let approvalSource: ApprovalSource | undefined;
  const rule =
    categoryId !== undefined
      ? settings.categoryRules.find((candidate) => candidate.categoryId === categoryId)
      : undefined;

  if (rule !== undefined) {
    if (rule.restriction === 'blocked') {
      return deny('category_blocked', rule.restrictionReason ?? 'This category is blocked.');
    }
    if (rule.restriction === 'requires_approval') {
      approvalSource = 'category_rule';
    } else if (rule.categoryThreshold !== undefined && amount > rule.categoryThreshold) {
      approvalSource = 'category_threshold';
    }
  }

  const warnings: string[] = [];
  const projections: LimitProjection[] = [];
  for (const { limit, tracker } of input.limits) {
    const projectedAmount = addMoney(tracker.spentAmount, tracker.pendingAmount, amount);
    if (projectedAmount > tracker.limitAmount) {
      const remaining = Math.max(0, tracker.limitAmount - tracker.spentAmount - tracker.pendingAmount);
      return deny(
        'limit_exceeded',
        `Would exceed ${limit.period} limit of ${formatMoney(tracker.limitAmount)} ` +
          `(${formatMoney(remaining)} remaining).`,
      );
    }
    const percentUsed = Math.round((projectedAmount / tracker.limitAmount) * 100);
    if (projectedAmount / tracker.limitAmount > input.warningThresholdPercent / 100) {
      warnings.push(`This purchase uses ${percentUsed}% of the ${limit.period} limit.`);
      projections.push({
        period: limit.period,
        limitAmount: tracker.limitAmount,
        projectedAmount,
        percentUsed,
      });
    }
  }

  if (approvalSource === undefined) {
    const threshold = rule?.categoryThreshold ?? settings.approvalThreshold;
    if (amount > threshold || !settings.autoApproveUnderThreshold) {
      approvalSource = 'threshold';
    }
  }

  if (
    approvalSource === 'threshold' &&
    settings.autoApproveTrustedCategories &&
    categoryId !== undefined &&
    settings.trustedCategoryIds.includes(categoryId)
  ) {
    approvalSource = undefined;
  }

  return {
    result: {
      canSpend: true,
      requiresApproval: approvalSource !== undefined,
      ...(approvalSource !== undefined && { approvalSource }),
      warnings,
    },
    projections,
  };
}

export interface RuleEvaluatorOptions {
  policy: PolicyStore;
  limits: LimitTracker;
  clock: Clock;
  events: SpendingEventEmitter;
  warningThresholdPercent: number;
}

/**
 * Loads a child's policy snapshot and current windows, then runs
 * evaluateSpending().  Side effects are limited to materializing missing
 * tracker windows and emitting `spending:limit:warning`; nothing is
 * reserved.
 */
export class RuleEvaluator {
  readonly #policy: PolicyStore;
  readonly #limits: LimitTracker;
  readonly #clock: Clock;
  readonly #events: SpendingEventEmitter;
  readonly #warningThresholdPercent: number;

  constructor(options: RuleEvaluatorOptions) {
    this.#policy = options.policy;
    this.#limits = options.limits;
    this.#clock = options.clock;
    this.#events = options.events;
    this.#warningThresholdPercent = options.warningThresholdPercent;
  }

  async checkSpending(childId: ChildId, amount: number, categoryId?: CategoryId): Promise<CheckResult> {
    const evaluation = await this.evaluate(childId, amount, categoryId);
    return evaluation.result;
  }

  async evaluate(
    childId: ChildId,
    amount: number,
    categoryId?: CategoryId,
    settings?: ApprovalSettings,
  ): Promise<SpendingEvaluation> {
    const input = parseInput(SpendCheckInputSchema, { amount, categoryId });
    const resolved = settings ?? (await this.#policy.getSettings(childId));
    const now = this.#clock.now();
    const limits = resolved.isEnabled ? await this.#limits.snapshot(resolved, now) : [];
    const evaluation = evaluateSpending({
      settings: resolved,
      limits,
      amount: input.amount,
      categoryId: input.categoryId,
      warningThresholdPercent: this.#warningThresholdPercent,
    });

    for (const projection of evaluation.projections) {
      this.#events.emit(EVENT_LIMIT_WARNING, {
        childId,
        ...projection,
        timestamp: now.toISOString(),
      });
    }
    return evaluation;
  }
}
