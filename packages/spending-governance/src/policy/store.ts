// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import type {
  ApprovalSettings,
  CategoryId,
  CategoryRule,
  ChildId,
  LimitPeriod,
  SpendingLimit,
} from '../types.js';
import type { Clock } from '../clock.js';
import type { KeyedMutex } from '../concurrency/keyed-mutex.js';
import type { PolicyDefaults, SettingsPatch, CategoryRuleInput, SpendingLimitInput } from '../config.js';
import { CategoryRuleSchema, SettingsPatchSchema, SpendingLimitSchema, parseInput } from '../config.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { StorageAdapter } from '../storage/adapter.js';
import { roundMoney } from '../money.js';

export interface PolicyStoreOptions {
  store: StorageAdapter;
  mutex: KeyedMutex;
  clock: Clock;
  defaults: PolicyDefaults;
}

const PauseReasonSchema = z.string().trim().min(1, 'pause reason is required').max(500);

/**
 * Per-child approval policy: settings, category rules and spending limits.
 *
 * Reads never fail for a missing child; settings are created with defaults
 * on first access.  Writers validate their input, serialize on the child's
 * lock and replace the whole settings value.
 */
export class PolicyStore {
  readonly #store: StorageAdapter;
  readonly #mutex: KeyedMutex;
  readonly #clock: Clock;
  readonly #defaults: PolicyDefaults;

  constructor(options: PolicyStoreOptions) {
    this.#store = options.store;
    this.#mutex = options.mutex;
    this.#clock = options.clock;
    this.#defaults = options.defaults;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /**
   * Returns the child's settings, creating and persisting defaults when none
   * exist yet.  Does not take the child's lock, so it is safe to call from
   * inside a critical section.
   */
  async getSettings(childId: ChildId): Promise<ApprovalSettings> {
    const existing = await this.#store.getSettings(childId);
    if (existing !== undefined) {
      return existing;
    }
    return this.#store.insertSettingsIfAbsent(this.#createDefaults(childId));
  }

  // ---------------------------------------------------------------------------
  // Writers
  // ---------------------------------------------------------------------------

  async updateSettings(childId: ChildId, patch: SettingsPatch): Promise<ApprovalSettings> {
    const parsed = parseInput(SettingsPatchSchema, patch);
    return this.#update(childId, (settings) => {
      const { maxSinglePurchase, trustedCategoryIds, approvalThreshold, ...flags } = parsed;
      const next: ApprovalSettings = {
        ...settings,
        ...flags,
        ...(approvalThreshold !== undefined && { approvalThreshold: roundMoney(approvalThreshold) }),
        ...(trustedCategoryIds !== undefined && {
          trustedCategoryIds: Array.from(new Set(trustedCategoryIds)),
        }),
      };
      if (maxSinglePurchase === undefined) {
        return next;
      }
      if (maxSinglePurchase === null) {
        const { maxSinglePurchase: _removed, ...withoutMax } = next;
        return withoutMax;
      }
      return { ...next, maxSinglePurchase: roundMoney(maxSinglePurchase) };
    });
  }

  /** Adds or replaces the rule for `rule.categoryId`. */
  async upsertCategoryRule(childId: ChildId, rule: CategoryRuleInput): Promise<ApprovalSettings> {
    const parsed = parseInput(CategoryRuleSchema, rule);
    const normalized: CategoryRule = {
      categoryId: parsed.categoryId,
      restriction: parsed.restriction,
      ...(parsed.categoryThreshold !== undefined && {
        categoryThreshold: roundMoney(parsed.categoryThreshold),
      }),
      ...(parsed.restrictionReason !== undefined && { restrictionReason: parsed.restrictionReason }),
    };
    return this.#update(childId, (settings) => ({
      ...settings,
      categoryRules: [
        ...settings.categoryRules.filter((existing) => existing.categoryId !== normalized.categoryId),
        normalized,
      ],
    }));
  }

  async removeCategoryRule(childId: ChildId, categoryId: CategoryId): Promise<ApprovalSettings> {
    return this.#update(childId, (settings) => {
      if (!settings.categoryRules.some((rule) => rule.categoryId === categoryId)) {
        throw new NotFoundError('Category rule', categoryId);
      }
      return {
        ...settings,
        categoryRules: settings.categoryRules.filter((rule) => rule.categoryId !== categoryId),
      };
    });
  }

  /** Adds or replaces the limit for `limit.period`. */
  async upsertSpendingLimit(childId: ChildId, limit: SpendingLimitInput): Promise<ApprovalSettings> {
    const parsed = parseInput(SpendingLimitSchema, limit);
    const normalized: SpendingLimit = {
      period: parsed.period,
      limitAmount: roundMoney(parsed.limitAmount),
      includesPendingRequests: parsed.includesPendingRequests,
    };
    if (normalized.limitAmount <= 0) {
      throw new ValidationError(['limitAmount: must be at least 0.01']);
    }
    return this.#update(childId, (settings) => ({
      ...settings,
      spendingLimits: [
        ...settings.spendingLimits.filter((existing) => existing.period !== normalized.period),
        normalized,
      ],
    }));
  }

  async removeSpendingLimit(childId: ChildId, period: LimitPeriod): Promise<ApprovalSettings> {
    return this.#update(childId, (settings) => {
      if (!settings.spendingLimits.some((limit) => limit.period === period)) {
        throw new NotFoundError('Spending limit', period);
      }
      return {
        ...settings,
        spendingLimits: settings.spendingLimits.filter((limit) => limit.period !== period),
      };
    });
  }

  async setPaused(childId: ChildId, reason: string): Promise<ApprovalSettings> {
    const pauseReason = parseInput(PauseReasonSchema, reason);
    return this.#update(childId, (settings) => ({ ...settings, isPaused: true, pauseReason }));
  }

  async resume(childId: ChildId): Promise<ApprovalSettings> {
    return this.#update(childId, (settings) => {
      const { pauseReason: _cleared, ...rest } = settings;
      return { ...rest, isPaused: false };
    });
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  #createDefaults(childId: ChildId): ApprovalSettings {
    const now = this.#clock.now().toISOString();
    return {
      childId,
      isEnabled: true,
      isPaused: false,
      approvalThreshold: this.#defaults.approvalThreshold,
      autoApproveUnderThreshold: this.#defaults.autoApproveUnderThreshold,
      autoApproveTrustedCategories: this.#defaults.autoApproveTrustedCategories,
      trustedCategoryIds: [],
      requestExpirationHours: this.#defaults.requestExpirationHours,
      categoryRules: [],
      spendingLimits: [],
      createdAt: now,
      updatedAt: now,
    };
  }

  async #update(
    childId: ChildId,
    mutate: (settings: ApprovalSettings) => ApprovalSettings,
  ): Promise<ApprovalSettings> {
    return this.#mutex.runExclusive(childId, async () => {
      const current = await this.getSettings(childId);
      const next: ApprovalSettings = {
        ...mutate(current),
        updatedAt: this.#clock.now().toISOString(),
      };
      await this.#store.saveSettings(next);
      return next;
    });
  }
}
