// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError, ValidationError } from './errors.js';

// ---------------------------------------------------------------------------
// Policy defaults
// ---------------------------------------------------------------------------

/**
 * Values given to ApprovalSettings the first time a child's settings are
 * read.  Parents edit them afterwards through PolicyStore.
 */
export const PolicyDefaultsSchema = z.object({
  approvalThreshold: z.number().nonnegative().default(10),
  requestExpirationHours: z.number().positive().default(72),
  autoApproveUnderThreshold: z.boolean().default(true),
  autoApproveTrustedCategories: z.boolean().default(false),
});

export type PolicyDefaults = z.infer<typeof PolicyDefaultsSchema>;

// ---------------------------------------------------------------------------
// Sweeper config
// ---------------------------------------------------------------------------

export const SweeperConfigSchema = z.object({
  /** Milliseconds between expiration sweeps.  Defaults to five minutes. */
  intervalMs: z.number().int().positive().default(300_000),
  /**
   * Trackers whose window ended more than this many days ago are deleted
   * by the sweeper.
   */
  trackerRetentionDays: z.number().int().positive().default(90),
});

export type SweeperConfig = z.infer<typeof SweeperConfigSchema>;

// ---------------------------------------------------------------------------
// Root engine config
// ---------------------------------------------------------------------------

export const EngineConfigSchema = z.object({
  defaults: PolicyDefaultsSchema.default({}),
  /**
   * A limit warning is attached once projected usage of a window passes
   * this percentage of its limit.
   */
  warningThresholdPercent: z.number().min(0).max(100).default(80),
  /** Upper bound for every ledger, notifier and storage call. */
  operationTimeoutMs: z.number().int().positive().default(5_000),
  sweeper: SweeperConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

// ---------------------------------------------------------------------------
// Caller input schemas
// ---------------------------------------------------------------------------

const MoneySchema = z.number().finite();
const PositiveMoneySchema = MoneySchema.positive().refine(
  (value) => Math.abs(value * 100 - Math.round(value * 100)) < 1e-6,
  'must be in whole cents',
);
const IdSchema = z.string().trim().min(1);

export const CreateRequestInputSchema = z.object({
  amount: PositiveMoneySchema,
  description: z.string().trim().min(1, 'description is required').max(500),
  categoryId: IdSchema.optional(),
  wishListItemId: IdSchema.optional(),
});

export const RespondInputSchema = z.object({
  approved: z.boolean(),
  respondedBy: IdSchema,
  comment: z.string().trim().max(1000).optional(),
  isLearningMoment: z.boolean().default(false),
});

export const DirectSpendInputSchema = z.object({
  amount: PositiveMoneySchema,
  description: z.string().trim().min(1, 'description is required').max(500),
  categoryId: IdSchema.optional(),
});

export const SpendCheckInputSchema = z.object({
  amount: PositiveMoneySchema,
  categoryId: IdSchema.optional(),
});

export const CategoryRuleSchema = z.object({
  categoryId: IdSchema,
  restriction: z.enum(['allowed', 'requires_approval', 'blocked']),
  categoryThreshold: MoneySchema.nonnegative().optional(),
  restrictionReason: z.string().trim().max(500).optional(),
});

export const SpendingLimitSchema = z.object({
  period: z.enum(['daily', 'weekly', 'monthly']),
  limitAmount: PositiveMoneySchema,
  includesPendingRequests: z.boolean().default(true),
});

export const SettingsPatchSchema = z
  .object({
    isEnabled: z.boolean(),
    approvalThreshold: MoneySchema.nonnegative(),
    maxSinglePurchase: PositiveMoneySchema.nullable(),
    autoApproveUnderThreshold: z.boolean(),
    autoApproveTrustedCategories: z.boolean(),
    trustedCategoryIds: z.array(IdSchema),
    requestExpirationHours: z.number().positive(),
  })
  .partial();

export type SettingsPatch = z.input<typeof SettingsPatchSchema>;
export type CategoryRuleInput = z.input<typeof CategoryRuleSchema>;
export type SpendingLimitInput = z.input<typeof SpendingLimitSchema>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse and validate a raw engine config object, throwing
 * InvalidConfigError on failure.
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate caller input against a schema, throwing ValidationError on
 * failure.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}
