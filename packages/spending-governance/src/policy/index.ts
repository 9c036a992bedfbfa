// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Per-child approval policy.
 *
 * Re-exports the policy store and the zod schemas its writers validate with.
 */

export { PolicyStore } from './store.js';
export type { PolicyStoreOptions } from './store.js';

export {
  CategoryRuleSchema,
  PolicyDefaultsSchema,
  SettingsPatchSchema,
  SpendingLimitSchema,
} from '../config.js';
export type {
  CategoryRuleInput,
  PolicyDefaults,
  SettingsPatch,
  SpendingLimitInput,
} from '../config.js';
