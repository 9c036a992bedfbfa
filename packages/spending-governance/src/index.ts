// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @family-allowance/spending-governance — approval and limit enforcement for
 * children's allowance spending.
 *
 * Public API surface:
 *
 * Engine
 *   SpendingGovernanceEngine — compose policy, limits, rules, requests and sweeper
 *
 * Components (usable standalone or via SpendingGovernanceEngine)
 *   PolicyStore              — per-child settings, category rules and limits
 *   LimitTracker             — per-window spent/pending aggregates
 *   RuleEvaluator            — ordered spend evaluation (evaluateSpending is the pure core)
 *   RequestLifecycle         — Pending → Approved | Denied | Cancelled | Expired
 *   ExpirationSweeper        — periodic expiry of overdue requests
 *
 * Storage
 *   StorageAdapter, MemoryStorageAdapter, TimeoutStorageAdapter
 *
 * Collaborators (implemented by the host)
 *   Ledger, Notifier, FamilyDirectory, Clock
 *
 * Config (Zod schemas + parsed types)
 *   EngineConfig, PolicyDefaults, SweeperConfig and their schemas
 *
 * Errors
 *   SpendingGovernanceError, ValidationError, BlockedError, NotFoundError,
 *   InvalidStateError, TransientError, InsufficientFundsError, InvalidConfigError
 *
 * Events
 *   SpendingEventEmitter and the spending:* event constants
 */

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------
export { SpendingGovernanceEngine } from './engine.js';
export type { SpendingGovernanceDeps } from './engine.js';

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------
export { PolicyStore } from './policy/store.js';
export type { PolicyStoreOptions } from './policy/store.js';
export { LimitTracker, TrackerChangeSet, toLimitStatus } from './limits/tracker.js';
export type { LimitSnapshot, LimitTrackerOptions } from './limits/tracker.js';
export { computeWindow, isWindowElapsed, isWindowOpen } from './limits/window.js';
export { RuleEvaluator, evaluateSpending } from './rules/evaluator.js';
export type {
  EvaluationInput,
  LimitProjection,
  RuleEvaluatorOptions,
  SpendingDenial,
  SpendingEvaluation,
} from './rules/evaluator.js';
export { RequestLifecycle } from './requests/lifecycle.js';
export type { ListRequestsOptions, RequestLifecycleOptions } from './requests/lifecycle.js';
export { assertPending, isPastExpiry, transition } from './requests/state-machine.js';
export type { RequestTransition, TerminalRequest } from './requests/state-machine.js';
export { ExpirationSweeper } from './sweeper/expiration-sweeper.js';
export type {
  ExpirationSweeperOptions,
  SweepFailure,
  SweepReport,
} from './sweeper/expiration-sweeper.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------
export { MemoryStorageAdapter, TimeoutStorageAdapter, trackerKeyString } from './storage/index.js';
export type {
  RequestStorageFilter,
  StorageAdapter,
  StoreChanges,
  TrackerKey,
} from './storage/index.js';

// ---------------------------------------------------------------------------
// Collaborators and time
// ---------------------------------------------------------------------------
export type {
  FamilyDirectory,
  Ledger,
  LedgerDebitRequest,
  LedgerDebitResult,
  NotificationPayload,
  NotificationType,
  Notifier,
} from './collaborators.js';
export { ManualClock, systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { KeyedMutex } from './concurrency/keyed-mutex.js';
export { withTimeout } from './concurrency/timeout.js';
export { addMoney, formatMoney, roundMoney, subtractMoneyFloored } from './money.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------
export type {
  Timestamp,
  ChildId,
  CategoryId,
  CategoryRestriction,
  CategoryRule,
  LimitPeriod,
  SpendingLimit,
  ApprovalSettings,
  LimitWindow,
  TrackerState,
  LimitStatus,
  BlockCode,
  ApprovalSource,
  CheckResult,
  RequestStatus,
  TerminalStatus,
  ReservedWindow,
  ParentResponse,
  PendingRequest,
  ApprovedRequest,
  DeniedRequest,
  CancelledRequest,
  ExpiredRequest,
  SpendingRequest,
  CreateRequestInput,
  RespondInput,
  DirectSpendInput,
  DirectSpendResult,
  RequestStatistics,
} from './types.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------
export {
  EngineConfigSchema,
  PolicyDefaultsSchema,
  SweeperConfigSchema,
  CreateRequestInputSchema,
  RespondInputSchema,
  DirectSpendInputSchema,
  SpendCheckInputSchema,
  CategoryRuleSchema,
  SpendingLimitSchema,
  SettingsPatchSchema,
  parseEngineConfig,
  parseInput,
} from './config.js';
export type {
  EngineConfig,
  PolicyDefaults,
  SweeperConfig,
  SettingsPatch,
  CategoryRuleInput,
  SpendingLimitInput,
} from './config.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------
export {
  SpendingGovernanceError,
  ValidationError,
  BlockedError,
  NotFoundError,
  InvalidStateError,
  TransientError,
  InsufficientFundsError,
  InvalidConfigError,
} from './errors.js';

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------
export {
  SpendingEventEmitter,
  EVENT_REQUEST_CREATED,
  EVENT_REQUEST_RESOLVED,
  EVENT_LIMIT_WARNING,
  EVENT_NOTIFICATION_FAILED,
  EVENT_SWEEP_COMPLETED,
  EVENT_SWEEP_FAILED,
} from './events.js';
export type {
  SpendingEventName,
  SpendingEventPayloadMap,
  SpendingEventListener,
  SpendingEventEmitterOptions,
  ListenerErrorHandler,
  RequestCreatedEventPayload,
  RequestResolvedEventPayload,
  LimitWarningEventPayload,
  NotificationFailedEventPayload,
  SweepCompletedEventPayload,
  SweepFailedEventPayload,
} from './events.js';

// ---------------------------------------------------------------------------
// Telemetry
// ---------------------------------------------------------------------------
export { SpendingTracer } from './telemetry/otel.js';
export type {
  OTelSpanLike,
  OTelTracerLike,
  SpanAttributes,
  SpendingOTelConfig,
} from './telemetry/otel.js';
