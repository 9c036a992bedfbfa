// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { SpendingTracer } from './otel.js';
export type {
  OTelSpanLike,
  OTelTracerLike,
  SpanAttributes,
  SpendingOTelConfig,
} from './otel.js';
