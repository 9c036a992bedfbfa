// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Minimal OpenTelemetry Span interface.
 *
 * This avoids a hard dependency on @opentelemetry/api.  Any OTel-compatible
 * tracer that produces spans with these methods can be used.
 */
export interface OTelSpanLike {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: number; message?: string }): this;
  addEvent(name: string, attributes?: Record<string, string | number | boolean>): this;
  end(): void;
}

/**
 * Minimal OpenTelemetry Tracer interface.
 */
export interface OTelTracerLike {
  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): OTelSpanLike;
}

export interface SpendingOTelConfig {
  /** The OTel tracer instance to use for span creation. */
  tracer: OTelTracerLike;
  /** Service name attribute added to all spans. Defaults to "spending-governance". */
  serviceName?: string;
}

export type SpanAttributes = Record<string, string | number | boolean>;

/**
 * OTel span status codes (matching OpenTelemetry SpanStatusCode).
 */
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * SpendingTracer wraps engine operations in OpenTelemetry spans.
 *
 * Each operation produces one span named `spending.<operation>`.  Failures
 * record the error code, when the error carries one, and set an error
 * status before rethrowing.
 *
 * Usage:
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const engine = new SpendingGovernanceEngine({
 *   ledger,
 *   notifier,
 *   families,
 *   tracer: trace.getTracer('allowance-api'),
 * });
 * ```
 */
export class SpendingTracer {
  readonly #tracer: OTelTracerLike;
  readonly #serviceName: string;

  constructor(config: SpendingOTelConfig) {
    this.#tracer = config.tracer;
    this.#serviceName = config.serviceName ?? 'spending-governance';
  }

  /**
   * Runs `executeFn` inside a span.  `describe` may add attributes from the
   * result, e.g. the decision a check produced.
   */
  async trace<T>(
    operation: string,
    attributes: SpanAttributes,
    executeFn: () => Promise<T>,
    describe?: (result: T) => SpanAttributes,
  ): Promise<T> {
    const span = this.#tracer.startSpan(`spending.${operation}`, {
      attributes: {
        'service.name': this.#serviceName,
        'spending.operation': operation,
        ...attributes,
      },
    });

    try {
      const result = await executeFn();
      if (describe !== undefined) {
        for (const [key, value] of Object.entries(describe(result))) {
          span.setAttribute(key, value);
        }
      }
      span.setStatus({ code: SPAN_STATUS_OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        span.setAttribute('spending.error_code', error.code);
      }
      span.setStatus({ code: SPAN_STATUS_ERROR, message });
      span.addEvent('spending.error', { 'error.message': message });
      throw error;
    } finally {
      span.end();
    }
  }
}
