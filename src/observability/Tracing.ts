/**
 * Tracing — OpenTelemetry-Compatible Tracing Abstraction
 *
 * Minimal interfaces that are structural subsets of OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('callsight')` from
 * `@opentelemetry/api` can be passed directly, with no adapter and no
 * runtime dependency on the OTel packages.
 *
 * Only registration is traced. Lookups are on the hot path and never
 * open spans.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const engine = createInterceptionEngine(config, {
 *     tracer: trace.getTracer('callsight'),
 * });
 * ```
 *
 * @module
 */

// ============================================================================
// Constants
// ============================================================================

/**
 * Span status codes matching OpenTelemetry's `SpanStatusCode` enum.
 *
 * - `UNSET` (0) — default
 * - `OK` (1) — registration completed
 * - `ERROR` (2) — registration threw
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

// ============================================================================
// Types
// ============================================================================

/**
 * Attribute value type — identical to OpenTelemetry's `AttributeValue`,
 * so its `Tracer` is assignable to {@link CallsightTracer} under
 * `strict`.
 */
export type CallsightAttributeValue =
    | string
    | number
    | boolean
    | Array<null | undefined | string>
    | Array<null | undefined | number>
    | Array<null | undefined | boolean>;

/** Minimal span interface — structural subtype of OTel's `Span`. */
export interface CallsightSpan {
    /**
     * Set a single attribute on this span.
     * @param key - Attribute key (`callsight.*` namespace)
     */
    setAttribute(key: string, value: CallsightAttributeValue): void;

    /** Set the span's status. */
    setStatus(status: { code: number; message?: string }): void;

    /**
     * Add a timestamped event. Optional: not every tracer implements
     * events, so callers use `span.addEvent?.()`.
     */
    addEvent?(name: string, attributes?: Record<string, CallsightAttributeValue>): void;

    /** End this span. Called exactly once, in a `finally` block. */
    end(): void;

    /** Record an exception as a span event. */
    recordException(exception: Error | string): void;
}

/**
 * Minimal tracer interface — structural subtype of OTel's `Tracer`.
 *
 * OTel's `startSpan()` accepts `(name, options?, context?)`; this
 * interface matches the first two parameters.
 */
export interface CallsightTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, CallsightAttributeValue>;
    }): CallsightSpan;
}
