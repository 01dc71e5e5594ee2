/**
 * Observability — Barrel Export
 *
 * Public API for debug observers and OpenTelemetry-compatible tracing.
 */

// ── Debug Observer ───────────────────────────────────────
export { createDebugObserver } from './DebugObserver.js';
export type {
    DebugEvent, DebugObserverFn, DecisionSource,
    RegisterEvent, ResolveEvent, RedirectEvent, FallbackEvent, ErrorEvent,
} from './DebugObserver.js';

// ── Tracing (OpenTelemetry-compatible) ───────────────────
export { SpanStatusCode } from './Tracing.js';
export type { CallsightSpan, CallsightTracer, CallsightAttributeValue } from './Tracing.js';
