/**
 * Tracing — OpenTelemetry Compatibility Tests
 */
import { describe, it, expect } from 'vitest';
import { trace, SpanStatusCode as OtelSpanStatusCode } from '@opentelemetry/api';
import { SpanStatusCode, type CallsightTracer } from '../../src/observability/Tracing.js';
import { DecisionCache } from '../../src/resolution/DecisionCache.js';
import { DecisionResolver } from '../../src/resolution/DecisionResolver.js';
import { defineService } from '../../src/metadata/defineService.js';

describe('Tracing', () => {
    it('mirrors the OpenTelemetry status codes', () => {
        expect(SpanStatusCode.UNSET).toBe(OtelSpanStatusCode.UNSET);
        expect(SpanStatusCode.OK).toBe(OtelSpanStatusCode.OK);
        expect(SpanStatusCode.ERROR).toBe(OtelSpanStatusCode.ERROR);
    });

    it('accepts an OpenTelemetry tracer without an adapter', () => {
        const tracer: CallsightTracer = trace.getTracer('callsight-test');
        const cache = new DecisionCache({ resolver: new DecisionResolver({ autoIntercept: true }), tracer });
        const type = defineService('Shop.Orders').method('create').build();

        expect(() => cache.registerType(type)).not.toThrow();
        expect(cache.isRegistered(type)).toBe(true);
    });
});
