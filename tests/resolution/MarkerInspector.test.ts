/**
 * MarkerInspector — Unit Tests
 */
import { describe, it, expect } from 'vitest';
import {
    inspectMarkers, isDisabled, isTypeDisabled, decisionFromMarkers, resolveMarkerDecision,
} from '../../src/resolution/MarkerInspector.js';
import { defineService } from '../../src/metadata/defineService.js';
import { noLog, logInput, logOutput, logBoth } from '../../src/domain/InterceptionMarker.js';
import { LogLevel } from '../../src/domain/LogLevel.js';
import { type MethodDescriptor, type ServiceType } from '../../src/domain/ServiceType.js';

function methodOf(type: ServiceType, name: string): MethodDescriptor {
    const method = type.methods.find(m => m.name === name);
    if (!method) throw new Error(`no method ${name}`);
    return method;
}

describe('MarkerInspector', () => {
    describe('disable', () => {
        it('method-level disable wins over a type-level enable', () => {
            const type = defineService('Shop.Orders')
                .mark(logBoth())
                .method('ping', [], m => m.mark(noLog()))
                .build();

            expect(isDisabled(methodOf(type, 'ping'))).toBe(true);
            expect(inspectMarkers(methodOf(type, 'ping'))).toEqual({ disabled: true });
        });

        it('type-level disable wins over a method-level enable', () => {
            const type = defineService('Shop.Orders')
                .mark(noLog())
                .method('cancel', ['string'], m => m.mark(logBoth()))
                .build();

            expect(isTypeDisabled(type)).toBe(true);
            expect(inspectMarkers(methodOf(type, 'cancel'))).toEqual({ disabled: true });
        });
    });

    describe('decisionFromMarkers', () => {
        it('returns null when there is no enable marker', () => {
            expect(decisionFromMarkers([])).toBeNull();
            expect(decisionFromMarkers([noLog()])).toBeNull();
        });

        it('maps a single marker with defaults', () => {
            expect(decisionFromMarkers([logOutput()])).toEqual({
                behavior: 'output',
                level: LogLevel.Information,
                exceptionLevel: LogLevel.Error,
                target: null,
            });
        });

        it('lets a both marker win outright', () => {
            expect(decisionFromMarkers([logInput({ level: LogLevel.Trace }), logBoth({ level: LogLevel.Warning })]))
                .toEqual({
                    behavior: 'both',
                    level: LogLevel.Warning,
                    exceptionLevel: LogLevel.Error,
                    target: null,
                });
        });

        it('combines input and output into both', () => {
            const decision = decisionFromMarkers([
                logInput({ level: LogLevel.Warning, target: 'input-sink' }),
                logOutput({ level: LogLevel.Debug, exceptionLevel: LogLevel.Critical, target: 'output-sink' }),
            ]);

            expect(decision).toEqual({
                behavior: 'both',
                level: LogLevel.Debug,
                exceptionLevel: LogLevel.Critical,
                target: 'input-sink',
            });
        });

        it("prefers the input marker's failure level", () => {
            const decision = decisionFromMarkers([
                logOutput({ exceptionLevel: LogLevel.Critical }),
                logInput({ exceptionLevel: LogLevel.Warning }),
            ]);

            expect(decision?.exceptionLevel).toBe(LogLevel.Warning);
            expect(decision?.level).toBe(LogLevel.Information);
        });
    });

    describe('resolveMarkerDecision', () => {
        it('prefers method-level markers over type-level ones', () => {
            const type = defineService('Shop.Orders')
                .mark(logOutput({ level: LogLevel.Debug }))
                .method('cancel', [], m => m.mark(logInput({ level: LogLevel.Warning })))
                .method('create')
                .build();

            expect(resolveMarkerDecision(methodOf(type, 'cancel'))?.behavior).toBe('input');
            expect(resolveMarkerDecision(methodOf(type, 'create'))).toEqual({
                behavior: 'output',
                level: LogLevel.Debug,
                exceptionLevel: LogLevel.Error,
                target: null,
            });
        });

        it('returns null without markers', () => {
            const type = defineService('Shop.Orders').method('create').build();
            expect(resolveMarkerDecision(methodOf(type, 'create'))).toBeNull();
            expect(inspectMarkers(methodOf(type, 'create'))).toEqual({ disabled: false, decision: null });
        });
    });
});
