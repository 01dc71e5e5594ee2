/**
 * DecisionResolver — Unit Tests
 *
 * Fixed precedence: ineligible → disable → marker → rule → default.
 */
import { describe, it, expect, vi } from 'vitest';
import { DecisionResolver } from '../../src/resolution/DecisionResolver.js';
import { PatternRuleTable, type PatternRule } from '../../src/resolution/PatternRuleTable.js';
import { defineService } from '../../src/metadata/defineService.js';
import { type DecisionInit, DEFAULT_DECISION, createDecision } from '../../src/domain/InterceptionDecision.js';
import { noLog, logInput, logOutput, logBoth } from '../../src/domain/InterceptionMarker.js';
import { LogLevel } from '../../src/domain/LogLevel.js';
import { type MethodDescriptor, type ServiceType } from '../../src/domain/ServiceType.js';
import type { DebugEvent } from '../../src/observability/DebugObserver.js';

function methodOf(type: ServiceType, name: string, params: readonly string[] = []): MethodDescriptor {
    const method = type.methods.find(m =>
        m.name === name && m.parameterTypes.join() === params.join());
    if (!method) throw new Error(`no method ${name}`);
    return method;
}

function rule(pattern: string, init: DecisionInit, exclude: string[] = []): PatternRule {
    return { pattern, decision: createDecision(init), excludeMethodPatterns: exclude };
}

describe('DecisionResolver', () => {
    describe('precedence', () => {
        const rules = [rule('Shop.*', { behavior: 'output', level: LogLevel.Debug })];

        it('method-level disable beats rules and default', () => {
            const type = defineService('Shop.Orders').method('ping', [], m => m.mark(noLog())).build();
            const resolver = new DecisionResolver({ rules, autoIntercept: true });

            expect(resolver.explain(methodOf(type, 'ping'))).toEqual({ decision: null, source: 'disabled' });
        });

        it('method-level enable beats class markers and rules', () => {
            const type = defineService('Shop.Orders')
                .mark(logInput())
                .method('cancel', [], m => m.mark(logBoth({ level: LogLevel.Critical })))
                .build();
            const resolver = new DecisionResolver({ rules, autoIntercept: true });

            expect(resolver.explain(methodOf(type, 'cancel'))).toEqual({
                decision: { behavior: 'both', level: LogLevel.Critical, exceptionLevel: LogLevel.Error, target: null },
                source: 'marker',
            });
        });

        it('type-level disable nulls every method', () => {
            const type = defineService('Shop.Orders')
                .mark(noLog())
                .method('cancel')
                .method('create')
                .build();
            const resolver = new DecisionResolver({ rules, autoIntercept: true });

            expect(type.methods.map(m => resolver.resolve(m))).toEqual([null, null]);
        });

        it('a rule applies when there is no marker', () => {
            const type = defineService('Shop.Orders').method('create').build();
            const resolver = new DecisionResolver({ rules, autoIntercept: true });

            expect(resolver.explain(methodOf(type, 'create'))).toEqual({
                decision: rules[0]?.decision,
                source: 'rule',
            });
        });

        it('the default applies only with autoIntercept', () => {
            const type = defineService('Billing.Ledger').method('post').build();

            const on = new DecisionResolver({ autoIntercept: true });
            const off = new DecisionResolver({ autoIntercept: false });

            expect(on.explain(methodOf(type, 'post'))).toEqual({ decision: DEFAULT_DECISION, source: 'default' });
            expect(off.explain(methodOf(type, 'post'))).toEqual({ decision: null, source: 'none' });
        });
    });

    describe('eligibility', () => {
        it('never intercepts ineligible members, whatever their markers', () => {
            const type = defineService('Shop.Orders')
                .method('create', [], m => m.asStatic().mark(logBoth()))
                .build();
            const resolver = new DecisionResolver({ autoIntercept: true });

            expect(resolver.explain(methodOf(type, 'create'))).toEqual({ decision: null, source: 'ineligible' });
        });

        it('skips types that manage their own logging', () => {
            const type = defineService('Shop.Logger')
                .managesOwnLogging()
                .method('write', [], m => m.mark(logInput()))
                .build();
            const resolver = new DecisionResolver({ autoIntercept: true });

            expect(resolver.isInterceptable(methodOf(type, 'write'))).toBe(false);
            expect(resolver.resolve(methodOf(type, 'write'))).toBeNull();
        });

        it('honours method exclusions of the matching rule', () => {
            const type = defineService('Shop.Orders').method('getOrder').method('cancel').build();
            const resolver = new DecisionResolver({
                rules: [rule('Shop.*', { behavior: 'output' }, ['get*'])],
                autoIntercept: true,
            });

            expect(resolver.explain(methodOf(type, 'getOrder')).source).toBe('ineligible');
            expect(resolver.explain(methodOf(type, 'cancel')).source).toBe('rule');
        });
    });

    describe('scenarios', () => {
        it('OrderService: method marker and class marker both beat the wildcard rule', () => {
            const OrderService = defineService('OrderService.Core')
                .mark(logInput({ level: LogLevel.Information }))
                .method('cancel', ['string'], m => m.mark(logBoth({ level: LogLevel.Warning, exceptionLevel: LogLevel.Error })))
                .method('create', ['Order'])
                .build();
            const resolver = new DecisionResolver({
                rules: [rule('OrderService.*', { behavior: 'output', level: LogLevel.Debug })],
                autoIntercept: true,
            });

            expect(resolver.resolve(methodOf(OrderService, 'cancel', ['string']))).toEqual({
                behavior: 'both', level: LogLevel.Warning, exceptionLevel: LogLevel.Error, target: null,
            });
            expect(resolver.resolve(methodOf(OrderService, 'create', ['Order']))).toEqual({
                behavior: 'input', level: LogLevel.Information, exceptionLevel: LogLevel.Error, target: null,
            });
        });

        it('Billing: an exact rule covers only the named type', () => {
            const Service = defineService('Billing.Service').method('charge', ['number']).build();
            const OtherService = defineService('Billing.OtherService').method('charge', ['number']).build();
            const resolver = new DecisionResolver({
                rules: [rule('Billing.Service', { behavior: 'input' })],
                autoIntercept: false,
            });

            expect(resolver.resolve(methodOf(Service, 'charge', ['number']))?.behavior).toBe('input');
            expect(resolver.resolve(methodOf(OtherService, 'charge', ['number']))).toBeNull();
        });
    });

    describe('configuration', () => {
        it('accepts a prebuilt table', () => {
            const table = new PatternRuleTable([rule('Shop.*', { behavior: 'both' })]);
            const resolver = new DecisionResolver({ rules: table, autoIntercept: false });

            expect(resolver.rules).toBe(table);
            expect(resolver.autoIntercept).toBe(false);
        });

        it('keeps resolvers with different policies independent', () => {
            const type = defineService('Shop.Orders').method('create').build();
            const a = new DecisionResolver({ autoIntercept: true });
            const b = new DecisionResolver({ autoIntercept: false });

            expect(a.resolve(methodOf(type, 'create'))).toBe(DEFAULT_DECISION);
            expect(b.resolve(methodOf(type, 'create'))).toBeNull();
        });
    });

    it('emits a resolve event per evaluation', () => {
        const events: DebugEvent[] = [];
        const type = defineService('Shop.Orders').method('create', [], m => m.mark(logOutput())).build();
        const resolver = new DecisionResolver({ autoIntercept: false, debug: e => events.push(e) });

        resolver.resolve(methodOf(type, 'create'));

        expect(events).toHaveLength(1);
        expect(events[0]).toMatchObject({
            type: 'resolve',
            method: 'Shop.Orders.create[]',
            source: 'marker',
            behavior: 'output',
        });
    });

    it('does nothing observable without a debug observer', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        const type = defineService('Shop.Orders').method('create').build();

        new DecisionResolver({ autoIntercept: true }).resolve(methodOf(type, 'create'));

        expect(spy).not.toHaveBeenCalled();
        spy.mockRestore();
    });
});
