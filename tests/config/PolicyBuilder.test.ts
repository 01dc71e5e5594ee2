/**
 * PolicyBuilder — Unit Tests
 */
import { describe, it, expect } from 'vitest';
import { PolicyBuilder } from '../../src/config/PolicyBuilder.js';
import { PolicyConfigError } from '../../src/config/PolicyConfigError.js';
import { LogLevel } from '../../src/domain/LogLevel.js';

describe('PolicyBuilder', () => {
    it('builds the default policy', () => {
        expect(new PolicyBuilder().build()).toEqual({ rules: [], autoIntercept: true });
    });

    it('builds rules fluently', () => {
        const policy = new PolicyBuilder()
            .autoIntercept(false)
            .service('Billing.Service', s => s.logInput())
            .service('Shop.*', s => s
                .logBoth()
                .level('Debug')
                .exceptionLevel(LogLevel.Critical)
                .target('audit')
                .exclude('get*')
                .exclude('list*'))
            .build();

        expect(policy.autoIntercept).toBe(false);
        expect(policy.rules.map(r => r.pattern)).toEqual(['Billing.Service', 'Shop.*']);
        expect(policy.rules[0]?.decision.behavior).toBe('input');
        expect(policy.rules[1]?.decision).toEqual({
            behavior: 'both', level: LogLevel.Debug, exceptionLevel: LogLevel.Critical, target: 'audit',
        });
        expect(policy.rules[1]?.excludeMethodPatterns).toEqual(['get*', 'list*']);
    });

    it('produces the raw configuration the file format uses', () => {
        const config = new PolicyBuilder()
            .autoIntercept(false)
            .service('Billing.Service', s => s.logOutput().level(LogLevel.Warning))
            .service('Shop.*', () => undefined)
            .toConfig();

        expect(config).toEqual({
            autoIntercept: false,
            services: {
                'Billing.Service': { logOutput: true, level: LogLevel.Warning },
                'Shop.*': {},
            },
        });
    });

    it('replaces a repeated pattern in place', () => {
        const policy = new PolicyBuilder()
            .service('A.*', s => s.logInput())
            .service('B.*', s => s.logInput())
            .service('A.*', s => s.logOutput())
            .build();

        expect(policy.rules.map(r => [r.pattern, r.decision.behavior])).toEqual([
            ['A.*', 'output'],
            ['B.*', 'input'],
        ]);
    });

    it('validates on build', () => {
        const builder = new PolicyBuilder().service('Shop.*.Orders', s => s.logInput());
        expect(() => builder.build()).toThrow(PolicyConfigError);
    });
});
