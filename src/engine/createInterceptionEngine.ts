/**
 * createInterceptionEngine() — One-Call Wiring
 *
 * Validates the policy, builds the rule table, resolver and cache, and
 * hands back a small facade over them. Observer and tracer are passed
 * down to every component that reports.
 *
 * @example
 * ```typescript
 * const engine = createInterceptionEngine(
 *     new PolicyBuilder()
 *         .autoIntercept(false)
 *         .service('Billing.Service', s => s.logInput()),
 *     { debug: createDebugObserver(), types: [BillingService] },
 * );
 *
 * engine.lookup(chargeMethod);                  // { behavior: 'input', ... }
 * const billing = engine.intercept(impl, BillingService, sink);
 * ```
 *
 * @module
 */
import { type InterceptionDecision } from '../domain/InterceptionDecision.js';
import { type MethodDescriptor, type ServiceType } from '../domain/ServiceType.js';
import { PolicyBuilder } from '../config/PolicyBuilder.js';
import { type InterceptionPolicyConfig } from '../config/PolicyConfigSchema.js';
import {
    type ResolvedPolicyConfig,
    type ShadowedRuleWarning,
    detectShadowedRules,
    parsePolicyConfig,
} from '../config/parsePolicyConfig.js';
import { interceptInstance } from '../interception/interceptInstance.js';
import { type InvocationSink } from '../interception/types.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type CallsightTracer } from '../observability/Tracing.js';
import { type TypeEntry, DecisionCache } from '../resolution/DecisionCache.js';
import { DecisionResolver } from '../resolution/DecisionResolver.js';
import { PatternRuleTable } from '../resolution/PatternRuleTable.js';

// ── Types ────────────────────────────────────────────────

export interface InterceptionEngineOptions {
    /** Receives register, resolve, redirect, fallback and error events. */
    readonly debug?: DebugObserverFn;
    /** Opens a span per type registration. */
    readonly tracer?: CallsightTracer;
    /** Types to register right away, in order. */
    readonly types?: Iterable<ServiceType>;
}

export interface InterceptionEngine {
    /** The validated policy the engine was built from. */
    readonly config: ResolvedPolicyConfig;
    /** Wildcard rules that can never match, in declaration order. */
    readonly warnings: readonly ShadowedRuleWarning[];
    readonly resolver: DecisionResolver;
    readonly cache: DecisionCache;

    registerType(type: ServiceType): TypeEntry;
    registerTypes(types: Iterable<ServiceType>): void;
    /** See {@link DecisionCache.lookup}. */
    lookup(method: MethodDescriptor, receiverType?: ServiceType): InterceptionDecision | null;
    /** Proxy an instance of a registered type; see {@link interceptInstance}. */
    intercept<T extends object>(instance: T, type: ServiceType, sink: InvocationSink): T;
}

// ── Factory ──────────────────────────────────────────────

/**
 * Build an engine from raw configuration or a {@link PolicyBuilder}.
 *
 * @throws {PolicyConfigError} If the configuration does not validate
 * @throws {ServiceRegistrationError} If a type in `options.types` is not a concrete class
 */
export function createInterceptionEngine(
    config: InterceptionPolicyConfig | PolicyBuilder = {},
    options: InterceptionEngineOptions = {},
): InterceptionEngine {
    const resolved = config instanceof PolicyBuilder ? config.build() : parsePolicyConfig(config);

    const resolver = new DecisionResolver({
        rules: new PatternRuleTable(resolved.rules),
        autoIntercept: resolved.autoIntercept,
        debug: options.debug,
    });
    const cache = new DecisionCache({
        resolver,
        debug: options.debug,
        tracer: options.tracer,
    });

    if (options.types) cache.registerTypes(options.types);

    return Object.freeze({
        config: resolved,
        warnings: detectShadowedRules(resolved.rules),
        resolver,
        cache,
        registerType: (type: ServiceType) => cache.registerType(type),
        registerTypes: (types: Iterable<ServiceType>) => cache.registerTypes(types),
        lookup: (method: MethodDescriptor, receiverType?: ServiceType) => cache.lookup(method, receiverType),
        intercept: <T extends object>(instance: T, type: ServiceType, sink: InvocationSink): T =>
            interceptInstance(instance, type, cache, sink, { debug: options.debug }),
    });
}
