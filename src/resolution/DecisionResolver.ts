/**
 * DecisionResolver — Fixed-Precedence Decision per Method
 *
 * Turns markers, configuration rules and the default policy into one
 * decision. The order never changes:
 *
 * 0. ineligible          → `null` (structural filter, types that log
 *                          for themselves, rule-excluded method names)
 * 1. disable marker      → `null`
 * 2. enable marker       → the marker decision
 * 3. configuration rule  → the rule decision (by declaring type name)
 * 4. default policy      → {@link DEFAULT_DECISION} when `autoIntercept`
 *                          is on, else `null`
 *
 * Markers always outrank configuration, and configuration always
 * outranks the default.
 *
 * `autoIntercept` is a constructor argument, so resolvers with
 * different policies can coexist.
 *
 * @example
 * ```typescript
 * const resolver = new DecisionResolver({ rules: table, autoIntercept: false });
 * resolver.resolve(method);           // InterceptionDecision | null
 * resolver.explain(method).source;    // 'marker' | 'rule' | ...
 * ```
 *
 * @module
 */
import { type InterceptionDecision, DEFAULT_DECISION } from '../domain/InterceptionDecision.js';
import { type MethodDescriptor } from '../domain/ServiceType.js';
import { type DebugObserverFn, type DecisionSource } from '../observability/DebugObserver.js';
import { inspectMarkers } from './MarkerInspector.js';
import { isEligible } from './MethodIdentityResolver.js';
import { isExcludedByPatterns } from './MethodPatternMatcher.js';
import { type PatternRule, PatternRuleTable } from './PatternRuleTable.js';

// ── Types ────────────────────────────────────────────────

export interface DecisionResolverOptions {
    /** Configuration rules (a table, or rules to build one from). */
    readonly rules?: PatternRuleTable | readonly PatternRule[];
    /** Apply {@link DEFAULT_DECISION} when nothing else matches. */
    readonly autoIntercept: boolean;
    /** Receives a `resolve` event per evaluated method. */
    readonly debug?: DebugObserverFn;
}

/** A decision together with the tier that produced it. */
export interface DecisionExplanation {
    readonly decision: InterceptionDecision | null;
    readonly source: DecisionSource;
}

// ── Resolver ─────────────────────────────────────────────

export class DecisionResolver {
    private readonly _rules: PatternRuleTable;
    private readonly _autoIntercept: boolean;
    private readonly _debug: DebugObserverFn | undefined;

    constructor(options: DecisionResolverOptions) {
        this._rules = options.rules instanceof PatternRuleTable
            ? options.rules
            : new PatternRuleTable(options.rules ?? []);
        this._autoIntercept = options.autoIntercept;
        this._debug = options.debug;
    }

    get autoIntercept(): boolean {
        return this._autoIntercept;
    }

    get rules(): PatternRuleTable {
        return this._rules;
    }

    /** The resolved decision, or `null` for "do not intercept". */
    resolve(method: MethodDescriptor): InterceptionDecision | null {
        return this.explain(method).decision;
    }

    /** Resolve and report which tier decided. */
    explain(method: MethodDescriptor): DecisionExplanation {
        const result = this._explain(method);
        this._debug?.({
            type: 'resolve',
            method: method.identity.key,
            source: result.source,
            behavior: result.decision?.behavior ?? null,
            timestamp: Date.now(),
        });
        return result;
    }

    /**
     * Structural eligibility plus configuration-driven exclusions:
     * the declaring type logs for itself, or a matching rule excludes
     * the method name.
     */
    isInterceptable(method: MethodDescriptor): boolean {
        if (!isEligible(method)) return false;

        const owner = method.declaringType;
        if (owner.managesOwnLogging) return false;

        const rule = this._rules.findRule(owner.name);
        return !(rule && isExcludedByPatterns(method.name, rule.excludeMethodPatterns));
    }

    // ── Private ──────────────────────────────────────────

    private _explain(method: MethodDescriptor): DecisionExplanation {
        if (!this.isInterceptable(method)) return { decision: null, source: 'ineligible' };

        const markers = inspectMarkers(method);
        if (markers.disabled) return { decision: null, source: 'disabled' };
        if (markers.decision) return { decision: markers.decision, source: 'marker' };

        const configured = this._rules.lookup(method.declaringType.name);
        if (configured) return { decision: configured, source: 'rule' };

        if (this._autoIntercept) {
            return { decision: DEFAULT_DECISION, source: 'default' };
        }
        return { decision: null, source: 'none' };
    }
}
