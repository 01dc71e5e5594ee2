/**
 * parsePolicyConfig — Configuration Boundary
 *
 * Validates raw configuration and turns each service entry into a
 * {@link PatternRule}. Rules keep the declaration order of `services`,
 * which is the order wildcard rules are tried in.
 *
 * Flags map to a behavior:
 *
 * - `logInput` and `logOutput` → `'both'`
 * - `logOutput` only          → `'output'`
 * - anything else             → `'input'`
 *
 * @example
 * ```typescript
 * const { rules, autoIntercept } = parsePolicyConfig({
 *     autoIntercept: false,
 *     services: { 'Billing.Service': { logInput: true } },
 * });
 * ```
 *
 * @module
 */
import { type InterceptionBehavior, createDecision } from '../domain/InterceptionDecision.js';
import { type PatternRule, isWildcardPattern } from '../resolution/PatternRuleTable.js';
import { toValidationIssues } from '../utils.js';
import { PolicyConfigError } from './PolicyConfigError.js';
import { InterceptionPolicyConfigSchema } from './PolicyConfigSchema.js';

// ── Types ────────────────────────────────────────────────

/** Validated configuration, ready for a {@link DecisionResolver}. */
export interface ResolvedPolicyConfig {
    readonly rules: readonly PatternRule[];
    readonly autoIntercept: boolean;
}

/**
 * A wildcard rule that can never match because an earlier wildcard
 * already covers every name it would.
 *
 * Not an error (first match wins deterministically), but usually a
 * misordered configuration.
 */
export interface ShadowedRuleWarning {
    readonly message: string;
    /** Index of the earlier, broader rule. */
    readonly shadowingIndex: number;
    /** Index of the later rule that never matches. */
    readonly shadowedIndex: number;
}

// ── Parse ────────────────────────────────────────────────

/**
 * Validate raw configuration and build the rule list.
 *
 * @throws {PolicyConfigError} Listing every issue with its path
 */
export function parsePolicyConfig(raw: unknown): ResolvedPolicyConfig {
    const result = InterceptionPolicyConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new PolicyConfigError(toValidationIssues(result.error.issues), result.error);
    }

    const rules = Object.entries(result.data.services).map(([pattern, policy]): PatternRule => ({
        pattern,
        decision: createDecision({
            behavior: behaviorFromFlags(policy.logInput ?? false, policy.logOutput ?? false),
            level: policy.level,
            exceptionLevel: policy.exceptionLevel,
            target: policy.target ?? null,
        }),
        excludeMethodPatterns: policy.excludeMethodPatterns ?? [],
    }));

    return Object.freeze({
        rules: Object.freeze(rules),
        autoIntercept: result.data.autoIntercept,
    });
}

export function behaviorFromFlags(logInput: boolean, logOutput: boolean): InterceptionBehavior {
    if (logInput && logOutput) return 'both';
    if (logOutput) return 'output';
    return 'input';
}

// ── Shadow Detection ─────────────────────────────────────

/**
 * Find wildcard rules hidden behind an earlier wildcard whose prefix
 * is a prefix of theirs. Exact rules are checked before any wildcard,
 * so they are never shadowed.
 *
 * @example
 * ```typescript
 * detectShadowedRules(parsePolicyConfig({
 *     services: { 'Shop.*': {}, 'Shop.Orders.*': {} },
 * }).rules);
 * // [{ shadowingIndex: 0, shadowedIndex: 1, message: '...' }]
 * ```
 */
export function detectShadowedRules(rules: readonly PatternRule[]): readonly ShadowedRuleWarning[] {
    const warnings: ShadowedRuleWarning[] = [];

    rules.forEach((later, j) => {
        if (!isWildcardPattern(later.pattern)) return;
        const shadowing = rules.findIndex((earlier, i) =>
            i < j
            && isWildcardPattern(earlier.pattern)
            && later.pattern.startsWith(earlier.pattern.slice(0, -1)));
        if (shadowing === -1) return;

        const earlier = rules[shadowing]?.pattern ?? '';
        warnings.push({
            message:
                `rule[${shadowing}] ("${earlier}") shadows rule[${j}] ("${later.pattern}"). ` +
                `The later rule never matches because the first matching wildcard wins.`,
            shadowingIndex: shadowing,
            shadowedIndex: j,
        });
    });

    return warnings;
}
