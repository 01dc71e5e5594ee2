/**
 * PatternRuleTable — Configuration Rules Keyed by Type Name
 *
 * Read-only, ordered table of `(pattern → decision)` rules.
 *
 * Matching, by fully-qualified type name:
 * 1. exact key match
 * 2. otherwise the FIRST wildcard rule (in table order) whose prefix,
 *    the pattern without its trailing `*`, is an ordinal prefix of
 *    the name
 *
 * First match wins, not longest prefix: order the table from most to
 * least specific when that matters. Only trailing wildcards exist;
 * patterns are validated before they reach this table (see
 * `parsePolicyConfig`).
 *
 * Lookups are memoized per type name, bounded to
 * {@link MAX_CACHE_SIZE} entries.
 *
 * @example
 * ```typescript
 * const table = new PatternRuleTable([
 *     { pattern: 'Billing.Service', decision: createDecision(), excludeMethodPatterns: [] },
 *     { pattern: 'Billing.*', decision: createDecision({ behavior: 'output' }), excludeMethodPatterns: ['get*'] },
 * ]);
 *
 * table.lookup('Billing.Service')?.behavior;  // 'input'  (exact)
 * table.lookup('Billing.Invoices')?.behavior; // 'output' (wildcard)
 * table.lookup('Shipping.Service');           // null
 * ```
 *
 * @module
 */
import { type InterceptionDecision } from '../domain/InterceptionDecision.js';

/** Maximum memoized type names; the memo is cleared when reached. */
const MAX_CACHE_SIZE = 2048;

export interface PatternRule {
    /** Exact type name, or a prefix ending in `*`. */
    readonly pattern: string;
    readonly decision: InterceptionDecision;
    /** Method-name patterns excluded from interception on matching types. */
    readonly excludeMethodPatterns: readonly string[];
}

/** Whether a pattern is a trailing-wildcard prefix pattern. */
export function isWildcardPattern(pattern: string): boolean {
    return pattern.endsWith('*');
}

export class PatternRuleTable {
    private readonly _rules: readonly PatternRule[];
    private readonly _exact: ReadonlyMap<string, PatternRule>;
    private readonly _wildcards: ReadonlyArray<{ readonly prefix: string; readonly rule: PatternRule }>;

    /** Key = type name, Value = matched rule or null. */
    private readonly _cache = new Map<string, PatternRule | null>();

    /**
     * @param rules - Validated rules, in priority order. When two rules
     *   share an exact pattern, the first one is kept.
     */
    constructor(rules: readonly PatternRule[] = []) {
        this._rules = Object.freeze(rules.map(r => Object.freeze({
            ...r,
            excludeMethodPatterns: Object.freeze([...r.excludeMethodPatterns]),
        })));

        const exact = new Map<string, PatternRule>();
        const wildcards: Array<{ prefix: string; rule: PatternRule }> = [];
        for (const rule of this._rules) {
            if (isWildcardPattern(rule.pattern)) {
                wildcards.push(Object.freeze({ prefix: rule.pattern.slice(0, -1), rule }));
            } else if (!exact.has(rule.pattern)) {
                exact.set(rule.pattern, rule);
            }
        }
        this._exact = exact;
        this._wildcards = Object.freeze(wildcards);
    }

    /** Number of rules in the table. */
    get size(): number {
        return this._rules.length;
    }

    /** Rules in table order. */
    get rules(): readonly PatternRule[] {
        return this._rules;
    }

    /** The decision of the matching rule, or `null`. */
    lookup(typeName: string): InterceptionDecision | null {
        return this.findRule(typeName)?.decision ?? null;
    }

    /** The matching rule itself, or `null`. */
    findRule(typeName: string): PatternRule | null {
        if (this._rules.length === 0) return null;

        const cached = this._cache.get(typeName);
        if (cached !== undefined) return cached;

        const result = this._match(typeName);

        if (this._cache.size >= MAX_CACHE_SIZE) {
            this._cache.clear();
        }
        this._cache.set(typeName, result);
        return result;
    }

    // ── Private ──────────────────────────────────────────

    private _match(typeName: string): PatternRule | null {
        const exact = this._exact.get(typeName);
        if (exact) return exact;

        for (const { prefix, rule } of this._wildcards) {
            if (typeName.startsWith(prefix)) return rule;
        }
        return null;
    }
}
