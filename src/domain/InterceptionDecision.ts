/**
 * InterceptionDecision — The Resolved Outcome for One Method
 *
 * Immutable value: what to capture, at which severity on success, at
 * which severity on failure, and which named sink to route to.
 *
 * Decisions are never mutated. Every `with*` helper returns a new
 * frozen value, so a decision handed out by the cache can be shared
 * freely between call sites.
 *
 * @example
 * ```typescript
 * const decision = createDecision({ behavior: 'both', level: LogLevel.Warning });
 * const routed = withTarget(decision, 'audit');
 * decision.target; // null: the original is untouched
 * ```
 *
 * @module
 */
import { LogLevel } from './LogLevel.js';

// ── Behavior ─────────────────────────────────────────────

/**
 * Which parts of a call are captured.
 *
 * - `'none'`   — nothing (present for completeness; the cache reports
 *   "no interception" as `null`)
 * - `'input'`  — arguments
 * - `'output'` — return value
 * - `'both'`   — arguments and return value
 */
export type InterceptionBehavior = 'none' | 'input' | 'output' | 'both';

/** Every behavior, for validation. */
export const INTERCEPTION_BEHAVIORS: readonly InterceptionBehavior[] = Object.freeze([
    'none', 'input', 'output', 'both',
]);

// ── Decision ─────────────────────────────────────────────

export interface InterceptionDecision {
    readonly behavior: InterceptionBehavior;
    /** Severity for normal completion. */
    readonly level: LogLevel;
    /** Severity when the call throws or rejects. */
    readonly exceptionLevel: LogLevel;
    /** Named sink, or `null` for the default sink. */
    readonly target: string | null;
}

/** Partial input accepted by {@link createDecision}. */
export interface DecisionInit {
    readonly behavior?: InterceptionBehavior;
    readonly level?: LogLevel;
    readonly exceptionLevel?: LogLevel;
    readonly target?: string | null;
}

/** The auto-intercept default: capture input, Information, Error, default sink. */
export const DEFAULT_DECISION: InterceptionDecision = Object.freeze({
    behavior: 'input',
    level: LogLevel.Information,
    exceptionLevel: LogLevel.Error,
    target: null,
});

/**
 * Create a frozen decision, filling unspecified fields from
 * {@link DEFAULT_DECISION}.
 */
export function createDecision(init: DecisionInit = {}): InterceptionDecision {
    return Object.freeze({
        behavior: init.behavior ?? DEFAULT_DECISION.behavior,
        level: init.level ?? DEFAULT_DECISION.level,
        exceptionLevel: init.exceptionLevel ?? DEFAULT_DECISION.exceptionLevel,
        target: init.target ?? null,
    });
}

export function withBehavior(decision: InterceptionDecision, behavior: InterceptionBehavior): InterceptionDecision {
    return Object.freeze({ ...decision, behavior });
}

export function withLevel(decision: InterceptionDecision, level: LogLevel): InterceptionDecision {
    return Object.freeze({ ...decision, level });
}

export function withExceptionLevel(decision: InterceptionDecision, exceptionLevel: LogLevel): InterceptionDecision {
    return Object.freeze({ ...decision, exceptionLevel });
}

export function withTarget(decision: InterceptionDecision, target: string | null): InterceptionDecision {
    return Object.freeze({ ...decision, target });
}

/** Structural equality of two decisions (either may be `null`). */
export function decisionsEqual(
    a: InterceptionDecision | null,
    b: InterceptionDecision | null,
): boolean {
    if (a === b) return true;
    if (a === null || b === null) return false;
    return a.behavior === b.behavior
        && a.level === b.level
        && a.exceptionLevel === b.exceptionLevel
        && a.target === b.target;
}

/** Whether the decision captures call arguments. */
export function capturesInput(decision: InterceptionDecision): boolean {
    return decision.behavior === 'input' || decision.behavior === 'both';
}

/** Whether the decision captures the return value. */
export function capturesOutput(decision: InterceptionDecision): boolean {
    return decision.behavior === 'output' || decision.behavior === 'both';
}
