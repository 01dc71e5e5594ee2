/**
 * DebugObserver — Structured Debug Events for the Policy Engine
 *
 * Typed events emitted while types are registered, decisions are
 * resolved, interface methods are redirected and unregistered types
 * fall back to on-demand resolution. The steady-state lookup of a
 * registered method never emits: no event object is built there.
 *
 * When no observer is attached (the default), no event is constructed
 * anywhere.
 *
 * @example
 * ```typescript
 * import { createDebugObserver } from 'callsight';
 *
 * // Default: compact console.debug output
 * const debug = createDebugObserver();
 *
 * // Custom handler (e.g. forward to a logger)
 * const debug = createDebugObserver((event) => {
 *     logger.debug(event.type, event);
 * });
 *
 * const engine = createInterceptionEngine(config, { debug });
 * ```
 *
 * @module
 */
import { type InterceptionBehavior } from '../domain/InterceptionDecision.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted after a concrete type's entry has been installed. */
export interface RegisterEvent {
    readonly type: 'register';
    /** Fully-qualified type name */
    readonly service: string;
    /** Number of eligible methods with a stored decision (including `null`) */
    readonly methods: number;
    /** Number of those methods that will be intercepted */
    readonly intercepted: number;
    /** Whether the type carries a type-level disable marker */
    readonly disabled: boolean;
    /** Whether an existing entry was replaced */
    readonly replaced: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Where a resolved decision came from. */
export type DecisionSource = 'ineligible' | 'disabled' | 'marker' | 'rule' | 'default' | 'none';

/** Emitted for every method the resolver evaluates. */
export interface ResolveEvent {
    readonly type: 'resolve';
    /** Method identity key */
    readonly method: string;
    readonly source: DecisionSource;
    /** Resolved behavior, or `null` when the method is not intercepted */
    readonly behavior: InterceptionBehavior | null;
    readonly timestamp: number;
}

/** Emitted the first time an interface method is mapped to an implementation. */
export interface RedirectEvent {
    readonly type: 'redirect';
    /** Interface method identity key */
    readonly method: string;
    /** Implementation method identity key, or `null` when unresolved */
    readonly implementation: string | null;
    readonly timestamp: number;
}

/** Emitted when a method of an unregistered class is resolved on demand. */
export interface FallbackEvent {
    readonly type: 'fallback';
    readonly method: string;
    readonly behavior: InterceptionBehavior | null;
    readonly timestamp: number;
}

/**
 * Emitted when registration fails (rethrown to the caller) or when an
 * invocation sink throws (the call's own outcome is kept).
 */
export interface ErrorEvent {
    readonly type: 'error';
    readonly service: string;
    readonly error: string;
    readonly step: 'register' | 'sink';
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * Use a `switch` on `event.type` for exhaustive handling.
 */
export type DebugEvent =
    | RegisterEvent
    | ResolveEvent
    | RedirectEvent
    | FallbackEvent
    | ErrorEvent;

/** Observer function that receives debug events. */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * If a custom handler is provided it is returned as-is. The default
 * handler writes one compact line per event:
 *
 * ```
 * [callsight] register  Shop.OrderService 3/4 methods 0.2ms
 * [callsight] resolve   Shop.OrderService.cancel["string"] marker → both
 * [callsight] redirect  Shop.IOrderService.cancel["string"] → Shop.OrderService.cancel["string"]
 * [callsight] fallback  Shop.Unregistered.run[] → none
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        const prefix = '[callsight]';

        switch (event.type) {
            case 'register': {
                const flag = event.disabled ? ' (disabled)' : event.replaced ? ' (replaced)' : '';
                console.debug(`${prefix} register  ${event.service} ${event.intercepted}/${event.methods} methods${flag} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'resolve':
                console.debug(`${prefix} resolve   ${event.method} ${event.source} → ${event.behavior ?? 'none'}`);
                break;

            case 'redirect':
                console.debug(`${prefix} redirect  ${event.method} → ${event.implementation ?? 'unresolved'}`);
                break;

            case 'fallback':
                console.debug(`${prefix} fallback  ${event.method} → ${event.behavior ?? 'none'}`);
                break;

            case 'error':
                console.debug(`${prefix} ERROR     ${event.service} [${event.step}] ${event.error}`);
                break;
        }
    };
}
