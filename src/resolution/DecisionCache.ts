/**
 * DecisionCache — Write-Once-per-Type, Read-Many Decision Store
 *
 * Populated at startup, one {@link registerType} call per concrete
 * service type, and read on every intercepted call through
 * {@link lookup}.
 *
 * Entries are built off to the side, frozen, and published with a
 * single `Map.set`. An installed entry is never mutated; registering a
 * type again swaps in a whole new entry, so a reader sees either the
 * old entry or the new one, never a partial one.
 *
 * Lookup order:
 * 0. member not eligible (static, accessor, non-public) → `null`, so a
 *    static twin never reads the instance method's entry.
 * 1. receiver type given and registered, and its entry holds the key →
 *    stored decision. Covers members a registered class inherits.
 * 2. declaring type registered → stored decision (`null` when the type
 *    is disabled). Two `Map.get` calls, no allocation, no metadata
 *    inspection, no observer call.
 * 3. declaring type is an interface → redirect to the matching member
 *    of the first registered implementer (memoized until the next
 *    registration), `null` when unresolved. An unresolved interface
 *    method is never resolved on demand.
 * 4. otherwise → on-demand resolution, not cached.
 *
 * @example
 * ```typescript
 * const cache = new DecisionCache({
 *     resolver: new DecisionResolver({ rules, autoIntercept: true }),
 * });
 *
 * cache.registerTypes([OrderService, BillingService]);
 *
 * const decision = cache.lookup(cancelMethod); // InterceptionDecision | null
 * ```
 *
 * @module
 */
import { type InterceptionDecision } from '../domain/InterceptionDecision.js';
import { type MethodDescriptor, type ServiceType, isConcrete } from '../domain/ServiceType.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type CallsightTracer, SpanStatusCode } from '../observability/Tracing.js';
import { type DecisionResolver } from './DecisionResolver.js';
import { isTypeDisabled } from './MarkerInspector.js';
import {
    allInterfaces,
    eligibleMethods,
    findImplementer,
    isEligible,
    resolveImplementation,
} from './MethodIdentityResolver.js';
import { ServiceRegistrationError } from './ServiceRegistrationError.js';

// ── Types ────────────────────────────────────────────────

/** The installed, immutable record for one concrete type. */
export interface TypeEntry {
    readonly type: ServiceType;
    /** Type-level disable marker present: every lookup returns `null`. */
    readonly disabled: boolean;
    /** Identity key → decision (`null` = do not intercept). */
    readonly decisions: ReadonlyMap<string, InterceptionDecision | null>;
}

export interface DecisionCacheOptions {
    readonly resolver: DecisionResolver;
    /** Receives `register`, `redirect`, `fallback` and `error` events. */
    readonly debug?: DebugObserverFn;
    /** Opens a `callsight.register` span per registration. */
    readonly tracer?: CallsightTracer;
}

/** A memoized interface redirect: the implementer and its member. */
interface Redirect {
    readonly entry: TypeEntry;
    readonly method: MethodDescriptor;
}

// ── DecisionCache ────────────────────────────────────────

export class DecisionCache {
    private readonly _resolver: DecisionResolver;
    private readonly _debug: DebugObserverFn | undefined;
    private readonly _tracer: CallsightTracer | undefined;

    /** Type name → installed entry. The only state read on the hot path. */
    private readonly _entries = new Map<string, TypeEntry>();

    /** Interface name → implementing type names, in registration order. */
    private readonly _implementers = new Map<string, readonly string[]>();

    /** Interface method key → redirect (or `null` when unresolved). Cleared on registration. */
    private readonly _redirects = new Map<string, Redirect | null>();

    constructor(options: DecisionCacheOptions) {
        this._resolver = options.resolver;
        this._debug = options.debug;
        this._tracer = options.tracer;
    }

    get resolver(): DecisionResolver {
        return this._resolver;
    }

    /** Number of registered types. */
    get size(): number {
        return this._entries.size;
    }

    // ── Registration ─────────────────────────────────────

    /**
     * Precompute and install the decisions of every eligible method of a
     * concrete type. Registering the same type again replaces its entry.
     *
     * @throws {ServiceRegistrationError} If the type is an interface or abstract
     */
    registerType(type: ServiceType): TypeEntry {
        const start = Date.now();
        const span = this._tracer?.startSpan('callsight.register', {
            attributes: { 'callsight.type': type.name },
        });

        try {
            const { entry, replaced } = this._install(type);
            const durationMs = Date.now() - start;

            span?.setAttribute('callsight.methods', entry.decisions.size);
            span?.setAttribute('callsight.disabled', entry.disabled);
            span?.setAttribute('callsight.replaced', replaced);
            span?.setStatus({ code: SpanStatusCode.OK });

            if (this._debug) {
                let intercepted = 0;
                if (!entry.disabled) {
                    for (const decision of entry.decisions.values()) {
                        if (decision) intercepted++;
                    }
                }
                this._debug({
                    type: 'register',
                    service: type.name,
                    methods: entry.decisions.size,
                    intercepted,
                    disabled: entry.disabled,
                    replaced,
                    durationMs,
                    timestamp: Date.now(),
                });
            }

            return entry;
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);

            span?.setStatus({ code: SpanStatusCode.ERROR, message });
            span?.recordException(err instanceof Error ? err : new Error(message));

            this._debug?.({
                type: 'error',
                service: type.name,
                error: message,
                step: 'register',
                timestamp: Date.now(),
            });

            throw err;
        } finally {
            span?.end();
        }
    }

    /** Register several types, in order. Stops at the first failure. */
    registerTypes(types: Iterable<ServiceType>): void {
        for (const type of types) {
            this.registerType(type);
        }
    }

    /** Whether a type (or type name) has an installed entry. */
    isRegistered(type: ServiceType | string): boolean {
        return this._entries.has(typeof type === 'string' ? type : type.name);
    }

    /** The installed entry for a type, if any. */
    entryFor(type: ServiceType | string): TypeEntry | undefined {
        return this._entries.get(typeof type === 'string' ? type : type.name);
    }

    /** Registered types, in first-registration order. */
    registeredTypes(): ServiceType[] {
        return Array.from(this._entries.values(), entry => entry.type);
    }

    /** Drop every entry, index and memoized redirect. */
    clear(): void {
        this._entries.clear();
        this._implementers.clear();
        this._redirects.clear();
    }

    // ── Lookup ───────────────────────────────────────────

    /**
     * The decision for a method, or `null` for "do not record this call".
     * Never throws.
     *
     * @param receiverType - Concrete type the call is made on. Its entry
     *   is read first, so inherited members of a registered type never
     *   fall back to on-demand resolution.
     */
    lookup(method: MethodDescriptor, receiverType?: ServiceType): InterceptionDecision | null {
        if (!isEligible(method)) return null;

        if (receiverType !== undefined) {
            const receiver = this._entries.get(receiverType.name);
            if (receiver !== undefined) {
                if (receiver.disabled) return null;
                const stored = receiver.decisions.get(method.identity.key);
                if (stored !== undefined) return stored;
            }
        }

        const entry = this._entries.get(method.declaringType.name);
        if (entry !== undefined) {
            if (entry.disabled) return null;
            return entry.decisions.get(method.identity.key) ?? null;
        }

        if (method.declaringType.kind === 'interface') {
            return this._lookupInterface(method);
        }

        return this._lookupOnDemand(method);
    }

    // ── Private ──────────────────────────────────────────

    private _install(type: ServiceType): { entry: TypeEntry; replaced: boolean } {
        if (type.kind === 'interface') {
            throw new ServiceRegistrationError(type.name, 'interfaces cannot be registered; register a class that implements it');
        }
        if (!isConcrete(type)) {
            throw new ServiceRegistrationError(type.name, 'abstract classes cannot be registered');
        }

        const decisions = new Map<string, InterceptionDecision | null>();
        for (const method of eligibleMethods(type)) {
            decisions.set(method.identity.key, this._resolver.resolve(method));
        }

        const entry: TypeEntry = Object.freeze({
            type,
            disabled: isTypeDisabled(type),
            decisions,
        });

        const replaced = this._entries.has(type.name);
        this._entries.set(type.name, entry);
        this._indexImplementer(type);
        this._redirects.clear();

        return { entry, replaced };
    }

    private _indexImplementer(type: ServiceType): void {
        for (const iface of allInterfaces(type)) {
            const current = this._implementers.get(iface.name) ?? [];
            if (!current.includes(type.name)) {
                this._implementers.set(iface.name, Object.freeze([...current, type.name]));
            }
        }
    }

    private _lookupInterface(method: MethodDescriptor): InterceptionDecision | null {
        let redirect = this._redirects.get(method.identity.key);
        if (redirect === undefined) {
            redirect = this._resolveRedirect(method);
            this._redirects.set(method.identity.key, redirect);
            this._debug?.({
                type: 'redirect',
                method: method.identity.key,
                implementation: redirect?.method.identity.key ?? null,
                timestamp: Date.now(),
            });
        }
        if (redirect === null || redirect.entry.disabled) return null;
        return redirect.entry.decisions.get(redirect.method.identity.key) ?? null;
    }

    private _resolveRedirect(method: MethodDescriptor): Redirect | null {
        const names = this._implementers.get(method.declaringType.name);
        if (!names) return null;

        const candidates: ServiceType[] = [];
        for (const name of names) {
            const entry = this._entries.get(name);
            if (entry) candidates.push(entry.type);
        }

        const implementer = findImplementer(method.declaringType, candidates);
        const entry = implementer ? this._entries.get(implementer.name) : undefined;
        if (!implementer || !entry) return null;

        const implementation = resolveImplementation(method, [implementer]);
        return implementation ? { entry, method: implementation } : null;
    }

    private _lookupOnDemand(method: MethodDescriptor): InterceptionDecision | null {
        const decision = this._resolver.resolve(method);
        this._debug?.({
            type: 'fallback',
            method: method.identity.key,
            behavior: decision?.behavior ?? null,
            timestamp: Date.now(),
        });
        return decision;
    }
}
