/**
 * interceptInstance — Call-Boundary Proxy
 *
 * Wraps a service instance so every public method call is looked up in
 * a {@link DecisionCache} and, when a decision comes back, reported to
 * an {@link InvocationSink}. Methods without a decision run untouched.
 *
 * Overloads share one JavaScript function, so the descriptor is chosen
 * by argument count: the overload whose parameter list has exactly
 * that length, else the only overload with the name. When neither
 * exists the call is not recorded.
 *
 * The original method runs with the unwrapped instance as `this`, so
 * calls a service makes on itself are not recorded twice.
 *
 * Recording never changes the outcome of a call: a sink that throws is
 * reported to the debug observer as an `error` event (step `'sink'`) and
 * the caller still gets the method's own result or error. Own function
 * properties that are frozen (read-only and non-configurable) are
 * returned as they are and not recorded.
 *
 * @example
 * ```typescript
 * const orders = interceptInstance(new OrderService(), OrderServiceType, cache, record => {
 *     logger.log(record.level, `${record.service}.${record.method}`, record.input);
 * });
 *
 * await orders.cancel('o-1', 2); // recorded with the `cancel(string, number)` decision
 * ```
 *
 * @module
 */
import { type InterceptionDecision, capturesInput, capturesOutput } from '../domain/InterceptionDecision.js';
import { type MethodDescriptor, type ServiceType } from '../domain/ServiceType.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type DecisionCache } from '../resolution/DecisionCache.js';
import { collectMethods } from '../resolution/MethodIdentityResolver.js';
import { type InvocationRecord, type InvocationSink } from './types.js';

// ── Overload Table ───────────────────────────────────────

/** Method name → instance methods with that name, most derived first. */
export type OverloadTable = ReadonlyMap<string, readonly MethodDescriptor[]>;

/** Group a type's instance methods (own and inherited) by name. */
export function buildOverloadTable(type: ServiceType): OverloadTable {
    const table = new Map<string, MethodDescriptor[]>();
    for (const method of collectMethods(type)) {
        if (method.kind !== 'method' || method.isStatic) continue;
        const overloads = table.get(method.name);
        if (overloads) overloads.push(method);
        else table.set(method.name, [method]);
    }
    return table;
}

/**
 * Pick the overload for a call with `argCount` arguments, or `null`
 * when the call is ambiguous or the name is unknown.
 */
export function selectOverload(
    table: OverloadTable,
    name: string,
    argCount: number,
): MethodDescriptor | null {
    const overloads = table.get(name);
    if (!overloads) return null;

    const exact = overloads.find(m => m.parameterTypes.length === argCount);
    if (exact) return exact;
    return overloads.length === 1 ? (overloads[0] ?? null) : null;
}

// ── Proxy ────────────────────────────────────────────────

export interface InterceptOptions {
    /** Receives an `error` event when the sink throws. */
    readonly debug?: DebugObserverFn;
}

/**
 * Return a proxy of `instance` that records calls through `sink`.
 *
 * `type` must describe the instance's class; register it with the
 * cache first, or every call goes through on-demand resolution.
 */
export function interceptInstance<T extends object>(
    instance: T,
    type: ServiceType,
    cache: DecisionCache,
    sink: InvocationSink,
    options: InterceptOptions = {},
): T {
    const table = buildOverloadTable(type);
    const wrappers = new WeakMap<object, (...args: unknown[]) => unknown>();

    return new Proxy(instance, {
        get(target, prop, receiver) {
            const value: unknown = Reflect.get(target, prop, receiver);
            if (typeof value !== 'function' || typeof prop !== 'string' || !table.has(prop)) {
                return value;
            }

            // A proxy must report frozen own data properties unchanged.
            const own = Reflect.getOwnPropertyDescriptor(target, prop);
            if (own !== undefined && !own.configurable && own.writable === false) {
                return value;
            }

            let wrapper = wrappers.get(value);
            if (!wrapper) {
                const original = value;
                const name = prop;
                wrapper = (...args: unknown[]): unknown => {
                    const method = selectOverload(table, name, args.length);
                    const decision = method ? cache.lookup(method, type) : null;
                    if (!method || !decision) return Reflect.apply(original, target, args);
                    return invoke(
                        { type, method, decision, args, sink, debug: options.debug },
                        () => Reflect.apply(original, target, args),
                    );
                };
                wrappers.set(value, wrapper);
            }
            return wrapper;
        },
    });
}

// ── Invocation ───────────────────────────────────────────

interface CallContext {
    readonly type: ServiceType;
    readonly method: MethodDescriptor;
    readonly decision: InterceptionDecision;
    readonly args: readonly unknown[];
    readonly sink: InvocationSink;
    readonly debug: DebugObserverFn | undefined;
}

function invoke(ctx: CallContext, call: () => unknown): unknown {
    const start = Date.now();

    let result: unknown;
    try {
        result = call();
    } catch (err) {
        emit(ctx, failure(ctx, err, start));
        throw err;
    }

    if (isPromiseLike(result)) {
        return Promise.resolve(result).then(
            (value: unknown) => {
                emit(ctx, success(ctx, value, start));
                return value;
            },
            (err: unknown) => {
                emit(ctx, failure(ctx, err, start));
                throw err;
            },
        );
    }

    emit(ctx, success(ctx, result, start));
    return result;
}

/** Hand a record to the sink. Sink failures go to the observer only. */
function emit(ctx: CallContext, record: InvocationRecord): void {
    try {
        ctx.sink(record);
    } catch (err) {
        ctx.debug?.({
            type: 'error',
            service: ctx.type.name,
            error: err instanceof Error ? err.message : String(err),
            step: 'sink',
            timestamp: Date.now(),
        });
    }
}

function baseRecord(ctx: CallContext, start: number) {
    const now = Date.now();
    return {
        service: ctx.type.name,
        method: ctx.method.name,
        key: ctx.method.identity.key,
        decision: ctx.decision,
        target: ctx.decision.target,
        ...(capturesInput(ctx.decision) ? { input: Object.freeze([...ctx.args]) } : {}),
        durationMs: now - start,
        timestamp: now,
    };
}

function success(ctx: CallContext, value: unknown, start: number): InvocationRecord {
    const record: InvocationRecord = {
        ...baseRecord(ctx, start),
        outcome: 'success',
        level: ctx.decision.level,
        ...(capturesOutput(ctx.decision) ? { output: value } : {}),
    };
    return Object.freeze(record);
}

function failure(ctx: CallContext, error: unknown, start: number): InvocationRecord {
    const record: InvocationRecord = {
        ...baseRecord(ctx, start),
        outcome: 'failure',
        level: ctx.decision.exceptionLevel,
        error,
    };
    return Object.freeze(record);
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
    return typeof value === 'object'
        && value !== null
        && 'then' in value
        && typeof value.then === 'function';
}
