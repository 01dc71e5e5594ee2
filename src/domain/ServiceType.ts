/**
 * ServiceType — Load-Time Metadata for an Intercepted Service
 *
 * TypeScript erases parameter types and interfaces at runtime, so a
 * service describes its callable surface explicitly: a side-table built
 * once at load time (see `defineService` / `defineInterface`). The
 * engine reads only this table; it never inspects live objects.
 *
 * Every class implicitly extends {@link OBJECT_TYPE}, whose members are
 * never eligible for interception.
 *
 * @module
 */
import { type InterceptionMarker } from './InterceptionMarker.js';
import { type MethodIdentity, createIdentity } from './MethodIdentity.js';

// ── Member Kinds ─────────────────────────────────────────

/**
 * What kind of member a descriptor represents. Only `'method'` is
 * ever eligible; the others exist so that a full surface can be
 * described without hand-filtering accessors and event handlers.
 */
export type MemberKind =
    | 'method'
    | 'constructor'
    | 'getter'
    | 'setter'
    | 'event-add'
    | 'event-remove';

export type Visibility = 'public' | 'protected' | 'private';

// ── Descriptors ──────────────────────────────────────────

export interface MethodDescriptor {
    readonly name: string;
    /** The type that declares this member (may be a base of the type listing it). */
    readonly declaringType: ServiceType;
    readonly parameterTypes: readonly string[];
    readonly kind: MemberKind;
    readonly visibility: Visibility;
    readonly isStatic: boolean;
    readonly markers: readonly InterceptionMarker[];
    /** Computed once when the descriptor is built. */
    readonly identity: MethodIdentity;
}

export interface ServiceType {
    /** Fully-qualified, dot-separated name (`'Billing.Service'`). */
    readonly name: string;
    readonly kind: 'class' | 'interface';
    /** Abstract classes cannot be registered as concrete implementations. */
    readonly abstract: boolean;
    /** Interfaces this type implements (classes) or extends (interfaces). */
    readonly implements: readonly ServiceType[];
    /** Base class; `undefined` means the universal base. */
    readonly base: ServiceType | undefined;
    readonly markers: readonly InterceptionMarker[];
    /** Members declared directly on this type. */
    readonly methods: readonly MethodDescriptor[];
    /**
     * The type logs for itself (it receives the framework logger), so
     * none of its methods are intercepted.
     */
    readonly managesOwnLogging: boolean;
}

/** A class that can be registered: not an interface, not abstract. */
export function isConcrete(type: ServiceType): boolean {
    return type.kind === 'class' && !type.abstract;
}

// ── Universal Base ───────────────────────────────────────

const OBJECT_MEMBERS: ReadonlyArray<readonly [string, readonly string[]]> = [
    ['toString', []],
    ['toLocaleString', []],
    ['valueOf', []],
    ['hasOwnProperty', ['PropertyKey']],
    ['isPrototypeOf', ['Object']],
    ['propertyIsEnumerable', ['PropertyKey']],
];

function createObjectType(): ServiceType {
    const methods: MethodDescriptor[] = [];
    const type: ServiceType = Object.freeze({
        name: 'Object',
        kind: 'class',
        abstract: false,
        implements: Object.freeze([]),
        base: undefined,
        markers: Object.freeze([]),
        methods,
        managesOwnLogging: false,
    });
    for (const [name, parameterTypes] of OBJECT_MEMBERS) {
        methods.push(Object.freeze({
            name,
            declaringType: type,
            parameterTypes: Object.freeze([...parameterTypes]),
            kind: 'method',
            visibility: 'public',
            isStatic: false,
            markers: Object.freeze([]),
            identity: createIdentity('Object', name, parameterTypes),
        }));
    }
    Object.freeze(methods);
    return type;
}

/** The universal base every class inherits from. */
export const OBJECT_TYPE: ServiceType = createObjectType();

/** Base chain of a type, starting with the type itself and ending at {@link OBJECT_TYPE}. */
export function baseChain(type: ServiceType): ServiceType[] {
    const chain: ServiceType[] = [];
    let current: ServiceType | undefined = type;
    while (current && current !== OBJECT_TYPE) {
        chain.push(current);
        current = current.base;
    }
    if (type.kind === 'class') chain.push(OBJECT_TYPE);
    return chain;
}
