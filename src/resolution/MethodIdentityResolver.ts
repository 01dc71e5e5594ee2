/**
 * MethodIdentityResolver — Eligibility, Identity, Interface Dispatch
 *
 * Pure functions over service metadata:
 *
 * - {@link isEligible} — only public, non-static, plain methods not
 *   declared on the universal base are ever intercepted
 * - {@link identityOf} — the overload-safe key, precomputed on the
 *   descriptor
 * - {@link resolveImplementation} — map an interface-declared method to
 *   the matching member of a concrete type that implements it
 *
 * "Not found" is `null` and always means "do not intercept"; nothing
 * here throws.
 *
 * @module
 */
import { type MethodIdentity, sameSignature } from '../domain/MethodIdentity.js';
import {
    type MethodDescriptor,
    type ServiceType,
    OBJECT_TYPE,
    baseChain,
    isConcrete,
} from '../domain/ServiceType.js';

// ── Identity ─────────────────────────────────────────────

export function identityOf(method: MethodDescriptor): MethodIdentity {
    return method.identity;
}

// ── Eligibility ──────────────────────────────────────────

/**
 * Structural eligibility: public, instance, plain method, not declared
 * on the universal base. Constructors, accessors and event handlers
 * are never eligible.
 */
export function isEligible(method: MethodDescriptor): boolean {
    return method.kind === 'method'
        && method.visibility === 'public'
        && !method.isStatic
        && method.declaringType !== OBJECT_TYPE;
}

// ── Member Collection ────────────────────────────────────

/**
 * All members visible on a type: its own, then each base's members that
 * are not overridden by a more derived declaration with the same kind,
 * name and parameter list. Includes the universal base's members.
 */
export function collectMethods(type: ServiceType): MethodDescriptor[] {
    const collected: MethodDescriptor[] = [];
    for (const owner of baseChain(type)) {
        for (const method of owner.methods) {
            const overridden = collected.some(m =>
                m.kind === method.kind
                && m.isStatic === method.isStatic
                && sameSignature(m.identity, method.identity));
            if (!overridden) collected.push(method);
        }
    }
    return collected;
}

/** The eligible members of a type, in collection order. */
export function eligibleMethods(type: ServiceType): MethodDescriptor[] {
    return collectMethods(type).filter(isEligible);
}

/**
 * Find a public instance method by name and parameter list, own or
 * inherited.
 */
export function findMethod(
    type: ServiceType,
    name: string,
    parameterTypes: readonly string[],
): MethodDescriptor | null {
    const wanted = { methodName: name, parameterTypes };
    for (const method of collectMethods(type)) {
        if (method.kind === 'method'
            && method.visibility === 'public'
            && !method.isStatic
            && sameSignature(method.identity, wanted)) {
            return method;
        }
    }
    return null;
}

// ── Assignability ────────────────────────────────────────

/** Every interface a type implements, directly, through a base, or through interface inheritance. */
export function allInterfaces(type: ServiceType): Set<ServiceType> {
    const result = new Set<ServiceType>();
    const pending: ServiceType[] = [];
    for (const owner of baseChain(type)) pending.push(...owner.implements);

    while (pending.length > 0) {
        const next = pending.pop();
        if (next === undefined || result.has(next)) continue;
        result.add(next);
        pending.push(...next.implements);
    }
    return result;
}

/**
 * Whether a value of `type` can be used where `target` is expected:
 * the same type, an interface it implements, or one of its bases.
 */
export function isAssignableTo(type: ServiceType, target: ServiceType): boolean {
    if (type === target || type.name === target.name) return true;
    if (target.kind === 'interface') {
        for (const iface of allInterfaces(type)) {
            if (iface === target || iface.name === target.name) return true;
        }
        return false;
    }
    return baseChain(type).some(t => t === target || t.name === target.name);
}

// ── Interface Dispatch ───────────────────────────────────

/**
 * The first candidate concrete type assignable to an interface, or
 * `null`. Candidates are scanned in the order given.
 */
export function findImplementer(
    iface: ServiceType,
    candidates: Iterable<ServiceType>,
): ServiceType | null {
    for (const candidate of candidates) {
        if (isConcrete(candidate) && isAssignableTo(candidate, iface)) return candidate;
    }
    return null;
}

/**
 * Resolve an interface-declared method to the matching member of the
 * first candidate concrete type that implements the interface.
 *
 * Returns `null` when the method is not declared on an interface, no
 * candidate implements it, or that candidate has no public member with
 * the same name and parameter list (e.g. a hidden implementation).
 */
export function resolveImplementation(
    interfaceMethod: MethodDescriptor,
    candidates: Iterable<ServiceType>,
): MethodDescriptor | null {
    const iface = interfaceMethod.declaringType;
    if (iface.kind !== 'interface') return null;

    const implementer = findImplementer(iface, candidates);
    if (!implementer) return null;
    return findMethod(implementer, interfaceMethod.name, interfaceMethod.parameterTypes);
}
