/**
 * MethodIdentity — Overload-Safe Cache Key
 *
 * Owning type name + method name + ordered parameter type names.
 * Two methods share an identity iff all three match, so overloads that
 * differ only in their parameter lists never collide.
 *
 * The `key` string is rendered once, when the method descriptor is
 * built, and is what the cache indexes by.
 *
 * @module
 */

export interface MethodIdentity {
    readonly typeName: string;
    readonly methodName: string;
    readonly parameterTypes: readonly string[];
    /** Rendered key, e.g. `'Shop.OrderService.cancel["string","number"]'`. */
    readonly key: string;
}

/**
 * Render the canonical key for the three identity components.
 *
 * The parameter list is JSON-encoded so that type names containing
 * commas (`'Map<string, number>'`) cannot run into a neighbour.
 * Method names are identifiers, so the type/method boundary is the
 * last `.` before the list.
 */
export function identityKey(
    typeName: string,
    methodName: string,
    parameterTypes: readonly string[],
): string {
    return `${typeName}.${methodName}${JSON.stringify(parameterTypes)}`;
}

/** Create a frozen identity. */
export function createIdentity(
    typeName: string,
    methodName: string,
    parameterTypes: readonly string[],
): MethodIdentity {
    return Object.freeze({
        typeName,
        methodName,
        parameterTypes: Object.freeze([...parameterTypes]),
        key: identityKey(typeName, methodName, parameterTypes),
    });
}

/** Same method name and the same parameter list, ignoring the owning type. */
export function sameSignature(
    a: Pick<MethodIdentity, 'methodName' | 'parameterTypes'>,
    b: Pick<MethodIdentity, 'methodName' | 'parameterTypes'>,
): boolean {
    if (a.methodName !== b.methodName) return false;
    if (a.parameterTypes.length !== b.parameterTypes.length) return false;
    for (let i = 0; i < a.parameterTypes.length; i++) {
        if (a.parameterTypes[i] !== b.parameterTypes[i]) return false;
    }
    return true;
}

/** Full equality of two identities. */
export function identitiesEqual(a: MethodIdentity, b: MethodIdentity): boolean {
    return a.typeName === b.typeName && sameSignature(a, b);
}
