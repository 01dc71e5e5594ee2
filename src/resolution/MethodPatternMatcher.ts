/**
 * MethodPatternMatcher — Method-Name Exclusion Patterns
 *
 * Pure function. Matches a method name against one pattern:
 *
 * - `name`       exact
 * - `prefix*`    starts with
 * - `*suffix`    ends with
 * - `*contains*` contains
 *
 * Ordinal comparison; no other wildcard positions.
 *
 * @example
 * ```typescript
 * matchesMethodPattern('getUser', 'get*');      // true
 * matchesMethodPattern('fetchAsync', '*Async'); // true
 * matchesMethodPattern('refreshToken', '*Tok*'); // true
 * ```
 *
 * @module
 */

export function matchesMethodPattern(methodName: string, pattern: string): boolean {
    if (pattern === methodName) return true;

    const leading = pattern.startsWith('*');
    const trailing = pattern.length > 1 && pattern.endsWith('*');

    if (leading && trailing) return methodName.includes(pattern.slice(1, -1));
    if (leading) return methodName.endsWith(pattern.slice(1));
    if (trailing) return methodName.startsWith(pattern.slice(0, -1));
    return false;
}

/** Whether any pattern matches. */
export function isExcludedByPatterns(methodName: string, patterns: readonly string[]): boolean {
    for (const pattern of patterns) {
        if (matchesMethodPattern(methodName, pattern)) return true;
    }
    return false;
}
