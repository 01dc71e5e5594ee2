/**
 * PolicyConfigError — Rejected Interception Policy
 *
 * Thrown by {@link parsePolicyConfig} (and so by `PolicyBuilder.build()`
 * and `createInterceptionEngine()`) when the configuration does not
 * validate. Every issue is listed with its path; the zod error is kept
 * as `cause`.
 *
 * @example
 * ```typescript
 * try {
 *     parsePolicyConfig({ services: { 'Shop.*.Orders': {} } });
 * } catch (e) {
 *     if (e instanceof PolicyConfigError) {
 *         console.log(e.issues);
 *         // [{ path: 'services.Shop.*.Orders', message: 'pattern may only use "*" as its final character' }]
 *     }
 * }
 * ```
 *
 * @module
 */
import { type ValidationIssue, formatIssues } from '../utils.js';

export class PolicyConfigError extends Error {
    readonly issues: readonly ValidationIssue[];

    constructor(issues: readonly ValidationIssue[], cause?: unknown) {
        super(
            `Invalid interception policy:\n${formatIssues(issues)}`,
            cause === undefined ? undefined : { cause },
        );
        this.name = 'PolicyConfigError';
        this.issues = Object.freeze([...issues]);
    }
}
