/**
 * ServiceMetadataError — Invalid Service Description
 *
 * Thrown by the metadata builders when a service description cannot be
 * turned into a valid {@link ServiceType}: malformed names, duplicate
 * members, conflicting markers, or impossible type relationships.
 *
 * This is a composition bug, raised at load time. It is never caught
 * by the engine.
 *
 * @example
 * ```typescript
 * try {
 *     defineService('Shop..Orders').build();
 * } catch (e) {
 *     if (e instanceof ServiceMetadataError) {
 *         console.log(e.typeName); // "Shop..Orders"
 *         console.log(e.issues);   // [{ path: 'name', message: '...' }]
 *     }
 * }
 * ```
 *
 * @module
 */
import { type ValidationIssue, formatIssues } from '../utils.js';

export class ServiceMetadataError extends Error {
    /** Name of the type being described. */
    readonly typeName: string;
    readonly issues: readonly ValidationIssue[];

    constructor(typeName: string, issues: readonly ValidationIssue[], cause?: unknown) {
        super(
            `[${typeName}] Invalid service metadata:\n${formatIssues(issues)}`,
            cause === undefined ? undefined : { cause },
        );
        this.name = 'ServiceMetadataError';
        this.typeName = typeName;
        this.issues = Object.freeze([...issues]);
    }
}
