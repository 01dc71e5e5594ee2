/**
 * ServiceRegistrationError — Invalid Use of `registerType`
 *
 * Raised when something that is not a concrete class (an interface, an
 * abstract class) is registered for interception. Registration happens
 * at startup; this error is meant to abort it, not to be retried.
 *
 * @module
 */
export class ServiceRegistrationError extends Error {
    /** Name of the type that was rejected. */
    readonly typeName: string;

    constructor(typeName: string, reason: string) {
        super(`[${typeName}] Cannot register for interception: ${reason}`);
        this.name = 'ServiceRegistrationError';
        this.typeName = typeName;
    }
}
