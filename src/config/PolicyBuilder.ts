/**
 * PolicyBuilder — Fluent Interception Policy
 *
 * Builds the same configuration {@link parsePolicyConfig} accepts, one
 * service pattern at a time. `build()` runs the result through the
 * schema, so a builder can never produce a policy the file format
 * would reject.
 *
 * @example
 * ```typescript
 * const policy = new PolicyBuilder()
 *     .autoIntercept(false)
 *     .service('Billing.Service', s => s.logInput())
 *     .service('Shop.*', s => s.logBoth().level('Debug').exclude('get*'))
 *     .build();
 * ```
 *
 * @module
 */
import { type ResolvedPolicyConfig, parsePolicyConfig } from './parsePolicyConfig.js';
import {
    type InterceptionPolicyConfig,
    type LevelInput,
    type ServicePolicyInput,
} from './PolicyConfigSchema.js';

/**
 * Nested builder for a single service pattern.
 */
export class ServicePolicyBuilder {
    private _logInput = false;
    private _logOutput = false;
    private _level?: LevelInput;
    private _exceptionLevel?: LevelInput;
    private _target?: string;
    private _exclude: string[] = [];

    /** Capture arguments. */
    logInput(): this {
        this._logInput = true;
        return this;
    }

    /** Capture the return value. */
    logOutput(): this {
        this._logOutput = true;
        return this;
    }

    /** Capture arguments and return value. */
    logBoth(): this {
        this._logInput = true;
        this._logOutput = true;
        return this;
    }

    /** Severity for normal completion, by name or rank. */
    level(level: LevelInput): this {
        this._level = level;
        return this;
    }

    /** Severity when the call fails. */
    exceptionLevel(level: LevelInput): this {
        this._exceptionLevel = level;
        return this;
    }

    /** Route records to a named sink. */
    target(name: string): this {
        this._target = name;
        return this;
    }

    /** Method-name patterns never intercepted on matching types. */
    exclude(...patterns: string[]): this {
        this._exclude = [...this._exclude, ...patterns];
        return this;
    }

    /** @internal */
    build(): ServicePolicyInput {
        const result: ServicePolicyInput = {};
        if (this._logInput) result.logInput = true;
        if (this._logOutput) result.logOutput = true;
        if (this._level !== undefined) result.level = this._level;
        if (this._exceptionLevel !== undefined) result.exceptionLevel = this._exceptionLevel;
        if (this._target !== undefined) result.target = this._target;
        if (this._exclude.length > 0) result.excludeMethodPatterns = this._exclude;
        return result;
    }
}

/**
 * Fluent builder for a complete interception policy.
 */
export class PolicyBuilder {
    private _autoIntercept = true;
    private _services: Record<string, ServicePolicyInput> = {};

    /**
     * Intercept methods that have no marker and no matching rule.
     * On by default.
     */
    autoIntercept(enabled = true): this {
        this._autoIntercept = enabled;
        return this;
    }

    /**
     * Add a rule for an exact type name or a trailing-wildcard prefix.
     * Wildcards are tried in the order they are added. Adding the same
     * pattern again replaces its rule in place.
     *
     * @example
     * ```typescript
     * .service('Shop.Orders.*', s => s.logOutput().target('orders'))
     * ```
     */
    service(pattern: string, fn: (s: ServicePolicyBuilder) => void): this {
        const builder = new ServicePolicyBuilder();
        fn(builder);
        this._services[pattern] = builder.build();
        return this;
    }

    /** The raw configuration, as {@link parsePolicyConfig} accepts it. */
    toConfig(): InterceptionPolicyConfig {
        return { autoIntercept: this._autoIntercept, services: { ...this._services } };
    }

    /**
     * Validate and resolve.
     *
     * @throws {PolicyConfigError} If any pattern or level is invalid
     */
    build(): ResolvedPolicyConfig {
        return parsePolicyConfig(this.toConfig());
    }
}
