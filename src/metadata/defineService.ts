/**
 * defineService / defineInterface — Fluent Service Metadata Builders
 *
 * Produce the frozen {@link ServiceType} side-table the engine reads.
 * Everything is validated once, in `.build()`: shape checks go through
 * zod ({@link ServiceDraftSchema}), relationship checks run here. Any
 * problem raises a {@link ServiceMetadataError} listing every issue.
 *
 * @example
 * ```typescript
 * const IOrderService = defineInterface('Shop.IOrderService')
 *     .method('cancel', ['string'])
 *     .method('create', ['Order'])
 *     .build();
 *
 * const OrderService = defineService('Shop.OrderService')
 *     .implements(IOrderService)
 *     .mark(logInput())
 *     .method('cancel', ['string'], m => m.mark(logBoth({ level: LogLevel.Warning })))
 *     .method('create', ['Order'])
 *     .getter('count')
 *     .build();
 * ```
 *
 * @module
 */
import { type InterceptionMarker } from '../domain/InterceptionMarker.js';
import { createIdentity } from '../domain/MethodIdentity.js';
import {
    type MemberKind,
    type MethodDescriptor,
    type ServiceType,
    type Visibility,
    OBJECT_TYPE,
} from '../domain/ServiceType.js';
import { type ValidationIssue, toValidationIssues } from '../utils.js';
import { ServiceDraftSchema } from './ServiceMetadataSchema.js';
import { ServiceMetadataError } from './ServiceMetadataError.js';

// ── MethodBuilder ────────────────────────────────────────

/**
 * Nested builder for a single member. Receives the member's name and
 * parameter list from the enclosing builder; configures the rest.
 */
export class MethodBuilder {
    /** @internal */ _visibility: Visibility = 'public';
    /** @internal */ _isStatic = false;
    /** @internal */ _markers: InterceptionMarker[] = [];

    /** Attach one or more markers to this member. */
    mark(...markers: InterceptionMarker[]): this {
        this._markers.push(...markers);
        return this;
    }

    /** Declare the member static (never intercepted). */
    asStatic(): this {
        this._isStatic = true;
        return this;
    }

    /** Only `'public'` members are intercepted. */
    visibility(visibility: Visibility): this {
        this._visibility = visibility;
        return this;
    }
}

type MethodConfigurator = (m: MethodBuilder) => void;

interface MemberDraft {
    readonly name: string;
    readonly parameterTypes: readonly string[];
    readonly kind: MemberKind;
    readonly visibility: Visibility;
    readonly isStatic: boolean;
    readonly markers: readonly InterceptionMarker[];
}

// ── ServiceBuilder ───────────────────────────────────────

/**
 * Fluent builder for a class or interface description.
 *
 * Created through {@link defineService} or {@link defineInterface}.
 */
export class ServiceBuilder {
    /** @internal */ readonly _name: string;
    /** @internal */ readonly _kind: 'class' | 'interface';
    /** @internal */ _abstract = false;
    /** @internal */ _base: ServiceType | undefined;
    /** @internal */ _implements: ServiceType[] = [];
    /** @internal */ _markers: InterceptionMarker[] = [];
    /** @internal */ _members: MemberDraft[] = [];
    /** @internal */ _managesOwnLogging = false;

    constructor(name: string, kind: 'class' | 'interface') {
        this._name = name;
        this._kind = kind;
    }

    /** Attach type-level markers. */
    mark(...markers: InterceptionMarker[]): this {
        this._markers.push(...markers);
        return this;
    }

    /**
     * Classes: the interfaces this class implements.
     * Interfaces: the interfaces this one extends.
     */
    implements(...interfaces: ServiceType[]): this {
        this._implements.push(...interfaces);
        return this;
    }

    /** Alias of {@link implements} that reads naturally on interfaces. */
    extends(...interfaces: ServiceType[]): this {
        return this.implements(...interfaces);
    }

    /** Set the base class. */
    inherits(base: ServiceType): this {
        this._base = base;
        return this;
    }

    /** Mark the class abstract. Abstract classes cannot be registered. */
    abstract(): this {
        this._abstract = true;
        return this;
    }

    /**
     * Declare that the class logs for itself (it takes the framework
     * logger as a dependency). None of its methods are intercepted.
     */
    managesOwnLogging(): this {
        this._managesOwnLogging = true;
        return this;
    }

    /**
     * Declare a method. Overloads are separate calls with different
     * parameter lists.
     *
     * @param name - Method name (identifier)
     * @param parameterTypes - Ordered parameter type names
     * @param configure - Optional callback to add markers or flags
     */
    method(name: string, parameterTypes: readonly string[] = [], configure?: MethodConfigurator): this {
        return this._member(name, parameterTypes, 'method', configure);
    }

    /** Declare a constructor. */
    ctor(parameterTypes: readonly string[] = []): this {
        return this._member('constructor', parameterTypes, 'constructor');
    }

    /** Declare a property getter. */
    getter(name: string): this {
        return this._member(name, [], 'getter');
    }

    /** Declare a property setter. */
    setter(name: string, valueType: string): this {
        return this._member(name, [valueType], 'setter');
    }

    /** Declare an event: an add and a remove handler member. */
    event(name: string, handlerType: string): this {
        this._member(name, [handlerType], 'event-add');
        return this._member(name, [handlerType], 'event-remove');
    }

    /**
     * Validate and freeze the description.
     *
     * @throws {ServiceMetadataError} If any part of the description is invalid
     */
    build(): ServiceType {
        const draft = {
            name: this._name,
            kind: this._kind,
            abstract: this._abstract,
            markers: this._markers,
            members: this._members,
            managesOwnLogging: this._managesOwnLogging,
        };

        const parsed = ServiceDraftSchema.safeParse(draft);
        const issues: ValidationIssue[] = parsed.success ? [] : toValidationIssues(parsed.error.issues);
        issues.push(...this._relationshipIssues());

        if (issues.length > 0) {
            throw new ServiceMetadataError(this._name, issues, parsed.success ? undefined : parsed.error);
        }

        const methods: MethodDescriptor[] = [];
        const type: ServiceType = Object.freeze({
            name: this._name,
            kind: this._kind,
            abstract: this._abstract,
            implements: Object.freeze([...this._implements]),
            base: this._kind === 'class' ? (this._base ?? OBJECT_TYPE) : undefined,
            markers: Object.freeze([...this._markers]),
            methods,
            managesOwnLogging: this._managesOwnLogging,
        });

        for (const member of this._members) {
            methods.push(Object.freeze({
                name: member.name,
                declaringType: type,
                parameterTypes: Object.freeze([...member.parameterTypes]),
                kind: member.kind,
                visibility: member.visibility,
                isStatic: member.isStatic,
                markers: Object.freeze([...member.markers]),
                identity: createIdentity(this._name, member.name, member.parameterTypes),
            }));
        }
        Object.freeze(methods);

        return type;
    }

    // ── Private ──────────────────────────────────────────

    private _member(
        name: string,
        parameterTypes: readonly string[],
        kind: MemberKind,
        configure?: MethodConfigurator,
    ): this {
        const builder = new MethodBuilder();
        configure?.(builder);
        this._members.push({
            name,
            parameterTypes: [...parameterTypes],
            kind,
            visibility: builder._visibility,
            isStatic: builder._isStatic,
            markers: builder._markers,
        });
        return this;
    }

    private _relationshipIssues(): ValidationIssue[] {
        const issues: ValidationIssue[] = [];

        this._implements.forEach((iface, index) => {
            if (iface.kind !== 'interface') {
                issues.push({ path: `implements.${index}`, message: `"${iface.name}" is not an interface` });
            }
            if (iface.name === this._name) {
                issues.push({ path: `implements.${index}`, message: 'a type cannot implement itself' });
            }
        });

        if (this._base) {
            if (this._kind === 'interface') {
                issues.push({ path: 'base', message: 'interfaces cannot inherit a base class; use extends()' });
            } else if (this._base.kind !== 'class') {
                issues.push({ path: 'base', message: `"${this._base.name}" is not a class` });
            } else if (this._base.name === this._name) {
                issues.push({ path: 'base', message: 'a class cannot inherit from itself' });
            }
        }

        if (this._kind === 'interface') {
            if (this._abstract) {
                issues.push({ path: 'abstract', message: 'interfaces cannot be marked abstract' });
            }
            if (this._managesOwnLogging) {
                issues.push({ path: 'managesOwnLogging', message: 'only classes can manage their own logging' });
            }
        }

        const signatures = new Set<string>();
        this._members.forEach((member, index) => {
            if (this._kind === 'interface' && member.kind === 'constructor') {
                issues.push({ path: `members.${index}`, message: 'interfaces cannot declare constructors' });
            }
            const signature = `${member.kind}:${member.isStatic ? 'static ' : ''}${member.name}${JSON.stringify(member.parameterTypes)}`;
            if (signatures.has(signature)) {
                issues.push({
                    path: `members.${index}`,
                    message: `duplicate ${member.kind} "${member.name}(${member.parameterTypes.join(', ')})"`,
                });
            }
            signatures.add(signature);
        });

        return issues;
    }
}

// ── Factories ────────────────────────────────────────────

/** Start describing a class. */
export function defineService(name: string): ServiceBuilder {
    return new ServiceBuilder(name, 'class');
}

/** Start describing an interface. */
export function defineInterface(name: string): ServiceBuilder {
    return new ServiceBuilder(name, 'interface');
}
