/**
 * ServiceMetadataSchema — Shape Validation for Service Descriptions
 *
 * Zod schemas for the plain-data part of a service description (names,
 * parameter lists, markers, member flags). Type relationships (base
 * class, implemented interfaces) are object references and are checked
 * by the builder itself.
 *
 * @module
 */
import { z } from 'zod';
import { LogLevel, isLogLevel } from '../domain/LogLevel.js';

// ── Names ────────────────────────────────────────────────

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Dot-separated identifiers: `Billing.Service`, `Shop.Orders.OrderService`. */
const QUALIFIED_NAME = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

export const TypeNameSchema = z.string()
    .min(1, 'must be a non-empty string')
    .regex(QUALIFIED_NAME, 'must be dot-separated identifiers (e.g. "Billing.Service")');

export const MemberNameSchema = z.string()
    .min(1, 'must be a non-empty string')
    .regex(IDENTIFIER, 'must be a single identifier');

export const ParameterTypeSchema = z.string()
    .min(1, 'parameter type must be a non-empty string')
    .refine(value => value.trim() === value, 'parameter type must not have leading or trailing whitespace');

// ── Markers ──────────────────────────────────────────────

export const LogLevelSchema = z.custom<LogLevel>(
    isLogLevel,
    `must be a level rank between ${LogLevel.Trace} and ${LogLevel.None}`,
);

export const MarkerSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('disabled') }).strict(),
    z.object({
        kind: z.enum(['input', 'output', 'both']),
        level: LogLevelSchema.optional(),
        exceptionLevel: LogLevelSchema.optional(),
        target: z.string().min(1, 'target must be a non-empty string').optional(),
    }).strict(),
]);

/** At most one marker of each kind on a single method or type. */
export const MarkerListSchema = z.array(MarkerSchema).superRefine((markers, ctx) => {
    const seen = new Set<string>();
    markers.forEach((marker, index) => {
        if (seen.has(marker.kind)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index],
                message: `duplicate "${marker.kind}" marker`,
            });
        }
        seen.add(marker.kind);
    });
});

// ── Members ──────────────────────────────────────────────

export const MemberSchema = z.object({
    name: MemberNameSchema,
    parameterTypes: z.array(ParameterTypeSchema),
    kind: z.enum(['method', 'constructor', 'getter', 'setter', 'event-add', 'event-remove']),
    visibility: z.enum(['public', 'protected', 'private']),
    isStatic: z.boolean(),
    markers: MarkerListSchema,
});

export const ServiceDraftSchema = z.object({
    name: TypeNameSchema,
    kind: z.enum(['class', 'interface']),
    abstract: z.boolean(),
    markers: MarkerListSchema,
    members: z.array(MemberSchema),
    managesOwnLogging: z.boolean(),
});
