/**
 * PolicyConfigSchema — Declarative Interception Policy
 *
 * Zod schemas for the configuration boundary. Everything that reaches
 * the engine has passed through here: patterns are well-formed, levels
 * are ranks, unknown keys are rejected.
 *
 * ```yaml
 * autoIntercept: false
 * services:
 *   Billing.Service: { logInput: true }
 *   Shop.*:          { logOutput: true, level: Debug, excludeMethodPatterns: [get*] }
 * ```
 *
 * @module
 */
import { z } from 'zod';
import { LogLevel } from '../domain/LogLevel.js';
import { LogLevelSchema } from '../metadata/ServiceMetadataSchema.js';

// ── Levels ───────────────────────────────────────────────

/** A level by name (`'Information'`) or by rank (`2`). Output is the rank. */
export const LevelInputSchema = z.union([
    z.enum(['Trace', 'Debug', 'Information', 'Warning', 'Error', 'Critical', 'None']),
    LogLevelSchema,
]).transform(level => typeof level === 'string' ? LogLevel[level] : level);

// ── Patterns ─────────────────────────────────────────────

const WHITESPACE = /\s/;

/** Exact type name, or a prefix ending in a single trailing `*`. */
export const ServicePatternSchema = z.string()
    .min(1, 'pattern must be a non-empty string')
    .refine(pattern => !WHITESPACE.test(pattern), 'pattern must not contain whitespace')
    .refine(
        pattern => !pattern.slice(0, -1).includes('*'),
        'pattern may only use "*" as its final character',
    );

/** Method-name pattern: `name`, `prefix*`, `*suffix` or `*contains*`. */
export const MethodPatternSchema = z.string()
    .min(1, 'method pattern must be a non-empty string')
    .refine(pattern => !WHITESPACE.test(pattern), 'method pattern must not contain whitespace')
    .refine(
        pattern => !pattern.replace(/^\*/, '').replace(/\*$/, '').includes('*'),
        'method pattern may only use "*" at its start or end',
    );

// ── Policy ───────────────────────────────────────────────

export const ServicePolicySchema = z.object({
    logInput: z.boolean().optional(),
    logOutput: z.boolean().optional(),
    level: LevelInputSchema.optional(),
    exceptionLevel: LevelInputSchema.optional(),
    target: z.string().min(1, 'target must be a non-empty string').optional(),
    excludeMethodPatterns: z.array(MethodPatternSchema).optional(),
}).strict();

export const InterceptionPolicyConfigSchema = z.object({
    autoIntercept: z.boolean().default(true),
    services: z.record(ServicePatternSchema, ServicePolicySchema).default({}),
}).strict();

/** Raw configuration, as written by hand or loaded from a file. */
export type InterceptionPolicyConfig = z.input<typeof InterceptionPolicyConfigSchema>;

/** One service entry before validation. */
export type ServicePolicyInput = z.input<typeof ServicePolicySchema>;

/** A level as accepted in configuration. */
export type LevelInput = z.input<typeof LevelInputSchema>;
