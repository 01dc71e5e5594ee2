/**
 * Config — Barrel Export
 *
 * Schema, parser and fluent builder for the interception policy.
 */
export {
    InterceptionPolicyConfigSchema, ServicePolicySchema, ServicePatternSchema,
    MethodPatternSchema, LevelInputSchema,
} from './PolicyConfigSchema.js';
export type { InterceptionPolicyConfig, ServicePolicyInput, LevelInput } from './PolicyConfigSchema.js';
export { parsePolicyConfig, behaviorFromFlags, detectShadowedRules } from './parsePolicyConfig.js';
export type { ResolvedPolicyConfig, ShadowedRuleWarning } from './parsePolicyConfig.js';
export { PolicyBuilder, ServicePolicyBuilder } from './PolicyBuilder.js';
export { PolicyConfigError } from './PolicyConfigError.js';
