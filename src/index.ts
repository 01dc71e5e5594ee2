/**
 * @module
 * @description
 * Value types shared by every layer: severities, decisions, markers,
 * method identities and service metadata.
 */
// ── Domain ───────────────────────────────────────────────
/** @category Domain */
export {
    LogLevel, LOG_LEVEL_NAMES, logLevelName, moreVerbose, isLogLevel,
    DEFAULT_DECISION, INTERCEPTION_BEHAVIORS,
    createDecision, withBehavior, withLevel, withExceptionLevel, withTarget,
    decisionsEqual, capturesInput, capturesOutput,
    noLog, logInput, logOutput, logBoth, isEnableMarker,
    createIdentity, identityKey, sameSignature, identitiesEqual,
    OBJECT_TYPE, isConcrete, baseChain,
} from './domain/index.js';
/** @category Domain */
export type {
    LogLevelName,
    InterceptionBehavior, InterceptionDecision, DecisionInit,
    InterceptionMarker, DisabledMarker, EnableMarker, MarkerKind, MarkerOptions,
    MethodIdentity,
    ServiceType, MethodDescriptor, MemberKind, Visibility,
} from './domain/index.js';

/**
 * @module
 * @description
 * Fluent builders for the load-time service side-table.
 */
// ── Metadata ─────────────────────────────────────────────
/** @category Metadata */
export {
    defineService, defineInterface, ServiceBuilder, MethodBuilder,
    ServiceMetadataError,
} from './metadata/index.js';

/**
 * @module
 * @description
 * Fixed-precedence decision resolution and the write-once decision cache.
 */
// ── Resolution ───────────────────────────────────────────
/** @category Resolution */
export {
    inspectMarkers, isDisabled, isTypeDisabled, decisionFromMarkers, resolveMarkerDecision,
    matchesMethodPattern, isExcludedByPatterns,
    PatternRuleTable, isWildcardPattern,
    identityOf, isEligible, collectMethods, eligibleMethods, findMethod,
    allInterfaces, isAssignableTo, findImplementer, resolveImplementation,
    DecisionResolver, DecisionCache, ServiceRegistrationError,
} from './resolution/index.js';
/** @category Resolution */
export type {
    MarkerInspection, PatternRule,
    DecisionResolverOptions, DecisionExplanation,
    DecisionCacheOptions, TypeEntry,
} from './resolution/index.js';

/**
 * @module
 * @description
 * Policy configuration: schema, parser and fluent builder.
 */
// ── Config ───────────────────────────────────────────────
/** @category Config */
export {
    InterceptionPolicyConfigSchema, ServicePolicySchema, ServicePatternSchema,
    MethodPatternSchema, LevelInputSchema,
    parsePolicyConfig, behaviorFromFlags, detectShadowedRules,
    PolicyBuilder, ServicePolicyBuilder, PolicyConfigError,
} from './config/index.js';
/** @category Config */
export type {
    InterceptionPolicyConfig, ServicePolicyInput, LevelInput,
    ResolvedPolicyConfig, ShadowedRuleWarning,
} from './config/index.js';

// ── Interception ─────────────────────────────────────────
/** @category Interception */
export { interceptInstance, buildOverloadTable, selectOverload } from './interception/index.js';
/** @category Interception */
export type {
    OverloadTable, InterceptOptions, InvocationRecord, InvocationSink, InvocationOutcome,
} from './interception/index.js';

// ── Engine ───────────────────────────────────────────────
/** @category Engine */
export { createInterceptionEngine } from './engine/index.js';
/** @category Engine */
export type { InterceptionEngine, InterceptionEngineOptions } from './engine/index.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export { createDebugObserver, SpanStatusCode } from './observability/index.js';
/** @category Observability */
export type {
    DebugEvent, DebugObserverFn, DecisionSource,
    RegisterEvent, ResolveEvent, RedirectEvent, FallbackEvent, ErrorEvent,
    CallsightSpan, CallsightTracer, CallsightAttributeValue,
} from './observability/index.js';

// ── Validation ───────────────────────────────────────────
/** @category Validation */
export type { ValidationIssue } from './utils.js';
