/**
 * Domain — Barrel Export
 *
 * Value types shared by every layer: severities, decisions, markers,
 * method identities and service metadata.
 */
export { LogLevel, LOG_LEVEL_NAMES, logLevelName, moreVerbose, isLogLevel } from './LogLevel.js';
export type { LogLevelName } from './LogLevel.js';
export {
    DEFAULT_DECISION, INTERCEPTION_BEHAVIORS,
    createDecision, withBehavior, withLevel, withExceptionLevel, withTarget,
    decisionsEqual, capturesInput, capturesOutput,
} from './InterceptionDecision.js';
export type { InterceptionBehavior, InterceptionDecision, DecisionInit } from './InterceptionDecision.js';
export { noLog, logInput, logOutput, logBoth, isEnableMarker } from './InterceptionMarker.js';
export type {
    InterceptionMarker, DisabledMarker, EnableMarker, MarkerKind, MarkerOptions,
} from './InterceptionMarker.js';
export { createIdentity, identityKey, sameSignature, identitiesEqual } from './MethodIdentity.js';
export type { MethodIdentity } from './MethodIdentity.js';
export { OBJECT_TYPE, isConcrete, baseChain } from './ServiceType.js';
export type { ServiceType, MethodDescriptor, MemberKind, Visibility } from './ServiceType.js';
