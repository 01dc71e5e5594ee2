/**
 * Resolution — Barrel Export
 *
 * Marker inspection, rule matching, method identity and the decision
 * resolver and cache built on them.
 */
export {
    inspectMarkers, isDisabled, isTypeDisabled, decisionFromMarkers, resolveMarkerDecision,
} from './MarkerInspector.js';
export type { MarkerInspection } from './MarkerInspector.js';
export { matchesMethodPattern, isExcludedByPatterns } from './MethodPatternMatcher.js';
export { PatternRuleTable, isWildcardPattern } from './PatternRuleTable.js';
export type { PatternRule } from './PatternRuleTable.js';
export {
    identityOf, isEligible, collectMethods, eligibleMethods, findMethod,
    allInterfaces, isAssignableTo, findImplementer, resolveImplementation,
} from './MethodIdentityResolver.js';
export { DecisionResolver } from './DecisionResolver.js';
export type { DecisionResolverOptions, DecisionExplanation } from './DecisionResolver.js';
export { DecisionCache } from './DecisionCache.js';
export type { DecisionCacheOptions, TypeEntry } from './DecisionCache.js';
export { ServiceRegistrationError } from './ServiceRegistrationError.js';
