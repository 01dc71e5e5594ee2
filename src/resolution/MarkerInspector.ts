/**
 * MarkerInspector — Marker-Derived Candidate Decisions
 *
 * Pure functions over a method's static metadata. Precedence:
 *
 * 1. method-level disable
 * 2. type-level disable
 * 3. method-level enable markers
 * 4. type-level enable markers
 * 5. nothing found: the caller falls through to configuration
 *
 * Co-occurring `input` + `output` markers at one level combine into
 * `both`: the more verbose (numerically lower) level, the first
 * non-null target, and the first explicit failure level (input's
 * before output's), else `Error`. A `both` marker at that level wins
 * outright.
 *
 * @module
 */
import { type InterceptionDecision, createDecision } from '../domain/InterceptionDecision.js';
import { type EnableMarker, type InterceptionMarker } from '../domain/InterceptionMarker.js';
import { LogLevel, moreVerbose } from '../domain/LogLevel.js';
import { type MethodDescriptor, type ServiceType } from '../domain/ServiceType.js';

// ── Types ────────────────────────────────────────────────

/** Result of inspecting one method's markers. */
export type MarkerInspection =
    | { readonly disabled: true }
    | { readonly disabled: false; readonly decision: InterceptionDecision | null };

const DISABLED: MarkerInspection = Object.freeze({ disabled: true });
const NO_MARKER: MarkerInspection = Object.freeze({ disabled: false, decision: null });

// ── Disable ──────────────────────────────────────────────

function hasDisable(markers: readonly InterceptionMarker[]): boolean {
    return markers.some(m => m.kind === 'disabled');
}

/** A disable marker on the type itself, independent of its methods. */
export function isTypeDisabled(type: ServiceType): boolean {
    return hasDisable(type.markers);
}

/** Method-level disable, else type-level disable. */
export function isDisabled(method: MethodDescriptor): boolean {
    return hasDisable(method.markers) || isTypeDisabled(method.declaringType);
}

// ── Enable ───────────────────────────────────────────────

function findMarker(markers: readonly InterceptionMarker[], kind: EnableMarker['kind']): EnableMarker | undefined {
    for (const marker of markers) {
        if (marker.kind === kind) return marker;
    }
    return undefined;
}

/**
 * Fold the enable markers found at ONE level into a decision.
 * Returns `null` when that level carries no enable marker.
 */
export function decisionFromMarkers(markers: readonly InterceptionMarker[]): InterceptionDecision | null {
    const both = findMarker(markers, 'both');
    if (both) return fromMarker('both', both);

    const input = findMarker(markers, 'input');
    const output = findMarker(markers, 'output');

    if (input && output) {
        return createDecision({
            behavior: 'both',
            level: moreVerbose(input.level ?? LogLevel.Information, output.level ?? LogLevel.Information),
            exceptionLevel: input.exceptionLevel ?? output.exceptionLevel ?? LogLevel.Error,
            target: input.target ?? output.target ?? null,
        });
    }

    if (input) return fromMarker('input', input);
    if (output) return fromMarker('output', output);
    return null;
}

function fromMarker(behavior: EnableMarker['kind'], marker: EnableMarker): InterceptionDecision {
    return createDecision({
        behavior,
        level: marker.level ?? LogLevel.Information,
        exceptionLevel: marker.exceptionLevel ?? LogLevel.Error,
        target: marker.target ?? null,
    });
}

/** Method-level enable decision, else type-level, else `null`. */
export function resolveMarkerDecision(method: MethodDescriptor): InterceptionDecision | null {
    return decisionFromMarkers(method.markers) ?? decisionFromMarkers(method.declaringType.markers);
}

/** Full marker inspection in precedence order. */
export function inspectMarkers(method: MethodDescriptor): MarkerInspection {
    if (isDisabled(method)) return DISABLED;
    const decision = resolveMarkerDecision(method);
    return decision ? { disabled: false, decision } : NO_MARKER;
}
