/**
 * InterceptionMarker — Declarative Intent on a Method or Type
 *
 * Markers are structural facts about a service, authored next to its
 * implementation and attached through the metadata builders. They never
 * change at runtime.
 *
 * @example
 * ```typescript
 * defineService('Shop.OrderService')
 *     .mark(logInput({ level: LogLevel.Information }))
 *     .method('cancel', ['string'], m => m.mark(logBoth({ level: LogLevel.Warning })))
 *     .method('ping', [], m => m.mark(noLog()))
 *     .build();
 * ```
 *
 * @module
 */
import { type LogLevel } from './LogLevel.js';

/** Explicit opt-out. Outranks every enable marker at the same or lower level. */
export interface DisabledMarker {
    readonly kind: 'disabled';
}

/** Enable markers share the same optional overrides. */
export interface EnableMarker {
    readonly kind: 'input' | 'output' | 'both';
    /** Severity for normal completion (default: Information). */
    readonly level?: LogLevel;
    /** Severity on failure (default: Error). */
    readonly exceptionLevel?: LogLevel;
    /** Named sink (default: the default sink). */
    readonly target?: string;
}

export type InterceptionMarker = DisabledMarker | EnableMarker;

export type MarkerKind = InterceptionMarker['kind'];

/** Overrides accepted by the enable-marker factories. */
export interface MarkerOptions {
    readonly level?: LogLevel;
    readonly exceptionLevel?: LogLevel;
    readonly target?: string;
}

// ── Factories ────────────────────────────────────────────

export function noLog(): DisabledMarker {
    return Object.freeze({ kind: 'disabled' });
}

export function logInput(options: MarkerOptions = {}): EnableMarker {
    return enableMarker('input', options);
}

export function logOutput(options: MarkerOptions = {}): EnableMarker {
    return enableMarker('output', options);
}

export function logBoth(options: MarkerOptions = {}): EnableMarker {
    return enableMarker('both', options);
}

function enableMarker(kind: EnableMarker['kind'], options: MarkerOptions): EnableMarker {
    const marker: { kind: EnableMarker['kind']; level?: LogLevel; exceptionLevel?: LogLevel; target?: string } = { kind };
    if (options.level !== undefined) marker.level = options.level;
    if (options.exceptionLevel !== undefined) marker.exceptionLevel = options.exceptionLevel;
    if (options.target !== undefined) marker.target = options.target;
    return Object.freeze(marker);
}

/** Narrow to an enable marker. */
export function isEnableMarker(marker: InterceptionMarker): marker is EnableMarker {
    return marker.kind !== 'disabled';
}
