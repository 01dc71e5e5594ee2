/**
 * Interception — Call Records
 *
 * What the call boundary hands to a sink. Formatting and I/O belong to
 * the sink; the interceptor only measures and captures.
 *
 * @module
 */
import { type InterceptionDecision } from '../domain/InterceptionDecision.js';
import { type LogLevel } from '../domain/LogLevel.js';

/** How the call ended. */
export type InvocationOutcome = 'success' | 'failure';

/** One intercepted call. */
export interface InvocationRecord {
    /** Fully-qualified name of the registered service type. */
    readonly service: string;
    /** Method name as called. */
    readonly method: string;
    /** Identity key of the resolved method (overload-safe). */
    readonly key: string;
    readonly decision: InterceptionDecision;
    readonly outcome: InvocationOutcome;
    /** `decision.level` on success, `decision.exceptionLevel` on failure. */
    readonly level: LogLevel;
    /** Named sink, or `null` for the default one. */
    readonly target: string | null;
    /** Arguments, when the decision captures input. */
    readonly input?: readonly unknown[];
    /** Return value (awaited for promises), when the decision captures output. */
    readonly output?: unknown;
    /** Thrown or rejected value, on failure. */
    readonly error?: unknown;
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Receives every intercepted call. Called synchronously, after the call
 * settles. Errors thrown here propagate to the caller.
 */
export type InvocationSink = (record: InvocationRecord) => void;
