/**
 * LogLevel — Severity Scale for Intercepted Calls
 *
 * Ranked so that a LOWER number means MORE detail:
 * `Trace < Debug < Information < Warning < Error < Critical < None`.
 *
 * The marker combination rule picks the numerically lower level of two
 * co-occurring markers as the "more verbose" one, so this direction must
 * never be inverted.
 *
 * @module
 */

/** Severity ranks, ordered from most to least verbose. */
export const LogLevel = {
    Trace: 0,
    Debug: 1,
    Information: 2,
    Warning: 3,
    Error: 4,
    Critical: 5,
    None: 6,
} as const;

/** A severity rank (`0`–`6`). */
export type LogLevel = typeof LogLevel[keyof typeof LogLevel];

/** A severity name as written in configuration (`'Information'`, `'Warning'`, ...). */
export type LogLevelName = keyof typeof LogLevel;

/** All level names, in rank order. */
export const LOG_LEVEL_NAMES: readonly LogLevelName[] = Object.freeze([
    'Trace', 'Debug', 'Information', 'Warning', 'Error', 'Critical', 'None',
]);

/** Name for a rank, e.g. `logLevelName(LogLevel.Warning) === 'Warning'`. */
export function logLevelName(level: LogLevel): LogLevelName {
    return LOG_LEVEL_NAMES[level] ?? 'None';
}

/** The more verbose (numerically lower) of two levels. */
export function moreVerbose(a: LogLevel, b: LogLevel): LogLevel {
    return a <= b ? a : b;
}

/** Type guard for a valid rank. */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'number'
        && Number.isInteger(value)
        && value >= LogLevel.Trace
        && value <= LogLevel.None;
}
