/**
 * LogLevel — Unit Tests
 */
import { describe, it, expect } from 'vitest';
import {
    LogLevel, LOG_LEVEL_NAMES, logLevelName, moreVerbose, isLogLevel,
} from '../../src/domain/LogLevel.js';

describe('LogLevel', () => {
    it('ranks levels from most to least verbose', () => {
        expect(LOG_LEVEL_NAMES.map(name => LogLevel[name])).toEqual([0, 1, 2, 3, 4, 5, 6]);
    });

    it('names a rank', () => {
        expect(logLevelName(LogLevel.Warning)).toBe('Warning');
        expect(logLevelName(LogLevel.Trace)).toBe('Trace');
    });

    describe('moreVerbose', () => {
        it('picks the numerically lower level', () => {
            expect(moreVerbose(LogLevel.Debug, LogLevel.Warning)).toBe(LogLevel.Debug);
            expect(moreVerbose(LogLevel.Error, LogLevel.Trace)).toBe(LogLevel.Trace);
        });

        it('is symmetric for equal levels', () => {
            expect(moreVerbose(LogLevel.Information, LogLevel.Information)).toBe(LogLevel.Information);
        });
    });

    describe('isLogLevel', () => {
        it('accepts integer ranks 0 through 6', () => {
            expect(isLogLevel(0)).toBe(true);
            expect(isLogLevel(6)).toBe(true);
        });

        it('rejects anything else', () => {
            expect(isLogLevel(-1)).toBe(false);
            expect(isLogLevel(7)).toBe(false);
            expect(isLogLevel(2.5)).toBe(false);
            expect(isLogLevel('2')).toBe(false);
            expect(isLogLevel(undefined)).toBe(false);
        });
    });
});
