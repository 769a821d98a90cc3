import { describe, it, expect } from 'vitest';
import {
    bucketIndex,
    dayIndex,
    elapsedSeconds,
    parseDuration,
    SECONDS_PER_DAY,
} from '../../src/engine/bucket.engine.js';
import { InvalidDurationError, TimestampBeforeReferenceError } from '../../src/engine/errors.js';
import { REFERENCE_START } from '../fixtures.js';

function after(seconds: number): Date {
    return new Date(REFERENCE_START.getTime() + seconds * 1000);
}

describe('elapsedSeconds', () => {
    it('truncates to whole seconds', () => {
        expect(elapsedSeconds(new Date(REFERENCE_START.getTime() + 1900), REFERENCE_START)).toBe(1);
    });

    it('fails fast for a timestamp before the reference', () => {
        expect(() => elapsedSeconds(after(-1), REFERENCE_START)).toThrow(TimestampBeforeReferenceError);
    });
});

describe('dayIndex', () => {
    it('changes exactly at the day boundary', () => {
        expect(dayIndex(after(0), REFERENCE_START)).toBe(0);
        expect(dayIndex(after(SECONDS_PER_DAY - 1), REFERENCE_START)).toBe(0);
        expect(dayIndex(after(SECONDS_PER_DAY), REFERENCE_START)).toBe(1);
        expect(dayIndex(after(10 * SECONDS_PER_DAY + 1800), REFERENCE_START)).toBe(10);
    });
});

describe('bucketIndex', () => {
    it('floors elapsed seconds by the bucket length', () => {
        const week = 7 * SECONDS_PER_DAY;
        expect(bucketIndex(after(week - 1), REFERENCE_START, week)).toBe(0);
        expect(bucketIndex(after(week), REFERENCE_START, week)).toBe(1);
        expect(bucketIndex(after(3 * week + 5), REFERENCE_START, week)).toBe(3);
    });

    it('is non-decreasing as time moves forward', () => {
        let previous = 0;
        for (let seconds = 0; seconds < 5 * SECONDS_PER_DAY; seconds += 1337) {
            const index = bucketIndex(after(seconds), REFERENCE_START, 3600);
            expect(index).toBeGreaterThanOrEqual(previous);
            previous = index;
        }
        expect(previous).toBe(119);
    });

    it('rejects a non-positive bucket length', () => {
        expect(() => bucketIndex(after(10), REFERENCE_START, 0)).toThrow(InvalidDurationError);
        expect(() => bucketIndex(after(10), REFERENCE_START, -60)).toThrow(InvalidDurationError);
    });

    it('rejects timestamps before the reference', () => {
        expect(() => bucketIndex(after(-1800), REFERENCE_START, 3600)).toThrow(TimestampBeforeReferenceError);
    });
});

describe('parseDuration', () => {
    it('accepts dotted and spaced forms', () => {
        expect(parseDuration('2.weeks')).toBe(1209600);
        expect(parseDuration('1.week')).toBe(604800);
        expect(parseDuration('1 week')).toBe(604800);
        expect(parseDuration('3.days')).toBe(259200);
        expect(parseDuration('12.hours')).toBe(43200);
        expect(parseDuration('30.minutes')).toBe(1800);
        expect(parseDuration('90.seconds')).toBe(90);
    });

    it('rejects anything else', () => {
        expect(() => parseDuration('fortnight')).toThrow(InvalidDurationError);
        expect(() => parseDuration('0.days')).toThrow(InvalidDurationError);
        expect(() => parseDuration('1.month')).toThrow(InvalidDurationError);
    });
});
