import type { RateSchedule } from '../contracts/tariff.contract.js';
import { logger } from '../utils/logger.js';
import { NoMatchingRateError } from './errors.js';

/**
 * Stand-in for an open-ended validity window
 */
export const END_TIME = new Date('2116-02-19T00:00:00Z');

const EPOCH = new Date(0);

/**
 * Start of a validity window; missing or unparsable means the epoch
 */
export function parseValidFrom(value: string | null | undefined): Date {
    if (!value) return EPOCH;
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? EPOCH : new Date(parsed);
}

/**
 * End of a validity window; missing or unparsable means END_TIME
 */
export function parseValidTo(value: string | null | undefined): Date {
    if (value === null || value === undefined) return END_TIME;
    const parsed = Date.parse(value);
    if (Number.isNaN(parsed)) {
        logger.warn({ value }, 'unparsable end time, treating as open-ended');
        return END_TIME;
    }
    return new Date(parsed);
}

function between(t: Date, from: Date, to: Date): boolean {
    return t.getTime() >= from.getTime() && t.getTime() <= to.getTime();
}

/**
 * Find the rate applicable to a whole interval.
 *
 * The first window containing both ends wins. A window containing only the
 * start is logged and skipped, the charge is never split across windows.
 */
export function findRate(schedule: RateSchedule, intervalStart: Date, intervalEnd: Date): number {
    for (const window of schedule) {
        const validFrom = parseValidFrom(window.validFrom);
        const validTo = parseValidTo(window.validTo);

        if (!between(intervalStart, validFrom, validTo)) continue;

        if (between(intervalEnd, validFrom, validTo)) {
            return window.valueIncVat;
        }

        logger.warn(
            {
                intervalStart: intervalStart.toISOString(),
                intervalEnd: intervalEnd.toISOString(),
                validTo: validTo.toISOString(),
            },
            'finish time of consumption slot is after the end of the rate window'
        );
    }

    throw new NoMatchingRateError(intervalStart, intervalEnd);
}
