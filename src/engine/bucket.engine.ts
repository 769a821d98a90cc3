import { InvalidDurationError, TimestampBeforeReferenceError } from './errors.js';

export const SECONDS_PER_DAY = 86400;

const UNIT_SECONDS: Record<string, number> = {
    second: 1,
    minute: 60,
    hour: 3600,
    day: SECONDS_PER_DAY,
    week: 7 * SECONDS_PER_DAY,
};

/**
 * Whole seconds from `reference` to `timestamp`, truncated
 */
export function elapsedSeconds(timestamp: Date, reference: Date): number {
    const elapsed = Math.trunc((timestamp.getTime() - reference.getTime()) / 1000);
    if (elapsed < 0) {
        throw new TimestampBeforeReferenceError(timestamp, reference);
    }
    return elapsed;
}

/**
 * Index of the bucket containing `timestamp`, counting from `reference`
 */
export function bucketIndex(timestamp: Date, reference: Date, bucketSeconds: number): number {
    if (!Number.isInteger(bucketSeconds) || bucketSeconds <= 0) {
        throw new InvalidDurationError(String(bucketSeconds));
    }
    return Math.floor(elapsedSeconds(timestamp, reference) / bucketSeconds);
}

export function dayIndex(timestamp: Date, reference: Date): number {
    return bucketIndex(timestamp, reference, SECONDS_PER_DAY);
}

/**
 * Parse a bucket length such as "2.weeks", "1 week" or "30.minutes" into seconds
 */
export function parseDuration(text: string): number {
    const match = /^\s*(\d+)\s*[.\s]\s*(second|minute|hour|day|week)s?\s*$/i.exec(text);
    if (!match) {
        throw new InvalidDurationError(text);
    }

    const count = parseInt(match[1], 10);
    const unit = UNIT_SECONDS[match[2].toLowerCase()];
    if (count <= 0 || unit === undefined) {
        throw new InvalidDurationError(text);
    }

    return count * unit;
}
