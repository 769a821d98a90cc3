/**
 * Engine error kinds
 */

export class NoMatchingRateError extends Error {
    readonly intervalStart: Date;
    readonly intervalEnd: Date;

    constructor(intervalStart: Date, intervalEnd: Date) {
        super(`no matching rate found for interval ${intervalStart.toISOString()} to ${intervalEnd.toISOString()}`);
        this.name = 'NoMatchingRateError';
        this.intervalStart = intervalStart;
        this.intervalEnd = intervalEnd;
    }
}

export class NoTariffForRegionError extends Error {
    readonly productCode: string;
    readonly region: string | null;

    constructor(productCode: string, region: string | null) {
        super(`skipping product ${productCode} as it has no tariffs for region ${region ?? '(none)'}`);
        this.name = 'NoTariffForRegionError';
        this.productCode = productCode;
        this.region = region;
    }
}

export class TooManyMissingRatesError extends Error {
    readonly count: number;
    readonly threshold: number;

    constructor(count: number, threshold: number) {
        super(`too many missing rates (${count}, threshold ${threshold})`);
        this.name = 'TooManyMissingRatesError';
        this.count = count;
        this.threshold = threshold;
    }
}

export class TimestampBeforeReferenceError extends Error {
    readonly timestamp: Date;
    readonly reference: Date;

    constructor(timestamp: Date, reference: Date) {
        super(`timestamp ${timestamp.toISOString()} is before reference start ${reference.toISOString()}`);
        this.name = 'TimestampBeforeReferenceError';
        this.timestamp = timestamp;
        this.reference = reference;
    }
}

export class InvalidDurationError extends Error {
    readonly input: string;

    constructor(input: string) {
        super(`invalid duration: ${input}`);
        this.name = 'InvalidDurationError';
        this.input = input;
    }
}
