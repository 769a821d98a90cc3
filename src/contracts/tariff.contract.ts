/**
 * Tariff Data Contract
 *
 * The shapes the charge engine consumes. The API client and the product
 * normalizer MUST produce data matching this contract; the engine MUST only
 * consume data matching it.
 */

/**
 * One metering interval
 */
export interface ConsumptionSlot {
    /** ISO-8601, inclusive */
    intervalStart: string;
    /** ISO-8601 */
    intervalEnd: string;
    /** kWh */
    consumption: number;
}

/**
 * One validity-windowed rate entry
 */
export interface RateWindow {
    /** Missing or unparsable means "since the epoch" */
    validFrom: string | null;
    /** Missing or unparsable means open-ended */
    validTo: string | null;
    /** Pence per kWh for unit rates, pence per day for standing charges */
    valueIncVat: number;
}

/**
 * Rate history for one tariff component, most recent first
 */
export type RateSchedule = readonly RateWindow[];

export type TariffType =
    | 'single_register_electricity'
    | 'dual_register_electricity'
    | 'single_register_gas';

export const TARIFF_TYPES: readonly TariffType[] = [
    'single_register_electricity',
    'dual_register_electricity',
    'single_register_gas',
];

/**
 * Headline unit rates, shaped by register count
 */
export type HeadlineRates =
    | { registers: 'single'; standardUnitRateIncVat: number | null }
    | { registers: 'dual'; dayUnitRateIncVat: number | null; nightUnitRateIncVat: number | null };

/**
 * Identity of one tariff within a product (construction phase one)
 */
export interface TariffSummary {
    tariffCode: string;
    tariffType: TariffType;
    /** e.g. "direct_debit_monthly" */
    paymentModel: string;
    region: string;
    standingChargeIncVat: number | null;
    headline: HeadlineRates;
}

/**
 * Full rate history of a tariff
 */
export type TariffRates =
    | { registers: 'single'; standingCharge: RateSchedule; standard: RateSchedule }
    | { registers: 'dual'; standingCharge: RateSchedule; day: RateSchedule; night: RateSchedule };

/**
 * Charge histories as fetched for one tariff; `secondary` is the night rate of
 * a dual-register tariff
 */
export interface TariffChargeSchedules {
    standingCharge: RateSchedule;
    primary: RateSchedule;
    secondary: RateSchedule | null;
}

/**
 * A tariff enriched with its rate history (construction phase two)
 */
export interface PricedTariff extends TariffSummary {
    rates: TariffRates;
}

/**
 * A priceable plan
 */
export interface Product<T extends TariffSummary = TariffSummary> {
    productCode: string;
    displayName: string;
    fullName: string;
    description: string;
    brand: string | null;
    direction: string | null;
    isVariable: boolean;
    isGreen: boolean;
    isTracker: boolean;
    isPrepay: boolean;
    isBusiness: boolean;
    isRestricted: boolean;
    term: number | null;
    availableFrom: string | null;
    availableTo: string | null;
    tariffsActiveAt: string | null;
    /** Grid supply point group, e.g. "_A"; null when no postcode or ambiguous */
    region: string | null;
    /** Region -> tariffs offered there */
    tariffs: ReadonlyMap<string, readonly T[]>;
}

/**
 * Charges folded at one bucket rollover
 */
export interface BucketTotal {
    tariffCode: string;
    /** Index of the bucket being closed */
    bucket: number;
    standingCharge: number;
    consumptionCharge: number;
}

/**
 * Result of replaying consumption against one product, in pence
 */
export interface ChargeTotals {
    standingCharge: number;
    consumptionCharge: number;
    buckets: BucketTotal[];
    /** Trailing partial accumulators, not included in the totals */
    unfolded: {
        standingCharge: number;
        consumptionCharge: number;
    };
}

/**
 * One ranked tariff
 */
export interface TariffComparison {
    code: string;
    /** Standing charges, pence */
    sc: number;
    /** Consumption charges, pence */
    tc: number;
    /** Pounds */
    total: number;
    /** Comparator total minus this total, pounds */
    saving: number;
    isComparator: boolean;
}

/**
 * The outcome of one comparison run
 */
export interface Comparison {
    periodStart: Date;
    periodEnd: Date | null;
    comparator: TariffComparison;
    /** Most expensive first; the last entry is the winner */
    alternatives: TariffComparison[];
}

export function assertNever(value: never): never {
    throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}
