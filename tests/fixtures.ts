import type {
    ConsumptionSlot,
    PricedTariff,
    Product,
    RateSchedule,
    TariffSummary,
    TariffType,
} from '../src/contracts/tariff.contract.js';

export const REFERENCE_START = new Date('2024-01-01T00:00:00Z');

const HALF_HOUR_MS = 30 * 60 * 1000;

/**
 * `count` contiguous half-hour slots of `kwh` each, starting at `start`
 */
export function halfHourSlots(start: Date, count: number, kwh: number): ConsumptionSlot[] {
    return Array.from({ length: count }, (_, i) => {
        const from = new Date(start.getTime() + i * HALF_HOUR_MS);
        const to = new Date(from.getTime() + HALF_HOUR_MS);
        return { intervalStart: from.toISOString(), intervalEnd: to.toISOString(), consumption: kwh };
    });
}

export function dayStart(day: number): Date {
    return new Date(REFERENCE_START.getTime() + day * 86400 * 1000);
}

/**
 * A single open-ended window
 */
export function flatSchedule(value: number): RateSchedule {
    return [{ validFrom: '2023-01-01T00:00:00Z', validTo: null, valueIncVat: value }];
}

export function summary(tariffCode: string, tariffType: TariffType = 'single_register_electricity'): TariffSummary {
    return {
        tariffCode,
        tariffType,
        paymentModel: 'direct_debit_monthly',
        region: '_A',
        standingChargeIncVat: null,
        headline:
            tariffType === 'dual_register_electricity'
                ? { registers: 'dual', dayUnitRateIncVat: null, nightUnitRateIncVat: null }
                : { registers: 'single', standardUnitRateIncVat: null },
    };
}

export function singleRegisterTariff(
    tariffCode: string,
    standingCharge: RateSchedule,
    standard: RateSchedule
): PricedTariff {
    return {
        ...summary(tariffCode),
        rates: { registers: 'single', standingCharge, standard },
    };
}

export function gasTariff(tariffCode: string, standingCharge: RateSchedule, standard: RateSchedule): PricedTariff {
    return {
        ...summary(tariffCode, 'single_register_gas'),
        rates: { registers: 'single', standingCharge, standard },
    };
}

export function product<T extends TariffSummary>(
    productCode: string,
    tariffs: T[],
    region: string | null = '_A'
): Product<T> {
    return {
        productCode,
        displayName: `${productCode} display`,
        fullName: `${productCode} full`,
        description: '',
        brand: 'OCTOPUS_ENERGY',
        direction: 'IMPORT',
        isVariable: true,
        isGreen: false,
        isTracker: false,
        isPrepay: false,
        isBusiness: false,
        isRestricted: false,
        term: null,
        availableFrom: null,
        availableTo: null,
        tariffsActiveAt: '2024-01-01T00:00:00Z',
        region,
        tariffs: new Map([['_A', tariffs]]),
    };
}

/**
 * A product with one flat single-register electricity tariff
 */
export function flatProduct(productCode: string, standingCharge: number, unitRate: number): Product<PricedTariff> {
    return product(productCode, [
        singleRegisterTariff(`E-1R-${productCode}-A`, flatSchedule(standingCharge), flatSchedule(unitRate)),
    ]);
}
