import {
    assertNever,
    type ChargeTotals,
    type ConsumptionSlot,
    type PricedTariff,
    type Product,
    type RateSchedule,
    type TariffType,
} from '../contracts/tariff.contract.js';
import { config } from '../config/index.js';
import { createTariffLogger, logger } from '../utils/logger.js';
import { bucketIndex, dayIndex } from './bucket.engine.js';
import { NoMatchingRateError, NoTariffForRegionError, TooManyMissingRatesError } from './errors.js';
import { findRate, parseValidFrom, parseValidTo } from './rate.engine.js';

/**
 * Counts unit-rate lookups that found no rate during one comparison run.
 * Exceeding the threshold means the rate data is systematically wrong.
 */
export class MissingRateCounter {
    private missing = 0;

    constructor(readonly threshold: number = config.comparison.missingRateThreshold) {}

    get count(): number {
        return this.missing;
    }

    record(error: NoMatchingRateError): void {
        this.missing++;
        logger.warn({ missing: this.missing, threshold: this.threshold }, `tariff charge: ${error.message}`);
        if (this.missing > this.threshold) {
            throw new TooManyMissingRatesError(this.missing, this.threshold);
        }
    }
}

export interface ChargeRunContext {
    missingRates: MissingRateCounter;
}

interface ScoredRates {
    standingCharge: RateSchedule;
    unitRate: RateSchedule;
}

/**
 * Whether charges are calculated for tariffs of this type
 */
export function isScoredTariffType(tariffType: TariffType): boolean {
    switch (tariffType) {
        case 'single_register_electricity':
            return true;
        case 'dual_register_electricity':
        case 'single_register_gas':
            return false;
        default:
            return assertNever(tariffType);
    }
}

/**
 * Schedules used for scoring, or null for tariff types that are not scored
 */
function scoredRates(tariff: PricedTariff): ScoredRates | null {
    if (!isScoredTariffType(tariff.tariffType) || tariff.rates.registers !== 'single') {
        return null;
    }
    return { standingCharge: tariff.rates.standingCharge, unitRate: tariff.rates.standard };
}

/**
 * Replay consumption against every scored tariff of the product's region.
 *
 * Standing charges accrue per elapsed day and are folded, together with the
 * consumption charges, into the totals when a slot opens a new bucket. The
 * accumulators left open after the last slot are reported in `unfolded` and
 * are not part of the totals.
 */
export function calcCharges(
    product: Product<PricedTariff>,
    referenceStart: Date,
    bucketSeconds: number,
    slots: readonly ConsumptionSlot[],
    context: ChargeRunContext = { missingRates: new MissingRateCounter() }
): ChargeTotals {
    if (product.region === null) {
        logger.warn('specify a postcode to allow retrieval of tariff charges');
    }

    const tariffs = product.region === null ? undefined : product.tariffs.get(product.region);
    if (!tariffs) {
        throw new NoTariffForRegionError(product.productCode, product.region);
    }

    const totals: ChargeTotals = {
        standingCharge: 0,
        consumptionCharge: 0,
        buckets: [],
        unfolded: { standingCharge: 0, consumptionCharge: 0 },
    };

    for (const tariff of tariffs) {
        const rates = scoredRates(tariff);
        if (!rates) {
            logger.debug({ tariff: tariff.tariffCode, tariffType: tariff.tariffType }, 'skipping tariff');
            continue;
        }

        const log = createTariffLogger(product.productCode, tariff.tariffCode);
        log.info(`Comparing to tariff ${tariff.tariffCode}...`);

        let bucketMarker = 0;
        let dayMarker = 0;
        let bucket = 0;
        let standingCharge = 0;

        for (const slot of slots) {
            const start = parseValidFrom(slot.intervalStart);
            const finish = parseValidTo(slot.intervalEnd);
            const day = dayIndex(start, referenceStart);
            const bucketNumber = bucketIndex(start, referenceStart, bucketSeconds);

            if (day > dayMarker) {
                try {
                    standingCharge += (day - dayMarker) * findRate(rates.standingCharge, start, finish);
                } catch (error) {
                    if (!(error instanceof NoMatchingRateError)) throw error;
                    log.warn(`standing charge: ${error.message}`);
                }
                dayMarker = day;
            }

            // End of bucket
            if (bucketNumber > bucketMarker) {
                log.debug(
                    { bucket: bucketNumber, start: start.toISOString(), sc: standingCharge, cost: bucket },
                    'bucket full'
                );
                totals.standingCharge += standingCharge;
                totals.consumptionCharge += bucket;
                totals.buckets.push({
                    tariffCode: tariff.tariffCode,
                    bucket: bucketMarker,
                    standingCharge,
                    consumptionCharge: bucket,
                });
                bucket = 0;
                standingCharge = 0;
                bucketMarker = bucketNumber;
            }

            try {
                bucket += slot.consumption * findRate(rates.unitRate, start, finish);
            } catch (error) {
                if (!(error instanceof NoMatchingRateError)) throw error;
                context.missingRates.record(error);
            }
        }

        totals.unfolded.standingCharge += standingCharge;
        totals.unfolded.consumptionCharge += bucket;
    }

    return totals;
}
