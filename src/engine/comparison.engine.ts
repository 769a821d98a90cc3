import type {
    Comparison,
    ConsumptionSlot,
    PricedTariff,
    Product,
    TariffComparison,
} from '../contracts/tariff.contract.js';
import { logger } from '../utils/logger.js';
import { calcCharges, MissingRateCounter, type ChargeRunContext } from './charge.engine.js';
import { NoTariffForRegionError } from './errors.js';

export interface CompareTariffsInput {
    comparator: Product<PricedTariff>;
    candidates: readonly Product<PricedTariff>[];
    referenceStart: Date;
    periodEnd?: Date | null;
    bucketSeconds: number;
    slots: readonly ConsumptionSlot[];
    missingRateThreshold?: number;
}

export function pence2pounds(pence: number): number {
    return pence / 100;
}

/**
 * Rank candidate products against a comparator over the same consumption.
 *
 * Candidates without tariffs for the region, or whose charges come to exactly
 * zero, are left out. Alternatives are ordered most expensive first so the
 * last entry is the winner.
 */
export function compareTariffs(input: CompareTariffsInput): Comparison {
    const { comparator, candidates, referenceStart, bucketSeconds, slots } = input;

    // One counter for the whole run, shared by every tariff
    const context: ChargeRunContext = {
        missingRates: new MissingRateCounter(input.missingRateThreshold),
    };

    const charges = new Map<string, { sc: number; tc: number }>();

    const comparatorTotals = calcCharges(comparator, referenceStart, bucketSeconds, slots, context);
    const comparatorCharges = {
        sc: comparatorTotals.standingCharge,
        tc: comparatorTotals.consumptionCharge,
    };
    charges.set(comparator.productCode, comparatorCharges);

    for (const candidate of candidates) {
        try {
            const totals = calcCharges(candidate, referenceStart, bucketSeconds, slots, context);
            if (totals.standingCharge === 0 && totals.consumptionCharge === 0) {
                logger.debug({ product: candidate.productCode }, 'no applicable charges, excluded from ranking');
                continue;
            }
            charges.set(candidate.productCode, { sc: totals.standingCharge, tc: totals.consumptionCharge });
        } catch (error) {
            if (!(error instanceof NoTariffForRegionError)) throw error;
            logger.warn(error.message);
        }
    }

    const comparatorTotal = pence2pounds(comparatorCharges.sc + comparatorCharges.tc);

    const ranked = [...charges.entries()]
        .sort(([, a], [, b]) => a.sc + a.tc - (b.sc + b.tc))
        .reverse();

    return {
        periodStart: referenceStart,
        periodEnd: input.periodEnd ?? null,
        comparator: {
            code: comparator.productCode,
            sc: comparatorCharges.sc,
            tc: comparatorCharges.tc,
            total: comparatorTotal,
            saving: 0,
            isComparator: true,
        },
        alternatives: ranked.map(([code, { sc, tc }]): TariffComparison => {
            const total = pence2pounds(sc + tc);
            return {
                code,
                sc,
                tc,
                total,
                saving: comparatorTotal - total,
                isComparator: code === comparator.productCode,
            };
        }),
    };
}

/**
 * The cheapest alternative
 */
export function winner(comparison: Comparison): TariffComparison {
    return comparison.alternatives[comparison.alternatives.length - 1] ?? comparison.comparator;
}
