import {
    assertNever,
    TARIFF_TYPES,
    type HeadlineRates,
    type PricedTariff,
    type Product,
    type RateSchedule,
    type TariffChargeSchedules,
    type TariffSummary,
    type TariffType,
} from '../contracts/tariff.contract.js';
import type { ProductDetail, RateEntry, RegionalTariffs, TariffDetail } from '../types/octopus.js';
import { logger } from '../utils/logger.js';

export interface ProductNormalizerOptions {
    /** Grid supply point group the product is priced for */
    region?: string | null;
    /** Keep only tariffs with this payment model */
    paymentModel?: string;
}

const TARIFF_FIELDS = {
    single_register_electricity: 'single_register_electricity_tariffs',
    dual_register_electricity: 'dual_register_electricity_tariffs',
    single_register_gas: 'single_register_gas_tariffs',
} as const satisfies Record<TariffType, keyof ProductDetail>;

/**
 * Product Normalizer
 *
 * Transforms an API product document into the tariff contract. Tariffs come
 * out as phase-one summaries; rate histories are attached later with
 * `withRateHistory`, and only for the region being compared.
 */
export class ProductNormalizer {
    private readonly region: string | null;
    private readonly paymentModel: string | undefined;

    constructor(options: ProductNormalizerOptions = {}) {
        this.region = options.region ?? null;
        this.paymentModel = options.paymentModel;
    }

    normalize(detail: ProductDetail): Product {
        const tariffs = new Map<string, TariffSummary[]>();

        for (const tariffType of TARIFF_TYPES) {
            const regional: RegionalTariffs = detail[TARIFF_FIELDS[tariffType]];

            for (const [region, byPaymentModel] of Object.entries(regional)) {
                for (const [paymentModel, raw] of Object.entries(byPaymentModel)) {
                    if (this.paymentModel && paymentModel !== this.paymentModel) continue;

                    const summary = this.normalizeTariff(tariffType, region, paymentModel, raw);
                    if (!summary) continue;

                    const list = tariffs.get(region) ?? [];
                    list.push(summary);
                    tariffs.set(region, list);
                }
            }
        }

        return {
            productCode: detail.code,
            displayName: detail.display_name,
            fullName: detail.full_name,
            description: detail.description,
            brand: detail.brand ?? null,
            direction: detail.direction ?? null,
            isVariable: detail.is_variable,
            isGreen: detail.is_green,
            isTracker: detail.is_tracker,
            isPrepay: detail.is_prepay,
            isBusiness: detail.is_business,
            isRestricted: detail.is_restricted,
            term: detail.term ?? null,
            availableFrom: detail.available_from ?? null,
            availableTo: detail.available_to ?? null,
            tariffsActiveAt: detail.tariffs_active_at ?? null,
            region: this.region,
            tariffs,
        };
    }

    private normalizeTariff(
        tariffType: TariffType,
        region: string,
        paymentModel: string,
        raw: TariffDetail
    ): TariffSummary | null {
        if (!raw.code) {
            logger.warn({ tariffType, region, paymentModel }, 'tariff without a code, skipped');
            return null;
        }

        return {
            tariffCode: raw.code,
            tariffType,
            paymentModel,
            region,
            standingChargeIncVat: raw.standing_charge_inc_vat ?? null,
            headline: headlineRates(tariffType, raw),
        };
    }
}

function headlineRates(tariffType: TariffType, raw: TariffDetail): HeadlineRates {
    switch (tariffType) {
        case 'single_register_electricity':
        case 'single_register_gas':
            return { registers: 'single', standardUnitRateIncVat: raw.standard_unit_rate_inc_vat ?? null };
        case 'dual_register_electricity':
            return {
                registers: 'dual',
                dayUnitRateIncVat: raw.day_unit_rate_inc_vat ?? null,
                nightUnitRateIncVat: raw.night_unit_rate_inc_vat ?? null,
            };
        default:
            return assertNever(tariffType);
    }
}

export function toRateSchedule(entries: readonly RateEntry[]): RateSchedule {
    return entries.map((entry) => ({
        validFrom: entry.valid_from ?? null,
        validTo: entry.valid_to ?? null,
        valueIncVat: entry.value_inc_vat,
    }));
}

/**
 * Attach rate histories to a tariff summary (construction phase two)
 */
export function withRateHistory(summary: TariffSummary, schedules: TariffChargeSchedules): PricedTariff {
    switch (summary.tariffType) {
        case 'single_register_electricity':
        case 'single_register_gas':
            return {
                ...summary,
                rates: { registers: 'single', standingCharge: schedules.standingCharge, standard: schedules.primary },
            };
        case 'dual_register_electricity':
            if (!schedules.secondary) {
                throw new Error(`dual-register tariff ${summary.tariffCode} needs a night unit rate schedule`);
            }
            return {
                ...summary,
                rates: {
                    registers: 'dual',
                    standingCharge: schedules.standingCharge,
                    day: schedules.primary,
                    night: schedules.secondary,
                },
            };
        default:
            return assertNever(summary.tariffType);
    }
}
