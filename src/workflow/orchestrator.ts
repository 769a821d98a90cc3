/**
 * Comparison Workflow
 * Fetches products and rate histories, then hands everything to the charge engine
 */

import { ApiRequestError, ApiResponseError, type ChargePeriod, type OctopusClient } from '../api/client.js';
import type {
    Comparison,
    ConsumptionSlot,
    PricedTariff,
    Product,
    TariffSummary,
} from '../contracts/tariff.contract.js';
import { isScoredTariffType } from '../engine/charge.engine.js';
import { compareTariffs } from '../engine/comparison.engine.js';
import { withRateHistory } from '../normalizers/product.normalizer.js';
import type { ProductListEntry } from '../types/octopus.js';
import { logger } from '../utils/logger.js';

/**
 * The part of the API client the workflow needs
 */
export type TariffApi = Pick<OctopusClient, 'product' | 'products' | 'tariffCharges'>;

export interface ProductFilter {
    /** Regex matched against the display name */
    match?: string;
    /** Regex matched against the brand */
    brand?: string;
    /** EXPORT products instead of IMPORT ones */
    exportProducts?: boolean;
}

export interface ProductSelection {
    filter: ProductFilter;
    /** Select products available, and tariffs active, at this time */
    at?: string;
    period: ChargePeriod;
    region: string | null;
    paymentModel?: string;
}

export interface ComparisonOptions extends ProductSelection {
    comparatorCode: string;
    referenceStart: Date;
    periodEnd: Date | null;
    bucketSeconds: number;
    slots: readonly ConsumptionSlot[];
    missingRateThreshold?: number;
}

/**
 * Keep the product list entries a selection asks for
 */
export function filterProducts(entries: readonly ProductListEntry[], filter: ProductFilter): ProductListEntry[] {
    const match = filter.match ? new RegExp(filter.match) : null;
    const brand = filter.brand ? new RegExp(filter.brand) : null;
    const direction = filter.exportProducts ? 'EXPORT' : 'IMPORT';

    return entries.filter(
        (entry) =>
            (!match || match.test(entry.display_name)) &&
            (!brand || brand.test(entry.brand ?? '')) &&
            entry.direction === direction
    );
}

/**
 * Attach rate histories to the tariffs of the product's own region that
 * `include` accepts; the others are left out of the result.
 * Without a region nothing is fetched and the product has no priced tariffs.
 */
export async function priceProduct(
    client: TariffApi,
    product: Product,
    period: ChargePeriod,
    include: (tariff: TariffSummary) => boolean = () => true
): Promise<Product<PricedTariff>> {
    const tariffs = new Map<string, PricedTariff[]>();
    const summaries = product.region === null ? undefined : product.tariffs.get(product.region);

    if (product.region !== null && summaries) {
        const priced: PricedTariff[] = [];
        for (const summary of summaries) {
            if (!include(summary)) continue;
            const schedules = await client.tariffCharges(
                product.productCode,
                summary.tariffCode,
                summary.tariffType,
                period
            );
            priced.push(withRateHistory(summary, schedules));
        }
        tariffs.set(product.region, priced);
    }

    return { ...product, tariffs };
}

function productQuery(selection: ProductSelection) {
    return {
        tariffsActiveAt: selection.at ?? selection.period.periodFrom,
        periodFrom: selection.period.periodFrom,
        periodTo: selection.period.periodTo,
    };
}

// Rate histories the charge engine never reads are not fetched
const scoredOnly = (tariff: TariffSummary): boolean => isScoredTariffType(tariff.tariffType);

function isApiError(error: unknown): error is ApiRequestError | ApiResponseError {
    return error instanceof ApiRequestError || error instanceof ApiResponseError;
}

/**
 * Fetch one product, priced when a period start is known
 */
export async function describeProduct(
    client: TariffApi,
    code: string,
    selection: ProductSelection
): Promise<Product<TariffSummary>> {
    const product = await client.product(code, productQuery(selection), {
        region: selection.region,
        paymentModel: selection.paymentModel,
    });
    if (!selection.period.periodFrom || product.region === null) {
        return product;
    }
    const priced = await priceProduct(client, product, selection.period);
    // Keep the other regions' summaries for listing
    const tariffs = new Map<string, readonly TariffSummary[]>(product.tariffs);
    for (const [region, list] of priced.tariffs) tariffs.set(region, list);
    return { ...product, tariffs };
}

/**
 * Fetch every product matching the selection's filter
 */
export async function describeProducts(
    client: TariffApi,
    selection: ProductSelection
): Promise<Product<TariffSummary>[]> {
    const entries = filterProducts(await client.products({ availableAt: selection.at }), selection.filter);
    const products: Product<TariffSummary>[] = [];

    for (const entry of entries) {
        products.push(await describeProduct(client, entry.code, selection));
    }

    return products;
}

/**
 * Compare the comparator product against every matching product
 */
export async function runComparison(client: TariffApi, options: ComparisonOptions): Promise<Comparison> {
    const query = productQuery(options);
    const normalizerOptions = { region: options.region, paymentModel: options.paymentModel };

    logger.info({ comparator: options.comparatorCode }, 'Fetching comparator product');
    const comparator = await priceProduct(
        client,
        await client.product(options.comparatorCode, query, normalizerOptions),
        options.period,
        scoredOnly
    );

    const entries = filterProducts(await client.products({ availableAt: options.at }), options.filter);
    logger.info({ candidates: entries.length }, 'Fetching candidate products');

    const candidates: Product<PricedTariff>[] = [];
    for (const entry of entries) {
        try {
            const product = await client.product(entry.code, query, normalizerOptions);
            candidates.push(await priceProduct(client, product, options.period, scoredOnly));
        } catch (error) {
            if (!isApiError(error)) throw error;
            logger.warn({ product: entry.code, reason: error.message }, 'skipping product');
        }
    }

    return compareTariffs({
        comparator,
        candidates,
        referenceStart: options.referenceStart,
        periodEnd: options.periodEnd,
        bucketSeconds: options.bucketSeconds,
        slots: options.slots,
        missingRateThreshold: options.missingRateThreshold,
    });
}
