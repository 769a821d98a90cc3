/**
 * Octopus Energy API Client
 * Paginated, authenticated fetches with retry; responses validated with zod
 */

import pRetry, { AbortError } from 'p-retry';
import { z } from 'zod';
import type {
    ConsumptionSlot,
    Product,
    RateSchedule,
    TariffChargeSchedules,
    TariffType,
} from '../contracts/tariff.contract.js';
import { assertNever } from '../contracts/tariff.contract.js';
import { config } from '../config/index.js';
import { ProductNormalizer, toRateSchedule, type ProductNormalizerOptions } from '../normalizers/product.normalizer.js';
import {
    ConsumptionEntrySchema,
    GridSupplyPointsSchema,
    MeterPointSchema,
    PageSchema,
    ProductDetailSchema,
    ProductListEntrySchema,
    RateEntrySchema,
    type MeterPoint,
    type ProductListEntry,
} from '../types/octopus.js';
import { createApiLogger, logger } from '../utils/logger.js';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface OctopusClientOptions {
    baseUrl?: string;
    apiKey?: string;
    requestTimeout?: number;
    maxRetries?: number;
    /** Delay before the first retry, ms */
    retryDelay?: number;
    pageSize?: number;
}

export interface ChargePeriod {
    periodFrom?: string;
    periodTo?: string;
}

export interface ProductQuery extends ChargePeriod {
    tariffsActiveAt?: string;
}

export class ApiRequestError extends Error {
    readonly endpoint: string;
    /** 0 when no response arrived */
    readonly status: number;

    constructor(endpoint: string, status: number, statusText: string) {
        super(`octopus-api: ${endpoint}: ${status === 0 ? 'no response:' : status} ${statusText}`);
        this.name = 'ApiRequestError';
        this.endpoint = endpoint;
        this.status = status;
    }
}

export class ApiResponseError extends Error {
    readonly endpoint: string;
    readonly issues: string[];

    constructor(endpoint: string, issues: string[]) {
        super(`octopus-api: ${endpoint}: unexpected response (${issues.join('; ')})`);
        this.name = 'ApiResponseError';
        this.endpoint = endpoint;
        this.issues = issues;
    }
}

function isRetryable(status: number): boolean {
    return status === 429 || status >= 500;
}

export class OctopusClient {
    private readonly baseUrl: string;
    private readonly apiKey: string;
    private readonly requestTimeout: number;
    private readonly maxRetries: number;
    private readonly retryDelay: number;
    private readonly pageSize: number;

    constructor(options: OctopusClientOptions = {}) {
        const baseUrl = options.baseUrl ?? config.api.baseUrl;
        this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
        this.apiKey = options.apiKey ?? config.api.key;
        this.requestTimeout = options.requestTimeout ?? config.api.requestTimeout;
        this.maxRetries = options.maxRetries ?? config.api.maxRetries;
        this.retryDelay = options.retryDelay ?? 1000;
        this.pageSize = options.pageSize ?? config.api.pageSize;
    }

    /**
     * Build an absolute URL for an API path
     */
    buildUrl(path: string, params: QueryParams = {}): string {
        const url = new URL(path, this.baseUrl);
        for (const [key, value] of Object.entries(params)) {
            if (value === undefined) continue;
            url.searchParams.set(key, String(value));
        }
        return url.toString();
    }

    private validate<T>(endpoint: string, body: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
        const parsed = schema.safeParse(body);
        if (!parsed.success) {
            throw new ApiResponseError(
                endpoint,
                parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            );
        }
        return parsed.data;
    }

    /**
     * Fetch one document and validate it
     */
    private async fetchJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
        const endpoint = new URL(url).pathname;
        const log = createApiLogger(endpoint);
        const headers: Record<string, string> = { Accept: 'application/json' };
        if (this.apiKey) {
            headers.Authorization = `Basic ${Buffer.from(`${this.apiKey}:`).toString('base64')}`;
        }

        const body = await pRetry(
            async (): Promise<unknown> => {
                log.debug({ url }, 'GET');
                let res: Response;
                try {
                    res = await fetch(url, {
                        headers,
                        signal: AbortSignal.timeout(this.requestTimeout),
                    });
                } catch (error) {
                    // Timeouts and network failures: no status
                    throw new ApiRequestError(endpoint, 0, error instanceof Error ? error.message : String(error));
                }
                if (!res.ok) {
                    const error = new ApiRequestError(endpoint, res.status, res.statusText);
                    if (!isRetryable(res.status)) throw new AbortError(error);
                    throw error;
                }
                try {
                    return await res.json();
                } catch (error) {
                    log.debug({ reason: error instanceof Error ? error.message : String(error) }, 'undecodable body');
                    throw new AbortError(new ApiResponseError(endpoint, ['invalid JSON']));
                }
            },
            {
                retries: this.maxRetries,
                minTimeout: this.retryDelay,
                onFailedAttempt: (error) => {
                    log.warn(
                        { attempt: error.attemptNumber, retriesLeft: error.retriesLeft, reason: error.message },
                        'API request failed, retrying...'
                    );
                },
            }
        );

        return this.validate(endpoint, body, schema);
    }

    /**
     * Fetch every page of a paginated list, following `next`
     */
    private async fetchAll<T>(
        path: string,
        params: QueryParams,
        itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>
    ): Promise<T[]> {
        const results: T[] = [];
        let url: string | null = this.buildUrl(path, params);

        while (url) {
            const page: z.infer<typeof PageSchema> = await this.fetchJson(url, PageSchema);
            const endpoint = new URL(url).pathname;
            for (const item of page.results) {
                results.push(this.validate(endpoint, item, itemSchema));
            }
            url = page.next ?? null;
        }

        return results;
    }

    /**
     * Grid supply point groups matching a postcode
     */
    async gridSupplyPoints(postcode: string): Promise<string[]> {
        const url = this.buildUrl('industry/grid-supply-points/', { postcode });
        const response = await this.fetchJson(url, GridSupplyPointsSchema);
        return response.results.map((gsp) => gsp.group_id);
    }

    /**
     * The region for a postcode, or null unless exactly one group matches
     */
    async resolveRegion(postcode: string): Promise<string | null> {
        const groups = await this.gridSupplyPoints(postcode);
        if (groups.length === 1) {
            logger.info({ postcode, region: groups[0] }, 'grid supply point found');
            return groups[0];
        }
        logger.warn({ postcode, matches: groups.length }, 'grid supply point not uniquely found');
        return null;
    }

    async meterPoint(mpan: string): Promise<MeterPoint> {
        const url = this.buildUrl(`electricity-meter-points/${encodeURIComponent(mpan)}/`);
        return this.fetchJson(url, MeterPointSchema);
    }

    /**
     * Half-hourly consumption, oldest first
     */
    async consumption(mpan: string, serial: string, period: ChargePeriod = {}): Promise<ConsumptionSlot[]> {
        const entries = await this.fetchAll(
            `electricity-meter-points/${encodeURIComponent(mpan)}/meters/${encodeURIComponent(serial)}/consumption/`,
            {
                page_size: this.pageSize,
                order_by: 'period',
                period_from: period.periodFrom,
                period_to: period.periodTo,
            },
            ConsumptionEntrySchema
        );

        return entries.map((entry) => ({
            intervalStart: entry.interval_start,
            intervalEnd: entry.interval_end,
            consumption: entry.consumption,
        }));
    }

    /**
     * Product list entries; brand and name filtering happens in the workflow
     */
    async products(params: { availableAt?: string } = {}): Promise<ProductListEntry[]> {
        return this.fetchAll('products/', { available_at: params.availableAt }, ProductListEntrySchema);
    }

    /**
     * Product details with tariff summaries for every region
     */
    async product(code: string, query: ProductQuery = {}, options: ProductNormalizerOptions = {}): Promise<Product> {
        const url = this.buildUrl(`products/${encodeURIComponent(code)}/`, {
            tariffs_active_at: query.tariffsActiveAt,
            period_from: query.periodFrom,
            period_to: query.periodTo,
        });
        const detail = await this.fetchJson(url, ProductDetailSchema);
        return new ProductNormalizer(options).normalize(detail);
    }

    /**
     * Charge histories of one tariff over a period
     */
    async tariffCharges(
        productCode: string,
        tariffCode: string,
        tariffType: TariffType,
        period: ChargePeriod = {}
    ): Promise<TariffChargeSchedules> {
        const params: QueryParams = {
            page_size: this.pageSize,
            period_from: period.periodFrom,
            period_to: period.periodTo,
        };
        const fuel = tariffType === 'single_register_gas' ? 'gas-tariffs' : 'electricity-tariffs';
        const base = `products/${encodeURIComponent(productCode)}/${fuel}/${encodeURIComponent(tariffCode)}/`;
        const schedule = async (component: string): Promise<RateSchedule> =>
            toRateSchedule(await this.fetchAll(`${base}${component}/`, params, RateEntrySchema));

        switch (tariffType) {
            case 'single_register_electricity':
            case 'single_register_gas':
                return {
                    standingCharge: await schedule('standing-charges'),
                    primary: await schedule('standard-unit-rates'),
                    secondary: null,
                };
            case 'dual_register_electricity':
                return {
                    standingCharge: await schedule('standing-charges'),
                    primary: await schedule('day-unit-rates'),
                    secondary: await schedule('night-unit-rates'),
                };
            default:
                return assertNever(tariffType);
        }
    }
}
