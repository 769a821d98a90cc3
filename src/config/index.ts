/**
 * Configuration Management
 * All configuration loaded from environment variables with sensible defaults
 */

import { config as loadEnv } from 'dotenv';

// Load .env file
loadEnv();

export interface Config {
    // Octopus Energy REST API
    api: {
        baseUrl: string;
        key: string;
        requestTimeout: number;
        maxRetries: number;
        pageSize: number;
    };

    // The meter whose consumption is replayed
    meter: {
        mpan: string;
        serial: string;
    };

    // Tariff comparison
    comparison: {
        period: string;
        brand: string | undefined;
        paymentModel: string | undefined;
        missingRateThreshold: number;
    };

    // Logging
    logging: {
        level: string;
        pretty: boolean;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] ?? defaultValue;
}

function getOptionalEnv(key: string, defaultValue?: string): string | undefined {
    const value = process.env[key];
    if (value === undefined || value === '') return defaultValue;
    return value;
}

function getEnvInt(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
}

export const config: Config = {
    api: {
        baseUrl: getEnv('OCTOPUS_API_BASE_URL', 'https://api.octopus.energy/v1/'),
        key: getEnv('OCTOPUS_API_KEY', ''),
        requestTimeout: getEnvInt('OCTOPUS_REQUEST_TIMEOUT', 30000),
        maxRetries: getEnvInt('OCTOPUS_MAX_RETRIES', 3),
        pageSize: getEnvInt('OCTOPUS_PAGE_SIZE', 1500),
    },

    meter: {
        mpan: getEnv('METER_MPAN', ''),
        serial: getEnv('METER_SERIAL', ''),
    },

    comparison: {
        period: getEnv('COMPARISON_PERIOD', '1.week'),
        brand: getOptionalEnv('PRODUCT_BRAND'),
        // Several payment models per region would otherwise be summed together
        paymentModel: getOptionalEnv('PAYMENT_MODEL', 'direct_debit_monthly'),
        missingRateThreshold: getEnvInt('MISSING_RATE_THRESHOLD', 5),
    },

    logging: {
        level: getEnv('LOG_LEVEL', 'error'),
        pretty: getEnvBool('LOG_PRETTY', true),
    },
};
