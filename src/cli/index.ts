#!/usr/bin/env node
/**
 * CLI for tariff-compare
 * Compare tariffs against real consumption from the command line
 */

import { Command } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { OctopusClient, type ChargePeriod } from '../api/client.js';
import { config } from '../config/index.js';
import { parseDuration } from '../engine/bucket.engine.js';
import { TooManyMissingRatesError } from '../engine/errors.js';
import { comparisonToJson, formatComparison } from '../report/comparison.report.js';
import { writeConsumptionCsv } from '../report/consumption.csv.js';
import { formatProduct } from '../report/product.report.js';
import { describeProduct, describeProducts, runComparison, type ProductSelection } from '../workflow/orchestrator.js';
import { logger, setLogLevel } from '../utils/logger.js';

interface PeriodOptions {
    from?: string;
    to?: string;
    at?: string;
    postcode?: string;
    paymentModel?: string;
}

interface FilterOptions {
    match?: string;
    brand?: string;
    export?: boolean;
}

interface CompareOptions extends PeriodOptions, FilterOptions {
    period: string;
    json?: boolean;
    verbose?: boolean;
    csv?: string;
}

interface ConsumptionOptions extends PeriodOptions {
    csv?: string;
}

function parseTime(value: string, flag: string): Date {
    const parsed = Date.parse(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`${flag} must specify a valid date/time`);
    }
    return new Date(parsed);
}

function chargePeriod(options: PeriodOptions): ChargePeriod {
    return {
        periodFrom: options.from ? parseTime(options.from, '--from').toISOString() : undefined,
        periodTo: options.to ? parseTime(options.to, '--to').toISOString() : undefined,
    };
}

function requireMeter(): { mpan: string; serial: string } {
    if (!config.meter.mpan || !config.meter.serial) {
        throw new Error('METER_MPAN and METER_SERIAL must be set to fetch consumption');
    }
    return config.meter;
}

async function selection(client: OctopusClient, options: PeriodOptions & FilterOptions): Promise<ProductSelection> {
    const period = chargePeriod(options);
    return {
        filter: {
            match: options.match,
            brand: options.brand ?? config.comparison.brand,
            exportProducts: options.export ?? false,
        },
        at: options.at ? parseTime(options.at, '--at').toISOString() : undefined,
        period,
        region: options.postcode ? await client.resolveRegion(options.postcode) : null,
        paymentModel: options.paymentModel ?? config.comparison.paymentModel,
    };
}

function fail(error: unknown): never {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof TooManyMissingRatesError) {
        logger.fatal({ count: error.count, threshold: error.threshold }, 'aborting comparison');
    } else {
        logger.error({ error }, 'CLI error');
    }
    console.error(chalk.red(`\n✗ Error: ${message}`));
    process.exit(1);
}

const program = new Command();

program
    .name('tariff-compare')
    .description('Compare Octopus Energy tariffs against your own half-hourly consumption')
    .version('1.0.0')
    .option('-d, --debug', 'debug logging');

program.hook('preAction', () => {
    if (program.opts<{ debug?: boolean }>().debug) setLogLevel('debug');
});

program
    .command('compare')
    .description('Compare a product with matching available products based on consumption')
    .argument('<product>', 'Comparator product code')
    .requiredOption('-f, --from <datetime>', 'Start the comparison at this date/time')
    .option('-t, --to <datetime>', 'Stop the comparison at this date/time')
    .option('--at <datetime>', 'Select products available at this date/time')
    .option('--period <duration>', 'Bucket length, e.g. 2.weeks', config.comparison.period)
    .option('--postcode <postcode>', 'Installation postcode')
    .option('--payment-model <model>', 'Only compare tariffs with this payment model')
    .option('-m, --match <regex>', 'Select products whose display name matches')
    .option('-b, --brand <regex>', 'Select products whose brand matches')
    .option('--export', 'Compare export products instead of import products')
    .option('-j, --json', 'Output results as JSON')
    .option('-v, --verbose', 'List all comparison results')
    .option('--csv <file>', 'Also write the consumption data to this CSV file')
    .action(async (productCode: string, options: CompareOptions) => {
        const spinner = ora('Fetching consumption...').start();

        try {
            const referenceStart = parseTime(options.from ?? '', '--from');
            const periodEnd = options.to ? parseTime(options.to, '--to') : null;
            const bucketSeconds = parseDuration(options.period);
            const { mpan, serial } = requireMeter();
            const client = new OctopusClient();
            const productSelection = await selection(client, options);

            const slots = await client.consumption(mpan, serial, productSelection.period);
            if (slots.length === 0) {
                throw new Error('no consumption data available');
            }
            if (options.csv) {
                await writeConsumptionCsv(options.csv, slots);
            }
            spinner.succeed(`Fetched ${slots.length} consumption slots`);

            if (!options.json) console.log(`Comparator tariff: ${productCode}`);

            spinner.start('Comparing tariffs...');
            const comparison = await runComparison(client, {
                ...productSelection,
                comparatorCode: productCode,
                referenceStart,
                periodEnd,
                bucketSeconds,
                slots,
                missingRateThreshold: config.comparison.missingRateThreshold,
            });
            spinner.stop();

            console.log(options.json ? comparisonToJson(comparison) : formatComparison(comparison, options.verbose));
        } catch (error) {
            spinner.fail('Comparison failed');
            fail(error);
        }
    });

program
    .command('products')
    .description('List products and their tariffs')
    .option('-f, --from <datetime>', 'Fetch tariff charges from this date/time')
    .option('-t, --to <datetime>', 'Fetch tariff charges up to this date/time')
    .option('--at <datetime>', 'Select products available at this date/time')
    .option('--postcode <postcode>', 'Installation postcode')
    .option('--payment-model <model>', 'Only list tariffs with this payment model')
    .option('-m, --match <regex>', 'Select products whose display name matches')
    .option('-b, --brand <regex>', 'Select products whose brand matches')
    .option('--export', 'List export products instead of import products')
    .action(async (options: PeriodOptions & FilterOptions) => {
        const spinner = ora('Fetching products...').start();

        try {
            const client = new OctopusClient();
            const products = await describeProducts(client, await selection(client, options));
            spinner.succeed(`Found ${products.length} products`);

            for (const product of products) {
                console.log(formatProduct(product.productCode, product));
            }
        } catch (error) {
            spinner.fail('Failed to list products');
            fail(error);
        }
    });

program
    .command('product')
    .description('Show a single product and its tariffs')
    .argument('<code>', 'Product code')
    .option('-f, --from <datetime>', 'Fetch tariff charges from this date/time')
    .option('-t, --to <datetime>', 'Fetch tariff charges up to this date/time')
    .option('--at <datetime>', 'Tariffs active at this date/time')
    .option('--postcode <postcode>', 'Installation postcode')
    .option('--payment-model <model>', 'Only show tariffs with this payment model')
    .action(async (code: string, options: PeriodOptions) => {
        try {
            const client = new OctopusClient();
            const product = await describeProduct(client, code, await selection(client, options));
            console.log(formatProduct(code, product));
        } catch (error) {
            fail(error);
        }
    });

program
    .command('consumption')
    .description('Fetch consumption data for the configured meter')
    .option('-f, --from <datetime>', 'Start at this date/time')
    .option('-t, --to <datetime>', 'Stop at this date/time')
    .option('--csv <file>', 'Write the consumption data to this CSV file')
    .action(async (options: ConsumptionOptions) => {
        const spinner = ora('Fetching consumption...').start();

        try {
            const { mpan, serial } = requireMeter();
            const slots = await new OctopusClient().consumption(mpan, serial, chargePeriod(options));
            spinner.succeed(`Fetched ${slots.length} consumption slots`);

            const total = slots.reduce((sum, slot) => sum + slot.consumption, 0);
            console.log(chalk.blue(`Total consumption: ${total.toFixed(3)} kWh`));

            if (options.csv) {
                await writeConsumptionCsv(options.csv, slots);
                console.log(chalk.green(`✓ Written to ${options.csv}`));
            }
        } catch (error) {
            spinner.fail('Failed to fetch consumption');
            fail(error);
        }
    });

program
    .command('meter-point')
    .description('Show an electricity meter point')
    .argument('<mpan>', 'Meter point administration number')
    .action(async (mpan: string) => {
        try {
            const point = await new OctopusClient().meterPoint(mpan);
            console.log(`mpan: ${point.mpan}: GSP: ${point.gsp ?? ''}, profile class: ${point.profile_class ?? ''}`);
        } catch (error) {
            fail(error);
        }
    });

await program.parseAsync(process.argv);
