import {
    assertNever,
    type PricedTariff,
    type Product,
    type RateSchedule,
    type TariffSummary,
    type TariffType,
} from '../contracts/tariff.contract.js';

const TARIFF_TYPE_NAMES: Record<TariffType, string> = {
    single_register_electricity: 'Single-register electricity',
    dual_register_electricity: 'Dual-register electricity',
    single_register_gas: 'Single-register gas',
};

export function tariffTypeName(tariffType: TariffType): string {
    return TARIFF_TYPE_NAMES[tariffType];
}

function rate(value: number | null): string {
    return value === null ? 'n/a' : String(value);
}

function isPriced(tariff: TariffSummary): tariff is PricedTariff {
    return 'rates' in tariff;
}

/**
 * Charge windows oldest first
 */
function formatSchedule(schedule: RateSchedule, name: string, unit = 'p/kWh'): string[] {
    return [...schedule]
        .reverse()
        .map((window) => `    ${window.validFrom ?? ''} to ${window.validTo ?? ''}: ${name} ${window.valueIncVat} ${unit}`);
}

function formatRateHistory(tariff: PricedTariff): string[] {
    const rates = tariff.rates;
    const lines = formatSchedule(rates.standingCharge, 'Standing charge', 'p/day');
    switch (rates.registers) {
        case 'single':
            return [...lines, ...formatSchedule(rates.standard, 'Standard unit rate')];
        case 'dual':
            return [
                ...lines,
                ...formatSchedule(rates.day, 'Day unit rate'),
                ...formatSchedule(rates.night, 'Night unit rate'),
            ];
        default:
            return assertNever(rates);
    }
}

export function formatTariffSummary(tariff: TariffSummary): string[] {
    let price: string;
    switch (tariff.headline.registers) {
        case 'single':
            price = `Standard unit rate: ${rate(tariff.headline.standardUnitRateIncVat)} p/kWh`;
            break;
        case 'dual':
            price =
                `Day unit rate: ${rate(tariff.headline.dayUnitRateIncVat)} p/kWh, ` +
                `Night unit rate: ${rate(tariff.headline.nightUnitRateIncVat)} p/kWh`;
            break;
        default:
            return assertNever(tariff.headline);
    }

    const header =
        `  + ${tariff.tariffCode}: ${tariffTypeName(tariff.tariffType)} ${tariff.paymentModel}: ` +
        `Standing charge: ${rate(tariff.standingChargeIncVat)} p/day, ${price}`;

    return isPriced(tariff) ? [header, ...formatRateHistory(tariff)] : [header];
}

/**
 * A product with the tariffs of its region, or of every region when none is set
 */
export function formatProduct(code: string, product: Product): string {
    const lines = [`Product ${code} "${product.displayName}" tariffs active at ${product.tariffsActiveAt ?? ''}`];

    if (product.tariffs.size === 0) {
        lines.push('  + No applicable tariffs');
        return lines.join('\n');
    }

    const tariffs =
        product.region !== null ? product.tariffs.get(product.region) ?? [] : [...product.tariffs.values()].flat();

    for (const tariff of tariffs) {
        lines.push(...formatTariffSummary(tariff));
    }

    return lines.join('\n');
}
