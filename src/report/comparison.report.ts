import type { Comparison, TariffComparison } from '../contracts/tariff.contract.js';
import { winner } from '../engine/comparison.engine.js';

const CODE_WIDTH = 28;

/**
 * printf-style "%5.2f"
 */
export function fixed(amount: number): string {
    return amount.toFixed(2).padStart(5);
}

function isoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

export function formatTariffComparison(entry: TariffComparison): string {
    const code = (entry.isComparator ? `*** ${entry.code}` : entry.code).padStart(CODE_WIDTH);
    return (
        `${code}: Standing charges: ${fixed(entry.sc)}, tariff charges ${fixed(entry.tc)}; ` +
        `total £${fixed(entry.total)}, saving: £${fixed(entry.saving)}`
    );
}

/**
 * One-line summary; with `verbose` every alternative is listed before the winner
 */
export function formatComparison(comparison: Comparison, verbose = false): string {
    let result = `Period: ${isoDate(comparison.periodStart)}`;
    if (comparison.periodEnd) result += `..${isoDate(comparison.periodEnd)}`;
    result += ` Comparator: ${comparison.comparator.code} `;
    if (verbose) {
        result += '\n';
        result += comparison.alternatives.map(formatTariffComparison).join('\n');
        result += '\n';
    }
    const best = winner(comparison);
    result += `Winner: ${best.code}: Total: £${fixed(best.total)}, Saving: £${fixed(best.saving)}`;
    return result;
}

export interface TariffComparisonDocument {
    code: string;
    sc: number;
    tc: number;
    total: number;
    saving: number;
    comparator: boolean;
}

export interface ComparisonDocument {
    period_start: string;
    period_end: string | null;
    comparator: TariffComparisonDocument;
    alternatives: TariffComparisonDocument[];
    winner: TariffComparisonDocument;
}

function entryDocument(entry: TariffComparison): TariffComparisonDocument {
    return {
        code: entry.code,
        sc: entry.sc,
        tc: entry.tc,
        total: entry.total,
        saving: entry.saving,
        comparator: entry.isComparator,
    };
}

export function comparisonToDocument(comparison: Comparison): ComparisonDocument {
    return {
        period_start: comparison.periodStart.toISOString(),
        period_end: comparison.periodEnd ? comparison.periodEnd.toISOString() : null,
        comparator: entryDocument(comparison.comparator),
        alternatives: comparison.alternatives.map(entryDocument),
        winner: entryDocument(winner(comparison)),
    };
}

export function comparisonToJson(comparison: Comparison): string {
    return JSON.stringify(comparisonToDocument(comparison));
}
