/**
 * Consumption export: one row per day, one column per half-hour slot
 */

import { writeFile } from 'node:fs/promises';
import type { ConsumptionSlot } from '../contracts/tariff.contract.js';
import { parseValidFrom } from '../engine/rate.engine.js';
import { logger } from '../utils/logger.js';

export const SLOTS_PER_DAY = 48;

function slotTime(slot: ConsumptionSlot): string {
    return parseValidFrom(slot.intervalStart).toISOString().slice(11, 16);
}

function slotDate(slot: ConsumptionSlot): string {
    return parseValidFrom(slot.intervalStart).toISOString().slice(0, 10);
}

/**
 * Header "Date,00:00,00:30,..." then "YYYY-MM-DD,<kWh>,..." for every whole day.
 * Fewer than a day's worth of slots gives an empty document.
 */
export function consumptionToCsv(slots: readonly ConsumptionSlot[]): string {
    if (slots.length < SLOTS_PER_DAY) return '';

    const rows: string[][] = [['Date', ...slots.slice(0, SLOTS_PER_DAY).map(slotTime)]];
    const days = Math.floor(slots.length / SLOTS_PER_DAY);

    for (let day = 0; day < days; day++) {
        const daySlots = slots.slice(day * SLOTS_PER_DAY, (day + 1) * SLOTS_PER_DAY);
        rows.push([slotDate(daySlots[0]), ...daySlots.map((slot) => String(slot.consumption))]);
    }

    return rows.map((row) => row.join(',')).join('\n') + '\n';
}

export async function writeConsumptionCsv(filepath: string, slots: readonly ConsumptionSlot[]): Promise<void> {
    await writeFile(filepath, consumptionToCsv(slots));
    logger.info({ filepath, slots: slots.length }, 'Saved consumption CSV');
}
