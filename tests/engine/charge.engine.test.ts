import { describe, it, expect } from 'vitest';
import type { RateSchedule } from '../../src/contracts/tariff.contract.js';
import { SECONDS_PER_DAY } from '../../src/engine/bucket.engine.js';
import { calcCharges, isScoredTariffType, MissingRateCounter } from '../../src/engine/charge.engine.js';
import {
    NoMatchingRateError,
    NoTariffForRegionError,
    TimestampBeforeReferenceError,
    TooManyMissingRatesError,
} from '../../src/engine/errors.js';
import {
    dayStart,
    flatProduct,
    flatSchedule,
    gasTariff,
    halfHourSlots,
    product,
    REFERENCE_START,
    singleRegisterTariff,
} from '../fixtures.js';

const context = () => ({ missingRates: new MissingRateCounter(5) });

describe('calcCharges', () => {
    it('folds one full day once the next day starts', () => {
        const slots = [...halfHourSlots(dayStart(0), 48, 0.5), ...halfHourSlots(dayStart(1), 1, 0.5)];

        const totals = calcCharges(flatProduct('FLAT', 30, 20), REFERENCE_START, SECONDS_PER_DAY, slots, context());

        expect(totals.standingCharge).toBe(30);
        expect(totals.consumptionCharge).toBe(480);
        expect(totals.buckets).toEqual([
            { tariffCode: 'E-1R-FLAT-A', bucket: 0, standingCharge: 30, consumptionCharge: 480 },
        ]);
        // The first slot of day two stays in the open bucket
        expect(totals.unfolded).toEqual({ standingCharge: 0, consumptionCharge: 10 });
    });

    it('leaves a trailing partial bucket out of the totals', () => {
        const slots = halfHourSlots(dayStart(0), 48, 0.5);

        const totals = calcCharges(flatProduct('FLAT', 30, 20), REFERENCE_START, SECONDS_PER_DAY, slots, context());

        expect(totals.standingCharge).toBe(0);
        expect(totals.consumptionCharge).toBe(0);
        expect(totals.buckets).toEqual([]);
        expect(totals.unfolded).toEqual({ standingCharge: 0, consumptionCharge: 480 });
    });

    it('matches a direct sum once the unfolded remainder is added back', () => {
        const slots = [...halfHourSlots(dayStart(0), 3 * 48, 0.5), ...halfHourSlots(dayStart(3), 1, 0.5)];

        const totals = calcCharges(flatProduct('FLAT', 30, 20), REFERENCE_START, SECONDS_PER_DAY, slots, context());

        const directConsumption = slots.reduce((sum, slot) => sum + slot.consumption * 20, 0);
        const elapsedDays = 3;

        // Without the trailing slot's bucket
        expect(totals.consumptionCharge).toBe(1440);
        expect(totals.standingCharge).toBe(elapsedDays * 30);
        expect(totals.buckets.reduce((sum, b) => sum + b.consumptionCharge, 0)).toBe(totals.consumptionCharge);
        // With it
        expect(totals.consumptionCharge + totals.unfolded.consumptionCharge).toBe(directConsumption);
        expect(directConsumption).toBe(1450);
    });

    it('accrues several days of standing charge into a multi-day bucket', () => {
        const slots = [...halfHourSlots(dayStart(0), 4 * 48, 0.5), ...halfHourSlots(dayStart(4), 1, 0.5)];

        const totals = calcCharges(
            flatProduct('FLAT', 30, 20),
            REFERENCE_START,
            2 * SECONDS_PER_DAY,
            slots,
            context()
        );

        expect(totals.buckets.map((b) => [b.bucket, b.standingCharge, b.consumptionCharge])).toEqual([
            [0, 60, 960],
            [1, 60, 960],
        ]);
        expect(totals.standingCharge).toBe(120);
        expect(totals.consumptionCharge).toBe(1920);
    });

    it('charges every skipped day when consumption has a gap', () => {
        const slots = [
            ...halfHourSlots(dayStart(0), 2, 1),
            // Nothing recorded on day one
            ...halfHourSlots(dayStart(2), 2, 1),
        ];

        const totals = calcCharges(flatProduct('FLAT', 30, 20), REFERENCE_START, SECONDS_PER_DAY, slots, context());

        expect(totals.buckets).toEqual([
            { tariffCode: 'E-1R-FLAT-A', bucket: 0, standingCharge: 60, consumptionCharge: 40 },
        ]);
        expect(totals.unfolded).toEqual({ standingCharge: 0, consumptionCharge: 40 });
    });

    it('skips standing charges it cannot price without counting them as missing rates', () => {
        const standingCharge: RateSchedule = [
            { validFrom: '2024-01-01T00:00:00Z', validTo: '2024-01-01T12:00:00Z', valueIncVat: 30 },
        ];
        const tariff = singleRegisterTariff('E-1R-SC-A', standingCharge, flatSchedule(20));
        const slots = [...halfHourSlots(dayStart(0), 1, 1), ...halfHourSlots(dayStart(1), 1, 1)];
        const run = context();

        const totals = calcCharges(product('SC', [tariff]), REFERENCE_START, SECONDS_PER_DAY, slots, run);

        expect(totals.standingCharge).toBe(0);
        expect(totals.consumptionCharge).toBe(20);
        expect(run.missingRates.count).toBe(0);
    });

    it('tolerates a few missing unit rates', () => {
        // Covers the first four half hours only
        const unitRate: RateSchedule = [
            { validFrom: '2024-01-01T00:00:00Z', validTo: '2024-01-01T02:00:00Z', valueIncVat: 20 },
        ];
        const tariff = singleRegisterTariff('E-1R-GAP-A', flatSchedule(30), unitRate);
        const run = context();

        const totals = calcCharges(
            product('GAP', [tariff]),
            REFERENCE_START,
            SECONDS_PER_DAY,
            halfHourSlots(dayStart(0), 9, 0.5),
            run
        );

        expect(run.missingRates.count).toBe(5);
        expect(totals.unfolded.consumptionCharge).toBe(40);
    });

    it('aborts once missing unit rates exceed the threshold', () => {
        const unitRate: RateSchedule = [
            { validFrom: '2024-01-01T00:00:00Z', validTo: '2024-01-01T02:00:00Z', valueIncVat: 20 },
        ];
        const tariff = singleRegisterTariff('E-1R-GAP-A', flatSchedule(30), unitRate);

        expect(() =>
            calcCharges(
                product('GAP', [tariff]),
                REFERENCE_START,
                SECONDS_PER_DAY,
                halfHourSlots(dayStart(0), 10, 0.5),
                context()
            )
        ).toThrow(TooManyMissingRatesError);
    });

    it('only scores single-register electricity tariffs', () => {
        const gas = gasTariff('G-1R-FLAT-A', flatSchedule(25), flatSchedule(5));
        const slots = [...halfHourSlots(dayStart(0), 2, 1), ...halfHourSlots(dayStart(1), 1, 1)];

        const totals = calcCharges(product('GAS', [gas]), REFERENCE_START, SECONDS_PER_DAY, slots, context());

        expect(totals).toEqual({
            standingCharge: 0,
            consumptionCharge: 0,
            buckets: [],
            unfolded: { standingCharge: 0, consumptionCharge: 0 },
        });
    });

    it('adds up every scored tariff of the region', () => {
        const tariffs = [
            singleRegisterTariff('E-1R-ONE-A', flatSchedule(10), flatSchedule(10)),
            singleRegisterTariff('E-1R-TWO-A', flatSchedule(20), flatSchedule(5)),
        ];
        const slots = [...halfHourSlots(dayStart(0), 1, 2), ...halfHourSlots(dayStart(1), 1, 2)];

        const totals = calcCharges(product('TWO', tariffs), REFERENCE_START, SECONDS_PER_DAY, slots, context());

        expect(totals.standingCharge).toBe(30);
        expect(totals.consumptionCharge).toBe(30);
        expect(totals.buckets.map((b) => b.tariffCode)).toEqual(['E-1R-ONE-A', 'E-1R-TWO-A']);
    });

    it('fails when the region has no tariffs', () => {
        const elsewhere = product('ELSEWHERE', [], '_P');
        const slots = halfHourSlots(dayStart(0), 1, 1);

        expect(() => calcCharges(elsewhere, REFERENCE_START, SECONDS_PER_DAY, slots, context())).toThrow(
            NoTariffForRegionError
        );
    });

    it('fails when no region is known', () => {
        const noRegion = { ...flatProduct('FLAT', 30, 20), region: null };

        expect(() =>
            calcCharges(noRegion, REFERENCE_START, SECONDS_PER_DAY, halfHourSlots(dayStart(0), 1, 1), context())
        ).toThrow(NoTariffForRegionError);
    });

    it('fails fast on consumption before the reference start', () => {
        const early = halfHourSlots(new Date('2023-12-31T23:30:00Z'), 1, 1);

        expect(() =>
            calcCharges(flatProduct('FLAT', 30, 20), REFERENCE_START, SECONDS_PER_DAY, early, context())
        ).toThrow(TimestampBeforeReferenceError);
    });
});

describe('isScoredTariffType', () => {
    it('scores single-register electricity only', () => {
        expect(isScoredTariffType('single_register_electricity')).toBe(true);
        expect(isScoredTariffType('dual_register_electricity')).toBe(false);
        expect(isScoredTariffType('single_register_gas')).toBe(false);
    });
});

describe('MissingRateCounter', () => {
    it('throws on the record that passes the threshold', () => {
        const counter = new MissingRateCounter(2);
        const error = new NoMatchingRateError(REFERENCE_START, REFERENCE_START);

        counter.record(error);
        counter.record(error);
        expect(counter.count).toBe(2);
        expect(() => counter.record(error)).toThrow(TooManyMissingRatesError);
        expect(counter.count).toBe(3);
    });
});
