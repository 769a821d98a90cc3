/**
 * Octopus Energy API Types
 * Response schemas for the REST endpoints the client calls, validated at the boundary
 */

import { z } from 'zod';

// ============================================================================
// Pagination
// ============================================================================

export function paginated<T extends z.ZodTypeAny>(item: T) {
    return z.object({
        count: z.number().optional(),
        next: z.string().nullable().optional(),
        previous: z.string().nullable().optional(),
        results: z.array(item),
    });
}

/** A page whose items are validated one by one */
export const PageSchema = paginated(z.unknown());

// ============================================================================
// Charges and consumption
// ============================================================================

export const RateEntrySchema = z.object({
    value_inc_vat: z.coerce.number(),
    valid_from: z.string().nullable().optional(),
    valid_to: z.string().nullable().optional(),
});

export type RateEntry = z.infer<typeof RateEntrySchema>;

export const ConsumptionEntrySchema = z.object({
    // Decimal string in some responses, number in others
    consumption: z.coerce.number(),
    interval_start: z.string(),
    interval_end: z.string(),
});

export type ConsumptionEntry = z.infer<typeof ConsumptionEntrySchema>;

// ============================================================================
// Products
// ============================================================================

const ProductFields = {
    code: z.string(),
    direction: z.string().nullable().optional(),
    full_name: z.string().default(''),
    display_name: z.string().default(''),
    description: z.string().default(''),
    is_variable: z.boolean().default(false),
    is_green: z.boolean().default(false),
    is_tracker: z.boolean().default(false),
    is_prepay: z.boolean().default(false),
    is_business: z.boolean().default(false),
    is_restricted: z.boolean().default(false),
    term: z.number().nullable().optional(),
    available_from: z.string().nullable().optional(),
    available_to: z.string().nullable().optional(),
    brand: z.string().nullable().optional(),
};

export const ProductListEntrySchema = z.object(ProductFields);

export type ProductListEntry = z.infer<typeof ProductListEntrySchema>;

export const TariffDetailSchema = z.object({
    code: z.string().optional(),
    standing_charge_inc_vat: z.number().nullable().optional(),
    standard_unit_rate_inc_vat: z.number().nullable().optional(),
    day_unit_rate_inc_vat: z.number().nullable().optional(),
    night_unit_rate_inc_vat: z.number().nullable().optional(),
});

export type TariffDetail = z.infer<typeof TariffDetailSchema>;

/** Region -> payment model -> tariff */
const RegionalTariffsSchema = z.record(z.string(), z.record(z.string(), TariffDetailSchema)).default({});

export type RegionalTariffs = z.infer<typeof RegionalTariffsSchema>;

export const ProductDetailSchema = z.object({
    ...ProductFields,
    tariffs_active_at: z.string().nullable().optional(),
    single_register_electricity_tariffs: RegionalTariffsSchema,
    dual_register_electricity_tariffs: RegionalTariffsSchema,
    single_register_gas_tariffs: RegionalTariffsSchema,
});

export type ProductDetail = z.infer<typeof ProductDetailSchema>;

// ============================================================================
// Industry and meter points
// ============================================================================

export const GridSupplyPointsSchema = paginated(z.object({ group_id: z.string() }));

export const MeterPointSchema = z.object({
    mpan: z.string(),
    gsp: z.string().nullable().optional(),
    profile_class: z.number().nullable().optional(),
});

export type MeterPoint = z.infer<typeof MeterPointSchema>;
