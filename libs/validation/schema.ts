import { z } from 'zod';
import { INDEX_RANGE } from '../surety/constants.js';
import { isFlightStatusCode } from '../flight/flightStatus.js';

/**
 * Boundary input schemas for the surety gateway.
 */

export const AccountIdSchema = z.string().trim().min(1).max(128);

export const FlightCodeSchema = z.string().trim().min(1).max(32).regex(/^[A-Z0-9][A-Z0-9 -]*$/);

// Unix seconds
export const TimestampSchema = z.number().int().nonnegative();

// bigint or decimal string of base units
export const AmountSchema = z.union([
    z.bigint().nonnegative(),
    z.string().regex(/^\d{1,78}$/).transform(v => BigInt(v))
]);

export const StatusCodeSchema = z.number().int().refine(isFlightStatusCode, { message: 'Unknown flight status code' });

export const OracleIndexSchema = z.number().int().min(0).max(INDEX_RANGE - 1);

export const FlightRefSchema = z.object({
    airline: AccountIdSchema,
    flight: FlightCodeSchema,
    timestamp: TimestampSchema,
});

export const InsurancePurchaseSchema = FlightRefSchema.extend({
    passenger: AccountIdSchema,
    amount: AmountSchema,
    value: AmountSchema,
});

export const OracleResponseSchema = FlightRefSchema.extend({
    index: OracleIndexSchema,
    status: StatusCodeSchema,
});

export type FlightRef = z.infer<typeof FlightRefSchema>;
export type InsurancePurchaseInput = z.input<typeof InsurancePurchaseSchema>;
export type OracleResponseInput = z.input<typeof OracleResponseSchema>;
