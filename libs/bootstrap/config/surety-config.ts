import { z } from 'zod';
import { validate } from '../../validation/zod-middleware.js';

/**
 * Process-level configuration for a surety node.
 * Protocol constants are not configurable; see libs/surety/constants.ts.
 */
export const SuretyConfigSchema = z.object({
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    SURETY_OWNER_ID: z.string().min(1).max(128),
    SURETY_FIRST_AIRLINE_ID: z.string().min(1).max(128),
    SURETY_GATEWAY_ID: z.string().min(1).max(128).default('surety-gateway'),
    SURETY_JOURNAL_ENABLED: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),
    SURETY_JOURNAL_FLUSH_MS: z.coerce.number().int().positive().default(1000),
}).refine(
    cfg => cfg.SURETY_OWNER_ID !== cfg.SURETY_FIRST_AIRLINE_ID,
    { message: 'Owner and first airline must be distinct identities', path: ['SURETY_FIRST_AIRLINE_ID'] }
);

export interface SuretyConfig {
    readonly logLevel: string;
    readonly ownerId: string;
    readonly firstAirlineId: string;
    readonly gatewayId: string;
    readonly journalEnabled: boolean;
    readonly journalFlushMs: number;
}

export function loadSuretyConfig(env: NodeJS.ProcessEnv = process.env): SuretyConfig {
    const parsed = validate(SuretyConfigSchema, env, 'SuretyConfig');
    return Object.freeze({
        logLevel: parsed.LOG_LEVEL,
        ownerId: parsed.SURETY_OWNER_ID,
        firstAirlineId: parsed.SURETY_FIRST_AIRLINE_ID,
        gatewayId: parsed.SURETY_GATEWAY_ID,
        journalEnabled: parsed.SURETY_JOURNAL_ENABLED,
        journalFlushMs: parsed.SURETY_JOURNAL_FLUSH_MS,
    });
}
