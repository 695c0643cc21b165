import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

/**
 * Fail-closed input validation.
 * Returns the parsed value or throws a Validation Violation naming the context.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails,
        }, "Input Validation Failure");

        throw new Error(`Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`);
    }

    return result.data;
}

/**
 * Factory for creating reusable validators.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
