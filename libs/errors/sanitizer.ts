import { logger } from '../logging/logger.js';
import { FlightSuretyError } from './FlightSuretyError.js';
import crypto from 'crypto';

/**
 * Sanitizes unexpected internal errors at the gateway boundary by wrapping
 * them in a generic message and providing a unique incidentId for log
 * correlation. Domain rejections pass through untouched.
 */

export class SuretyError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' | 'FIN' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'SuretyError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Returns domain rejections and already-sanitized errors as they are;
     * wraps anything else into a SuretyError.
     */
    sanitize: (err: unknown, contextLabel: string): FlightSuretyError | SuretyError => {
        if (err instanceof SuretyError || err instanceof FlightSuretyError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            if (typeof err.message === 'string') {
                originalErrorMessage = err.message;
            }
            if ('stack' in err && typeof err.stack === 'string') {
                originalErrorStack = err.stack;
            }
        } else {
            originalErrorMessage = String(err);
        }

        return new SuretyError(
            `An internal system error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel }
        );
    }
};
