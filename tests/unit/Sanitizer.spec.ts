/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests error wrapping and information disclosure prevention.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ErrorSanitizer, SuretyError } from '../../libs/errors/sanitizer.js';
import { FlightSuretyError, isFlightSuretyError } from '../../libs/errors/FlightSuretyError.js';

describe('ErrorSanitizer', () => {
    it('should create SuretyError with incidentId', () => {
        const error = new SuretyError('Test error', { secret: 'hidden' }, 'SEC');

        assert.ok(error.incidentId.length > 0, 'incidentId should not be empty');
        assert.strictEqual(error.publicMessage, 'Test error');
        assert.strictEqual(error.category, 'SEC');
        assert.strictEqual(error.name, 'SuretyError');
    });

    it('should sanitize raw errors into SuretyError', () => {
        const rawError = new Error('Journal connection failed: password=test-secret');
        const sanitized = ErrorSanitizer.sanitize(rawError, 'Gateway:withdraw');

        assert.ok(sanitized instanceof SuretyError, 'Should be SuretyError');
        assert.strictEqual(
            sanitized.message,
            'An internal system error occurred. Please contact support with ID: Gateway:withdraw'
        );
        assert.strictEqual(sanitized.contextLabel, 'Gateway:withdraw');
        assert.strictEqual(sanitized.cause, rawError);
    });

    it('should wrap non-error throwables', () => {
        const sanitized = ErrorSanitizer.sanitize('boom', 'ctx');
        assert.ok(sanitized instanceof SuretyError);
        assert.strictEqual(sanitized.cause, 'boom');
    });

    it('should pass through existing SuretyError unchanged', () => {
        const original = new SuretyError('Original', { data: 'test' }, 'OPS');
        const result = ErrorSanitizer.sanitize(original, 'test-context');

        assert.strictEqual(result, original, 'Should return same instance');
    });

    it('should pass domain rejections through with their code', () => {
        const rejection = new FlightSuretyError('InsufficientCredit');
        const result = ErrorSanitizer.sanitize(rejection, 'Gateway:withdraw');

        assert.strictEqual(result, rejection);
        assert.strictEqual(rejection.message, 'Rejected: InsufficientCredit');
        assert.strictEqual(rejection.statusCode, 402);
        assert.strictEqual(isFlightSuretyError(result, 'InsufficientCredit'), true);
        assert.strictEqual(isFlightSuretyError(result, 'PoolUnderfunded'), false);
    });
});
