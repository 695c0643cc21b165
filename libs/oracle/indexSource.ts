import crypto from 'crypto';
import { AccountId } from '../surety/types.js';
import { INDEX_RANGE } from '../surety/constants.js';

/**
 * Source of pseudo-random oracle indexes in [0, INDEX_RANGE).
 */
export interface IndexSource {
    next(account: AccountId): number;
}

/**
 * Mixes a per-process entropy seed, a monotonically advancing nonce and the
 * caller's identity through SHA-256.
 */
export class HashIndexSource implements IndexSource {
    private nonce = 0;

    constructor(
        private readonly seed: Buffer = crypto.randomBytes(32),
        private readonly range: number = INDEX_RANGE
    ) {
        // Each oracle holds three distinct indexes.
        if (!Number.isInteger(range) || range < 3) {
            throw new RangeError(`Index range must be an integer of at least 3, got ${range}`);
        }
    }

    public next(account: AccountId): number {
        const digest = crypto.createHash('sha256')
            .update(this.seed)
            .update(String(this.nonce++))
            .update(account)
            .digest();
        return digest.readUInt32BE(0) % this.range;
    }
}

/**
 * Replays a fixed sequence of indexes, cycling when exhausted.
 * Used for deterministic simulations and tests.
 */
export class SequenceIndexSource implements IndexSource {
    private position = 0;

    constructor(private readonly sequence: readonly number[]) {
        if (sequence.length === 0) {
            throw new RangeError('SequenceIndexSource needs at least one index');
        }
    }

    public next(): number {
        const value = this.sequence[this.position % this.sequence.length];
        this.position += 1;
        if (value === undefined) {
            throw new RangeError('SequenceIndexSource exhausted');
        }
        return value;
    }

    public consumed(): number {
        return this.position;
    }
}
