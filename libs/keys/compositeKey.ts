import crypto from 'crypto';

/**
 * Domain tags keep keys of different entity kinds from ever colliding,
 * even when their parts happen to match.
 */
export type KeyDomain = 'flight' | 'claim' | 'oracle-request';

export type KeyPart = string | number;

/**
 * Deterministic 32-byte hex key for a tuple of identifiers.
 * The tuple is JSON-encoded, so ("ab", "c") and ("a", "bc") hash apart.
 */
export function compositeKey(domain: KeyDomain, ...parts: KeyPart[]): string {
    return crypto.createHash('sha256')
        .update(JSON.stringify([domain, ...parts]))
        .digest('hex');
}
